/**
 * Muffasa Runtime Tests: Environment
 */

import { describe, expect, it } from 'vitest';
import { Environment, num } from '../../src/index.js';

describe('Muffasa Runtime: Environment', () => {
  it('starts with only the global frame', () => {
    const env = new Environment();
    expect(env.depth).toBe(1);
    expect(env.snapshot()).toEqual({});
  });

  it('seeds the global frame', () => {
    const env = new Environment([['x', num(1)]]);
    expect(env.lookup('x')).toEqual(num(1));
    expect(env.has('x')).toBe(true);
    expect(env.has('y')).toBe(false);
  });

  it('never pops the global frame', () => {
    const env = new Environment();
    expect(() => env.popFrame()).toThrow('Cannot pop the global frame');
  });

  it('updates the innermost frame that holds a name', () => {
    const env = new Environment();
    env.assign('x', num(1));
    env.pushFrame();
    env.assign('x', num(2));
    env.popFrame();
    expect(env.lookup('x')).toEqual(num(2));
  });

  it('binds new names in the current frame', () => {
    const env = new Environment();
    env.pushFrame();
    env.assign('local', num(1));
    expect(env.lookup('local')).toEqual(num(1));
    env.popFrame();
    expect(env.lookup('local')).toBeUndefined();
  });

  it('resolves names from inner frames outward', () => {
    const env = new Environment([['outer', num(1)]]);
    env.pushFrame();
    env.pushFrame();
    expect(env.depth).toBe(3);
    expect(env.lookup('outer')).toEqual(num(1));
  });

  it('snapshots only global bindings', () => {
    const env = new Environment([['g', num(1)]]);
    env.pushFrame();
    env.assign('inner', num(2));
    expect(env.snapshot()).toEqual({ g: num(1) });
  });
});

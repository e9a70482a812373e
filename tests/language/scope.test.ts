/**
 * Muffasa Language Tests: Scoping
 * Frames pushed by blocks and loops, and where assignments land
 */

import { describe, expect, it } from 'vitest';
import { RuntimeError, num } from '../../src/index.js';
import { run, runFull } from '../helpers/runtime.js';

describe('Muffasa Language: Scoping', () => {
  describe('globals', () => {
    it('runs a conditional program end to end', () => {
      const vars = run(
        'x = 520156~ y = 3~ if (x != 5) { z = x + y~ } else { p = x - y~ }'
      );
      expect(vars['z']).toEqual(num(520159));
      expect(vars['p']).toBeUndefined();
    });

    it('accumulates into an outer variable from a for loop', () => {
      const vars = run(
        'y = 0~ for (i = 1; i < 10; i = i + 1) { y = y + i~ }'
      );
      expect(vars['y']).toEqual(num(45));
    });

    it('seeds the global frame from initial variables', () => {
      const vars = run('y = x + 1~', { variables: { x: num(4) } });
      expect(vars['x']).toEqual(num(4));
      expect(vars['y']).toEqual(num(5));
    });
  });

  describe('blocks', () => {
    it('updates outer bindings and drops new ones at block exit', () => {
      const vars = run('x = 1~ { x = 2~ w = 3~ }');
      expect(vars['x']).toEqual(num(2));
      expect(vars['w']).toBeUndefined();
    });

    it('reports a block-local name read after the block', () => {
      expect(() => run('{ w = 3~ } v = w~')).toThrow(
        "Undefined variable 'w' at 1:16"
      );
    });

    it('carries the variable name on UndefinedVariable', () => {
      const { error } = runFull('v = missing~');
      expect(error).toBeInstanceOf(RuntimeError);
      expect(error?.code).toBe('UndefinedVariable');
      expect(error?.context).toEqual({ name: 'missing' });
    });

    it('releases every frame when a runtime error escapes', () => {
      const result = runFull('{ { x = 1~ y = z~ } }');
      expect(result.error?.code).toBe('UndefinedVariable');
      expect(result.environment.depth).toBe(1);
    });

    it('keeps the state reached before the error', () => {
      const result = runFull('a = 1~ b = a / 0~ c = 3~');
      expect(result.variables).toEqual({ a: num(1) });
    });
  });

  describe('loops', () => {
    it('drops names bound in a while body', () => {
      const vars = run('n = 0~ while (n < 3) { t = n~ n = n + 1~ }');
      expect(vars['n']).toEqual(num(3));
      expect(vars['t']).toBeUndefined();
    });

    it('gives each while iteration a fresh body frame', () => {
      const source =
        'i = 0~ s = 0~ while (i < 2) { if (i == 1) { s = seen~ } seen = 1~ i = i + 1~ }';
      expect(() => run(source)).toThrow("Undefined variable 'seen'");
    });

    it('keeps the for-loop counter out of the enclosing scope', () => {
      const vars = run('for (i = 0; i < 3; i = i + 1) { }');
      expect(vars['i']).toBeUndefined();
    });
  });
});

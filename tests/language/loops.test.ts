/**
 * Muffasa Language Tests: Loops
 * while, for, break and continue
 */

import { describe, expect, it } from 'vitest';
import { num } from '../../src/index.js';
import { createEventCollector, run, runFull } from '../helpers/runtime.js';

describe('Muffasa Language: Loops', () => {
  describe('while', () => {
    it('repeats while the condition holds', () => {
      const vars = run('n = 1~ while (n < 100) { n = n * 2~ }');
      expect(vars['n']).toEqual(num(128));
    });

    it('never runs the body for a false condition', () => {
      const vars = run('n = 0~ while (False) { n = 1~ }');
      expect(vars['n']).toEqual(num(0));
    });

    it('stops at break', () => {
      const vars = run(
        'i = 0~ while (True) { i = i + 1~ if (i == 5) { break~ } }'
      );
      expect(vars['i']).toEqual(num(5));
    });

    it('skips the rest of the body at continue', () => {
      const vars = run(
        'i = 0~ s = 0~ while (i < 5) { i = i + 1~ if (i == 3) { continue~ } s = s + i~ }'
      );
      expect(vars['s']).toEqual(num(12));
    });

    it('requires a Boolean condition', () => {
      const { error } = runFull('while (0) { }');
      expect(error?.toData().message).toBe(
        'Expected Boolean for while condition, got Number'
      );
    });
  });

  describe('for', () => {
    it('runs the step after continue', () => {
      const vars = run(
        's = 0~ for (i = 0; i < 5; i = i + 1) { if (i == 2) { continue~ } s = s + i~ }'
      );
      expect(vars['s']).toEqual(num(8));
    });

    it('skips the step after break', () => {
      const { events, callbacks } = createEventCollector();
      const vars = run(
        'last = 0~ for (i = 0; i < 10; i = i + 1) { last = i~ if (i == 3) { break~ } }',
        { observability: callbacks }
      );
      expect(vars['last']).toEqual(num(3));
      const counter = events.assign
        .filter((e) => e.name === 'i')
        .map((e) => e.value);
      expect(counter).toEqual([num(0), num(1), num(2), num(3)]);
    });

    it('breaks only the innermost loop', () => {
      const vars = run(`
        c = 0~
        for (i = 0; i < 3; i = i + 1) {
          for (j = 0; j < 3; j = j + 1) {
            if (j == 1) { break~ }
            c = c + 1~
          }
        }`);
      expect(vars['c']).toEqual(num(3));
    });

    it("accepts '~' as a header separator", () => {
      const vars = run('s = 0~ for (i = 0~ i < 4~ i = i + 1) { s = s + i~ }');
      expect(vars['s']).toEqual(num(6));
    });

    it('requires a Boolean condition', () => {
      const { error } = runFull('for (i = 0; i; i = i + 1) { }');
      expect(error?.toData().message).toBe(
        'Expected Boolean for for condition, got Number'
      );
    });
  });
});

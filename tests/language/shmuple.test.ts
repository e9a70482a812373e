/**
 * Muffasa Language Tests: Shmuple
 */

import { describe, expect, it } from 'vitest';
import { TRUE, formatValue, num, shmuple, str } from '../../src/index.js';
import { run, runFull } from '../helpers/runtime.js';

/** Textual form of a variable after running the source */
function shown(source: string, name: string): string {
  const value = run(source)[name];
  if (!value) throw new Error(`Variable '${name}' is not bound`);
  return formatValue(value);
}

describe('Muffasa Language: Shmuple', () => {
  describe('construction', () => {
    it('holds its arguments in order', () => {
      const vars = run('t = Shmuple(1, "a", True)~');
      expect(vars['t']).toEqual(shmuple([num(1), str('a'), TRUE]));
    });

    it('can be empty', () => {
      expect(shown('t = Shmuple()~', 't')).toBe('()');
    });

    it('freezes its elements', () => {
      const source = [num(1)];
      const t = shmuple(source);
      source.push(num(2));
      expect(t.elements).toHaveLength(1);
      expect(Object.isFrozen(t.elements)).toBe(true);
    });
  });

  describe('sortuple', () => {
    it('returns a sorted copy and leaves the receiver unchanged', () => {
      const source = 't = Shmuple(3, 1, 2)~ s = t.sortuple()~';
      expect(shown(source, 's')).toBe('(1, 2, 3)');
      expect(shown(source, 't')).toBe('(3, 1, 2)');
    });

    it('orders mixed kinds by kind first', () => {
      expect(
        shown('s = Shmuple("b", 2, True, "a", 1).sortuple()~', 's')
      ).toBe('(True, 1, 2, "a", "b")');
    });
  });

  describe('Add', () => {
    it('concatenates two Shmuples', () => {
      expect(shown('t = Shmuple(1).Add(Shmuple(2, 3))~', 't')).toBe(
        '(1, 2, 3)'
      );
    });

    it('rejects other argument types', () => {
      const { error } = runFull('t = Shmuple(1).Add(5)~');
      expect(error?.code).toBe('TypeMismatch');
      expect(error?.toData().message).toBe(
        'Shmuple.Add expects a Shmuple, got Number'
      );
    });
  });

  describe('getitem', () => {
    it('returns the element at an index', () => {
      expect(run('x = Shmuple(5, 6, 7).getitem(1)~')['x']).toEqual(num(6));
    });

    it('rejects indices past the end', () => {
      const { error } = runFull('x = Shmuple(5, 6, 7).getitem(3)~');
      expect(error?.code).toBe('IndexOutOfBounds');
      expect(error?.toData().message).toBe(
        'Index 3 out of bounds for length 3'
      );
      expect(error?.context).toEqual({ index: 3, length: 3 });
    });

    it('rejects negative indices', () => {
      const { error } = runFull('x = Shmuple(5, 6, 7).getitem(-1)~');
      expect(error?.toData().message).toBe(
        'Index -1 out of bounds for length 3'
      );
    });

    it('rejects fractional and non-numeric indices', () => {
      expect(
        runFull('x = Shmuple(5).getitem(0.5)~').error?.toData().message
      ).toBe('Shmuple.getitem expects an integer, got 0.5');
      expect(
        runFull('x = Shmuple(5).getitem("a")~').error?.toData().message
      ).toBe('Shmuple.getitem expects a Number, got String');
    });
  });

  describe('Index and Length', () => {
    it('finds the first equal element', () => {
      expect(run('i = Shmuple("a", "b", "b").Index("b")~')['i']).toEqual(
        num(1)
      );
    });

    it('compares elements structurally', () => {
      expect(
        run('i = Shmuple(2, Shmuple(1)).Index(Shmuple(1))~')['i']
      ).toEqual(num(1));
    });

    it('returns -1 when nothing matches', () => {
      expect(run('i = Shmuple(1, 2).Index(9)~')['i']).toEqual(num(-1));
    });

    it('counts elements', () => {
      expect(run('n = Shmuple(1, 2, 3).Length()~')['n']).toEqual(num(3));
    });

    it('checks arity', () => {
      const { error } = runFull('n = Shmuple(1).Length(1)~');
      expect(error?.code).toBe('InvalidArgument');
      expect(error?.toData().message).toBe(
        'Shmuple.Length expects 0 arguments, got 1'
      );
    });
  });

  describe('unknown methods', () => {
    it('raises NoSuchMethod', () => {
      const { error } = runFull('t = Shmuple(1)~ t.push(2)~');
      expect(error?.code).toBe('NoSuchMethod');
      expect(error?.toData().message).toBe("Shmuple has no method 'push'");
      expect(error?.context).toEqual({ kind: 'Shmuple', name: 'push' });
    });

    it('does not resolve object prototype members', () => {
      const { error } = runFull('t = Shmuple(1)~ t.constructor()~');
      expect(error?.toData().message).toBe(
        "Shmuple has no method 'constructor'"
      );
    });
  });
});

/**
 * Structural equality and default ordering for Muffasa values
 */

import type { MuffasaValue, ValueKind } from './values.js';

type Elements = readonly MuffasaValue[];

/**
 * Container pairs whose comparison is in progress.
 * Meeting a pair again means both sides cycle back the same way.
 */
class PendingPairs {
  private readonly pairs = new Map<Elements, Set<Elements>>();

  has(a: Elements, b: Elements): boolean {
    return this.pairs.get(a)?.has(b) ?? false;
  }

  add(a: Elements, b: Elements): void {
    const partners = this.pairs.get(a);
    if (partners) partners.add(b);
    else this.pairs.set(a, new Set([b]));
  }

  delete(a: Elements, b: Elements): void {
    this.pairs.get(a)?.delete(b);
  }
}

/**
 * Structural equality.
 * Values of different kinds are never equal; composites compare element-wise.
 * An Arrays that contains itself equals one with the same shape.
 */
export function valuesEqual(a: MuffasaValue, b: MuffasaValue): boolean {
  return equalWith(a, b, new PendingPairs());
}

function equalWith(
  a: MuffasaValue,
  b: MuffasaValue,
  pending: PendingPairs
): boolean {
  switch (a.kind) {
    case 'number':
      return b.kind === 'number' && a.value === b.value;
    case 'boolean':
      return b.kind === 'boolean' && a.value === b.value;
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'stringbeans':
      return b.kind === 'stringbeans' && a.text === b.text;
    case 'shmuple':
      return (
        b.kind === 'shmuple' && elementsEqual(a.elements, b.elements, pending)
      );
    case 'arrays':
      return (
        b.kind === 'arrays' && elementsEqual(a.elements, b.elements, pending)
      );
    case 'unit':
      return b.kind === 'unit';
  }
}

function elementsEqual(
  a: Elements,
  b: Elements,
  pending: PendingPairs
): boolean {
  if (a === b) return true;
  if (a.length !== b.length) return false;
  if (pending.has(a, b)) return true;
  pending.add(a, b);
  const equal = a.every((value, i) => {
    const other = b[i];
    return other !== undefined && equalWith(value, other, pending);
  });
  pending.delete(a, b);
  return equal;
}

// ============================================================
// ORDERING
// ============================================================

const KIND_RANK: Record<ValueKind, number> = {
  boolean: 0,
  number: 1,
  string: 2,
  stringbeans: 3,
  shmuple: 4,
  arrays: 5,
  unit: 6,
};

/**
 * Total order used by sorting.
 * Different kinds order by kind rank; composites compare lexicographically
 * element by element, then by length. NaN sorts after every other number.
 */
export function compareValues(a: MuffasaValue, b: MuffasaValue): number {
  return compareWith(a, b, new PendingPairs());
}

function compareWith(
  a: MuffasaValue,
  b: MuffasaValue,
  pending: PendingPairs
): number {
  const rankDiff = KIND_RANK[a.kind] - KIND_RANK[b.kind];
  if (rankDiff !== 0) return Math.sign(rankDiff);

  if (a.kind === 'number' && b.kind === 'number') {
    return compareNumbers(a.value, b.value);
  }
  if (a.kind === 'boolean' && b.kind === 'boolean') {
    return compareOrdered(Number(a.value), Number(b.value));
  }
  if (a.kind === 'string' && b.kind === 'string') {
    return compareOrdered(a.value, b.value);
  }
  if (a.kind === 'stringbeans' && b.kind === 'stringbeans') {
    return compareOrdered(a.text, b.text);
  }
  if (
    (a.kind === 'shmuple' && b.kind === 'shmuple') ||
    (a.kind === 'arrays' && b.kind === 'arrays')
  ) {
    return compareElements(a.elements, b.elements, pending);
  }
  return 0;
}

function compareNumbers(a: number, b: number): number {
  const aNaN = Number.isNaN(a);
  const bNaN = Number.isNaN(b);
  if (aNaN || bNaN) return Number(aNaN) - Number(bNaN);
  return compareOrdered(a, b);
}

function compareOrdered(a: number | string, b: number | string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function compareElements(
  a: Elements,
  b: Elements,
  pending: PendingPairs
): number {
  if (a === b || pending.has(a, b)) return 0;
  pending.add(a, b);
  let diff = 0;
  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared && diff === 0; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined) break;
    diff = compareWith(left, right, pending);
  }
  pending.delete(a, b);
  return diff !== 0 ? diff : compareOrdered(a.length, b.length);
}

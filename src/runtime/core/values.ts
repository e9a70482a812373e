/**
 * Muffasa Value Types and Utilities
 *
 * Core value types that flow through Muffasa programs.
 * Public API for host applications.
 */

/** Number (IEEE double) */
export interface NumberValue {
  readonly kind: 'number';
  readonly value: number;
}

export interface BooleanValue {
  readonly kind: 'boolean';
  readonly value: boolean;
}

/** Plain string produced by a string literal or `+` */
export interface StringValue {
  readonly kind: 'string';
  readonly value: string;
}

/** Immutable ordered sequence */
export interface ShmupleValue {
  readonly kind: 'shmuple';
  readonly elements: readonly MuffasaValue[];
}

/**
 * Mutable ordered sequence.
 * Shared by reference: every binding to the same Arrays sees its mutations.
 */
export interface ArraysValue {
  readonly kind: 'arrays';
  readonly elements: MuffasaValue[];
}

/** Immutable text wrapper with its own method table */
export interface StringBeansValue {
  readonly kind: 'stringbeans';
  readonly text: string;
}

/** Result of a method called for its effect */
export interface UnitValue {
  readonly kind: 'unit';
}

/** Any value that can flow through Muffasa */
export type MuffasaValue =
  | NumberValue
  | BooleanValue
  | StringValue
  | ShmupleValue
  | ArraysValue
  | StringBeansValue
  | UnitValue;

export type ValueKind = MuffasaValue['kind'];

// ============================================================
// CONSTRUCTORS
// ============================================================

export const UNIT: UnitValue = Object.freeze({ kind: 'unit' });

export const TRUE: BooleanValue = Object.freeze({ kind: 'boolean', value: true });
export const FALSE: BooleanValue = Object.freeze({
  kind: 'boolean',
  value: false,
});

export function num(value: number): NumberValue {
  return { kind: 'number', value };
}

export function bool(value: boolean): BooleanValue {
  return value ? TRUE : FALSE;
}

export function str(value: string): StringValue {
  return { kind: 'string', value };
}

export function shmuple(elements: readonly MuffasaValue[]): ShmupleValue {
  return { kind: 'shmuple', elements: Object.freeze([...elements]) };
}

export function arrays(elements: MuffasaValue[] = []): ArraysValue {
  return { kind: 'arrays', elements };
}

export function stringBeans(text: string): StringBeansValue {
  return { kind: 'stringbeans', text };
}

// ============================================================
// TYPE NAMES
// ============================================================

const TYPE_NAMES: Record<ValueKind, string> = {
  number: 'Number',
  boolean: 'Boolean',
  string: 'String',
  shmuple: 'Shmuple',
  arrays: 'Arrays',
  stringbeans: 'StringBeans',
  unit: 'None',
};

/** User-facing type name of a value */
export function typeName(value: MuffasaValue): string {
  return TYPE_NAMES[value.kind];
}

// ============================================================
// FORMATTING
// ============================================================

/**
 * Format a value for output.
 * Top-level strings print raw; inside containers they are quoted.
 * A container met again inside itself prints as `[...]` or `(...)`.
 */
export function formatValue(value: MuffasaValue): string {
  return format(value, false, new Set());
}

/** Format a value with strings and StringBeans always quoted */
export function inspectValue(value: MuffasaValue): string {
  return format(value, true, new Set());
}

function format(
  value: MuffasaValue,
  quoteText: boolean,
  open: Set<readonly MuffasaValue[]>
): string {
  switch (value.kind) {
    case 'number':
      return formatNumber(value.value);
    case 'boolean':
      return value.value ? 'True' : 'False';
    case 'string':
      return quoteText ? `"${value.value}"` : value.value;
    case 'stringbeans':
      return quoteText ? `"${value.text}"` : value.text;
    case 'shmuple':
      return `(${formatElements(value.elements, open)})`;
    case 'arrays':
      return `[${formatElements(value.elements, open)}]`;
    case 'unit':
      return 'None';
  }
}

function formatElements(
  elements: readonly MuffasaValue[],
  open: Set<readonly MuffasaValue[]>
): string {
  if (open.has(elements)) return '...';
  open.add(elements);
  const text = elements.map((e) => format(e, true, open)).join(', ');
  open.delete(elements);
  return text;
}

/** Shortest round-trip form: 5, 2.5, -0.125 */
export function formatNumber(n: number): string {
  return Object.is(n, -0) ? '0' : String(n);
}

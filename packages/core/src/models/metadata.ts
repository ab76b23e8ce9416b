/**
 * Tagged metadata values
 *
 * Constructors, non-throwing accessors, structural equality, and conversion
 * to and from plain JSON-like values.
 */

import type { Metadata, MetadataValue } from '@anchorlog/shared-types';
import { ValidationError } from '../utils/errors.js';

export type PlainValue =
  | string
  | number
  | boolean
  | null
  | readonly PlainValue[]
  | { readonly [key: string]: PlainValue };

const NULL_VALUE: MetadataValue = { kind: 'null' };

export const metadataValue = {
  string: (value: string): MetadataValue => ({ kind: 'string', value }),
  int: (value: number): MetadataValue => {
    if (!Number.isSafeInteger(value)) {
      throw new ValidationError(`Not an integer: ${value}`, {
        component: 'Metadata',
        operation: 'int',
        field: 'value',
      });
    }
    return { kind: 'int', value };
  },
  double: (value: number): MetadataValue => {
    if (!Number.isFinite(value)) {
      throw new ValidationError(`Not a finite number: ${value}`, {
        component: 'Metadata',
        operation: 'double',
        field: 'value',
      });
    }
    return { kind: 'double', value };
  },
  bool: (value: boolean): MetadataValue => ({ kind: 'bool', value }),
  array: (value: readonly MetadataValue[]): MetadataValue => ({ kind: 'array', value }),
  map: (value: Readonly<Record<string, MetadataValue>>): MetadataValue => ({ kind: 'map', value }),
  null: (): MetadataValue => NULL_VALUE,
};

// ============================================================================
// Accessors
// ============================================================================

export function asString(value: MetadataValue | undefined): string | undefined {
  return value?.kind === 'string' ? value.value : undefined;
}

export function asInt(value: MetadataValue | undefined): number | undefined {
  return value?.kind === 'int' ? value.value : undefined;
}

export function asDouble(value: MetadataValue | undefined): number | undefined {
  return value?.kind === 'double' ? value.value : undefined;
}

export function asBool(value: MetadataValue | undefined): boolean | undefined {
  return value?.kind === 'bool' ? value.value : undefined;
}

export function asArray(value: MetadataValue | undefined): readonly MetadataValue[] | undefined {
  return value?.kind === 'array' ? value.value : undefined;
}

export function asMap(
  value: MetadataValue | undefined
): Readonly<Record<string, MetadataValue>> | undefined {
  return value?.kind === 'map' ? value.value : undefined;
}

export function isNull(value: MetadataValue | undefined): boolean {
  return value?.kind === 'null';
}

// ============================================================================
// Equality
// ============================================================================

/**
 * Structural equality. `int` and `double` never compare equal, even for the
 * same number.
 */
export function metadataValueEquals(a: MetadataValue, b: MetadataValue): boolean {
  switch (a.kind) {
    case 'string':
      return b.kind === 'string' && a.value === b.value;
    case 'int':
      return b.kind === 'int' && a.value === b.value;
    case 'double':
      return b.kind === 'double' && Object.is(a.value, b.value);
    case 'bool':
      return b.kind === 'bool' && a.value === b.value;
    case 'array':
      return (
        b.kind === 'array' &&
        a.value.length === b.value.length &&
        a.value.every((item, index) => {
          const other = b.value[index];
          return other !== undefined && metadataValueEquals(item, other);
        })
      );
    case 'map':
      return b.kind === 'map' && metadataEquals(a.value, b.value);
    case 'null':
      return b.kind === 'null';
  }
}

/**
 * Key-order-insensitive equality of two metadata maps
 */
export function metadataEquals(a: Metadata, b: Metadata): boolean {
  const keysA = Object.keys(a);
  if (keysA.length !== Object.keys(b).length) {
    return false;
  }

  return keysA.every((key) => {
    const left = a[key];
    const right = b[key];
    return left !== undefined && right !== undefined && metadataValueEquals(left, right);
  });
}

// ============================================================================
// Plain conversion
// ============================================================================

function isPlainArray(value: PlainValue): value is readonly PlainValue[] {
  return Array.isArray(value);
}

/**
 * Convert a plain value. Integral numbers become `int`, others `double`.
 */
export function fromPlain(value: PlainValue): MetadataValue {
  if (value === null) return NULL_VALUE;
  if (typeof value === 'string') return { kind: 'string', value };
  if (typeof value === 'boolean') return { kind: 'bool', value };
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) ? { kind: 'int', value } : metadataValue.double(value);
  }

  if (isPlainArray(value)) {
    return { kind: 'array', value: value.map(fromPlain) };
  }

  return { kind: 'map', value: fromPlainMetadata(value) };
}

export function fromPlainMetadata(record: { readonly [key: string]: PlainValue }): Metadata {
  const result: Record<string, MetadataValue> = {};
  for (const [key, value] of Object.entries(record)) {
    result[key] = fromPlain(value);
  }
  return result;
}

/**
 * Drop the tags. `int` and `double` both become numbers.
 */
export function toPlain(value: MetadataValue): PlainValue {
  switch (value.kind) {
    case 'array':
      return value.value.map(toPlain);
    case 'map':
      return toPlainMetadata(value.value);
    case 'null':
      return null;
    default:
      return value.value;
  }
}

export function toPlainMetadata(metadata: Metadata): Record<string, PlainValue> {
  const result: Record<string, PlainValue> = {};
  for (const [key, value] of Object.entries(metadata)) {
    result[key] = toPlain(value);
  }
  return result;
}

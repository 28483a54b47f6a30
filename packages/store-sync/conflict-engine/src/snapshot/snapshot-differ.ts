/**
 * Structural comparison of entity snapshots.
 *
 * Values are compared through a canonical encoding (object keys sorted,
 * numbers in their shortest form) so key order and numeric formatting in
 * the serialized input never count as a difference.
 */

import type { JsonValue, Snapshot, SnapshotInput } from '../types.js';
import { ConflictEngineError } from '../errors.js';

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Decode a snapshot handed over by the sync transport.
 * Throws a DATA_ERROR when the input is not a JSON object.
 */
export function parseSnapshot(input: SnapshotInput, side: 'local' | 'remote' | 'resolved' = 'local'): Snapshot {
  let decoded: unknown = input;

  if (typeof input === 'string') {
    try {
      decoded = JSON.parse(input);
    } catch (err) {
      throw new ConflictEngineError('DATA_ERROR', `Malformed ${side} snapshot: invalid JSON`, {
        cause: err,
      });
    }
  }

  if (!isPlainObject(decoded)) {
    throw new ConflictEngineError('DATA_ERROR', `Malformed ${side} snapshot: expected a JSON object`);
  }

  const snapshot: Snapshot = {};
  for (const [field, value] of Object.entries(decoded)) {
    if (!isJsonValue(value)) {
      throw new ConflictEngineError(
        'DATA_ERROR',
        `Malformed ${side} snapshot: field '${field}' is not a JSON value`
      );
    }
    snapshot[field] = value;
  }
  return snapshot;
}

/**
 * Canonical encoding of a JSON value: object keys sorted, no whitespace.
 */
export function canonicalize(value: JsonValue): string {
  if (Array.isArray(value)) {
    return `[${value.map(canonicalize).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const keys = Object.keys(value).sort();
    return `{${keys.map((k) => `${JSON.stringify(k)}:${canonicalize(value[k] ?? null)}`).join(',')}}`;
  }
  return JSON.stringify(value);
}

export function valuesEqual(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return canonicalize(a) === canonicalize(b);
}

/**
 * Top-level fields whose values differ, including fields present on one
 * side only. Sorted by code unit so the order is stable across runs.
 */
export function conflictingFields(local: Snapshot, remote: Snapshot): string[] {
  const fields = new Set([...Object.keys(local), ...Object.keys(remote)]);
  const differing: string[] = [];

  for (const field of fields) {
    if (!valuesEqual(fieldValue(local, field), fieldValue(remote, field))) {
      differing.push(field);
    }
  }

  return differing.sort();
}

/**
 * True iff at least one field's semantic value differs.
 */
export function hasMeaningfulDifference(local: Snapshot, remote: Snapshot): boolean {
  return conflictingFields(local, remote).length > 0;
}

/** Own-property lookup; inherited keys like `constructor` are not fields */
export function fieldValue(snapshot: Snapshot, field: string): JsonValue | undefined {
  return Object.prototype.hasOwnProperty.call(snapshot, field) ? snapshot[field] : undefined;
}

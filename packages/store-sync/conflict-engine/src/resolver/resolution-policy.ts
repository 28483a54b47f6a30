/**
 * Per-field resolution policies.
 *
 * The resolved record starts as a copy of the local snapshot (fields
 * nobody disagrees on are identical on both sides anyway) and each
 * conflicting field is overwritten with the value its policy picks.
 * A policy that picks an absent value removes the field.
 */

import type {
  ComputedResolution,
  Conflict,
  JsonValue,
  ResolutionType,
  Snapshot,
} from '../types.js';
import { ConflictEngineError } from '../errors.js';
import { fieldValue, parseSnapshot, valuesEqual } from '../snapshot/snapshot-differ.js';

/** Policy chosen for one conflicting field */
export type FieldPolicy = (field: string) => ResolutionType;

function isPlainObject(value: JsonValue | undefined): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * True when the local snapshot is strictly newer.
 * Equal timestamps favour remote: the central system is the authority.
 */
export function localIsNewer(conflict: Pick<Conflict, 'localTimestamp' | 'remoteTimestamp'>): boolean {
  return conflict.localTimestamp.getTime() > conflict.remoteTimestamp.getTime();
}

/**
 * Merge two values of one field.
 * One-sided values survive; plain objects merge key by key; any other
 * disagreement goes to the newer side.
 */
export function mergeValues(
  local: JsonValue | undefined,
  remote: JsonValue | undefined,
  preferLocal: boolean
): JsonValue | undefined {
  if (local === undefined) return remote;
  if (remote === undefined) return local;
  if (valuesEqual(local, remote)) return local;

  if (isPlainObject(local) && isPlainObject(remote)) {
    const merged: { [key: string]: JsonValue } = {};
    const keys = new Set([...Object.keys(local), ...Object.keys(remote)]);
    for (const key of keys) {
      const value = mergeValues(
        Object.prototype.hasOwnProperty.call(local, key) ? local[key] : undefined,
        Object.prototype.hasOwnProperty.call(remote, key) ? remote[key] : undefined,
        preferLocal
      );
      if (value !== undefined) {
        merged[key] = value;
      }
    }
    return merged;
  }

  return preferLocal ? local : remote;
}

function pickValue(
  policy: ResolutionType,
  field: string,
  local: Snapshot,
  remote: Snapshot,
  preferLocal: boolean
): JsonValue | undefined {
  switch (policy) {
    case 'LocalWins':
      return fieldValue(local, field);
    case 'RemoteWins':
      return fieldValue(remote, field);
    case 'LastWriteWins':
      return preferLocal ? fieldValue(local, field) : fieldValue(remote, field);
    case 'Merge':
      return mergeValues(fieldValue(local, field), fieldValue(remote, field), preferLocal);
    case 'Manual':
      throw new ConflictEngineError(
        'INVALID_REQUEST',
        `Field '${field}' requires manual resolution and cannot be computed`
      );
  }
}

/**
 * Compose the resolved record for a conflict.
 * `resolutionType` is the single policy used, or Merge when several contributed.
 */
export function computeResolution(conflict: Conflict, policyFor: FieldPolicy): ComputedResolution {
  const local = parseSnapshot(conflict.localSnapshot, 'local');
  const remote = parseSnapshot(conflict.remoteSnapshot, 'remote');
  const preferLocal = localIsNewer(conflict);

  const record: Snapshot = structuredClone(local);
  const fieldPolicies: Record<string, ResolutionType> = {};

  for (const field of conflict.conflictingFields) {
    const policy = policyFor(field);
    fieldPolicies[field] = policy;

    const value = pickValue(policy, field, local, remote, preferLocal);
    if (value === undefined) {
      delete record[field];
    } else {
      record[field] = value;
    }
  }

  const used = new Set(Object.values(fieldPolicies));
  const [only] = used;
  const resolutionType: ResolutionType = used.size === 1 && only !== undefined ? only : 'Merge';

  return { record, resolutionType, fieldPolicies };
}

/**
 * Record computed as if every conflicting field used `resolutionType`.
 */
export function computeUniformResolution(
  conflict: Conflict,
  resolutionType: ResolutionType
): ComputedResolution {
  if (resolutionType === 'Manual') {
    throw new ConflictEngineError(
      'INVALID_REQUEST',
      'Manual resolution needs an explicit resolved snapshot'
    );
  }
  return computeResolution(conflict, () => resolutionType);
}

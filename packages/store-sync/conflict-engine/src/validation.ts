/**
 * Input validation for operator and sync-transport requests.
 * Each validator returns a list of error messages (empty = valid).
 */

import type { ManualResolveRequest, ResolutionRule } from './types.js';
import { ENTITY_TYPES, RESOLUTION_TYPES, isEntityType, isResolutionType } from './types.js';

/** Field names: identifier-like, no path separators */
const PROPERTY_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

function isNonEmptyString(value: unknown): value is string {
  return typeof value === 'string' && value.trim().length > 0;
}

export function validateManualResolveRequest(request: ManualResolveRequest): string[] {
  const errors: string[] = [];

  if (!isNonEmptyString(request.conflictId)) {
    errors.push('conflictId is required');
  }

  if (!isNonEmptyString(request.userId)) {
    errors.push('userId is required');
  }

  if (!isResolutionType(request.resolutionType)) {
    errors.push(`resolutionType must be one of: ${RESOLUTION_TYPES.join(', ')}`);
  } else if (
    request.resolutionType === 'Manual' &&
    (request.resolvedSnapshot === undefined || request.resolvedSnapshot === null)
  ) {
    errors.push('resolvedSnapshot is required for Manual resolution');
  }

  if (request.notes !== undefined && request.notes !== null && typeof request.notes !== 'string') {
    errors.push('notes must be a string');
  }

  return errors;
}

/**
 * Validate an untrusted rule payload.
 * Returns the typed rule when valid.
 */
export function validateRule(input: unknown): { rule: ResolutionRule | null; errors: string[] } {
  const errors: string[] = [];

  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return { rule: null, errors: ['rule must be an object'] };
  }

  const raw: Record<string, unknown> = { ...input };
  const { entityType, propertyName, resolution } = raw;

  if (!isEntityType(entityType)) {
    errors.push(`entityType must be one of: ${ENTITY_TYPES.join(', ')}`);
  }

  if (propertyName !== undefined && propertyName !== null) {
    if (typeof propertyName !== 'string' || !PROPERTY_NAME_PATTERN.test(propertyName)) {
      errors.push('propertyName must be an identifier (letters, digits, underscores)');
    }
  }

  if (!isResolutionType(resolution)) {
    errors.push(`resolution must be one of: ${RESOLUTION_TYPES.join(', ')}`);
  }

  const priority = raw['priority'] ?? 100;
  if (typeof priority !== 'number' || !Number.isInteger(priority) || priority < 0) {
    errors.push('priority must be a non-negative integer');
  }

  const requireManualReview = raw['requireManualReview'] ?? false;
  if (typeof requireManualReview !== 'boolean') {
    errors.push('requireManualReview must be a boolean');
  }

  const isActive = raw['isActive'] ?? true;
  if (typeof isActive !== 'boolean') {
    errors.push('isActive must be a boolean');
  }

  const description = raw['description'] ?? null;
  if (description !== null && typeof description !== 'string') {
    errors.push('description must be a string');
  }

  if (
    errors.length > 0 ||
    !isEntityType(entityType) ||
    !isResolutionType(resolution) ||
    typeof priority !== 'number' ||
    typeof requireManualReview !== 'boolean' ||
    typeof isActive !== 'boolean' ||
    (description !== null && typeof description !== 'string')
  ) {
    return { rule: null, errors };
  }

  return {
    rule: {
      entityType,
      propertyName: typeof propertyName === 'string' ? propertyName : null,
      resolution,
      requireManualReview,
      priority,
      isActive,
      description,
    },
    errors,
  };
}

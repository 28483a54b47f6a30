/**
 * Types for the conflict detection and resolution engine.
 *
 * A conflict is raised when a store's local snapshot of an entity and the
 * central (remote) snapshot of the same entity differ. The engine decides
 * which values survive through a rule table and applies the result to the
 * canonical entity store exactly once.
 */

/** JSON value as stored in a snapshot field */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Structured record of one entity instance: field name -> value */
export type Snapshot = { [field: string]: JsonValue };

/** Snapshot as handed over by the sync transport (object or JSON text) */
export type SnapshotInput = Snapshot | string;

/** Registered entity types that can take part in sync */
export const ENTITY_TYPES = [
  'Product',
  'Category',
  'Inventory',
  'StockMovement',
  'Receipt',
  'Order',
  'Customer',
  'LoyaltyMember',
  'Supplier',
  'Employee',
  'Promotion',
  'PriceList',
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

export function isEntityType(value: unknown): value is EntityType {
  return typeof value === 'string' && (ENTITY_TYPES as readonly string[]).includes(value);
}

/** Lifecycle of a conflict. Resolved and Ignored are terminal. */
export type ConflictStatus = 'Pending' | 'Resolved' | 'Ignored';

export const CONFLICT_STATUSES: readonly ConflictStatus[] = ['Pending', 'Resolved', 'Ignored'];

/** Policy used to pick surviving values */
export type ResolutionType =
  | 'LocalWins'     // Store's value wins
  | 'RemoteWins'    // Central value wins
  | 'LastWriteWins' // Later timestamp wins, ties go to remote
  | 'Merge'         // Keep one-sided values, merge objects, LWW otherwise
  | 'Manual';       // Operator must decide

export const RESOLUTION_TYPES: readonly ResolutionType[] = [
  'LocalWins',
  'RemoteWins',
  'LastWriteWins',
  'Merge',
  'Manual',
];

export function isResolutionType(value: unknown): value is ResolutionType {
  return typeof value === 'string' && (RESOLUTION_TYPES as readonly string[]).includes(value);
}

/** Lease held by a transition in flight */
export interface ConflictClaim {
  token: string;
  expiresAt: Date;
}

/** A persisted discrepancy between a local and a remote snapshot */
export interface Conflict {
  id: string;
  entityType: EntityType;
  entityId: string;

  /** Store whose sync session raised the conflict */
  storeId: string | null;

  localSnapshot: Snapshot;
  remoteSnapshot: Snapshot;
  localTimestamp: Date;
  remoteTimestamp: Date;

  /** Sorted, never empty */
  conflictingFields: string[];

  status: ConflictStatus;
  resolutionType: ResolutionType | null;

  /** Set if and only if status is Resolved */
  resolvedSnapshot: Snapshot | null;

  resolvedBy: string | null;

  /** Terminal timestamp (resolution or ignore) */
  resolvedAt: Date | null;

  notes: string | null;
  syncBatchId: string | null;
  detectedAt: Date;
  claim: ConflictClaim | null;
}

/** Input supplied by the sync transport */
export interface DetectConflictInput {
  entityType: string;
  entityId: string;
  localSnapshot: SnapshotInput;
  remoteSnapshot: SnapshotInput;
  localTimestamp: Date;
  remoteTimestamp: Date;
  syncBatchId?: string | null;
  storeId?: string | null;
}

/** Typed rule key: entity type plus optional field */
export interface RuleKey {
  entityType: EntityType;

  /** null = entity-wide default */
  propertyName: string | null;
}

export interface ResolutionRule extends RuleKey {
  resolution: ResolutionType;

  /** Force manual handling regardless of `resolution` */
  requireManualReview: boolean;

  /** Lower sorts first in listings */
  priority: number;

  isActive: boolean;
  description: string | null;
}

/** Rule returned when nothing specific matches */
export interface GlobalDefaultRule {
  entityType: EntityType;
  propertyName: null;
  resolution: ResolutionType;
  requireManualReview: false;
  priority: number;
  isActive: true;
  description: string;
  isGlobalDefault: true;
}

export type ApplicableRule = (ResolutionRule & { isGlobalDefault?: false }) | GlobalDefaultRule;

export type AuditAction =
  | 'Detected'
  | 'AutoResolved'
  | 'ManuallyResolved'
  | 'BulkResolved'
  | 'Ignored'
  | 'Purged';

/** Immutable audit trail entry */
export interface AuditEntry {
  id: string;
  conflictId: string;
  action: AuditAction;
  oldStatus: ConflictStatus | null;
  newStatus: ConflictStatus;

  /** null for system actions */
  userId: string | null;

  timestamp: Date;
  details: string | null;
}

/** Field updates written by a terminal transition */
export interface ConflictTransition {
  status: Exclude<ConflictStatus, 'Pending'>;
  resolutionType: ResolutionType | null;
  resolvedSnapshot: Snapshot | null;
  resolvedBy: string | null;
  resolvedAt: Date;
  notes: string | null;
}

export type ResolutionOutcome =
  | 'resolved'         // Resolution applied by this call
  | 'ignored'          // Ignored by this call
  | 'already_resolved' // Resolved earlier; stored result returned
  | 'already_ignored'  // Ignored earlier; nothing applied
  | 'manual_required'; // A conflicting field needs an operator

export interface ResolutionResult {
  conflictId: string;
  outcome: ResolutionOutcome;
  status: ConflictStatus;
  resolutionType: ResolutionType | null;
  resolvedSnapshot: Snapshot | null;

  /** Fields whose rule demands manual resolution (manual_required only) */
  manualFields: string[];

  conflict: Conflict;
}

/** Record computed by the resolver before it is applied */
export interface ComputedResolution {
  record: Snapshot;
  resolutionType: ResolutionType;

  /** Policy used per conflicting field */
  fieldPolicies: Record<string, ResolutionType>;
}

/** Operator-chosen resolution */
export interface ManualResolveRequest {
  conflictId: string;
  resolutionType: ResolutionType;

  /** Explicit record; computed from resolutionType when omitted */
  resolvedSnapshot?: SnapshotInput | null;

  userId: string;
  notes?: string | null;
}

/** Write handed to the canonical entity store */
export interface EntityWrite {
  entityType: EntityType;
  entityId: string;
  record: Snapshot;

  /** Conflict applying the write; replays with the same id are no-ops */
  conflictId: string;
}

/** Canonical entity store (external collaborator) */
export interface EntityStore {
  replaceEntity(write: EntityWrite): Promise<void>;
}

/** Query options for listing conflicts */
export interface ConflictQuery {
  status?: ConflictStatus;
  entityType?: EntityType;
  entityId?: string;
  storeId?: string;
  syncBatchId?: string;

  /** Detected at or after */
  from?: Date;

  /** Detected at or before */
  to?: Date;

  sortBy?: 'detectedAt' | 'resolvedAt' | 'entityType';
  sortDirection?: 'asc' | 'desc';
  offset?: number;
  limit?: number;
}

/** Query filters that apply across statuses (used for status counts) */
export type ConflictFilter = Omit<ConflictQuery, 'status' | 'sortBy' | 'sortDirection' | 'offset' | 'limit'>;

export interface ConflictListResponse {
  conflicts: Conflict[];

  /** Matches before pagination */
  total: number;

  /** Per-status counts under the same filters, status aside */
  pending: number;
  resolved: number;
  ignored: number;
}

export type StatusCounts = Record<ConflictStatus, number>;

export interface ConflictSummary {
  total: number;
  pending: number;
  autoResolved: number;
  manuallyResolved: number;
  ignored: number;
  byEntityType: Record<string, number>;
  recent: Conflict[];
  generatedAt: Date;
}

/** Options for batch sweeps */
export interface BatchOptions {
  /** Stops issuing further per-conflict work once aborted */
  signal?: AbortSignal;
}

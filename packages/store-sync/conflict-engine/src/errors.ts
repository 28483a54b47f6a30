export type ConflictErrorCode =
  | 'NOT_FOUND'       // Conflict or rule does not exist
  | 'DATA_ERROR'      // Snapshot could not be decoded
  | 'APPLY_FAILED'    // Canonical entity store write failed
  | 'BUSY'            // Another writer holds the conflict
  | 'INVALID_REQUEST';

export class ConflictEngineError extends Error {
  public readonly code: ConflictErrorCode;

  constructor(code: ConflictErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConflictEngineError';
    this.code = code;
  }
}

export function isConflictEngineError(err: unknown): err is ConflictEngineError {
  return err instanceof ConflictEngineError;
}

export function notFound(conflictId: string): ConflictEngineError {
  return new ConflictEngineError('NOT_FOUND', `Conflict not found: ${conflictId}`);
}

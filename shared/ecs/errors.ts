// ============================================
// ECS Errors
// ============================================

/**
 * Raised only when an internal storage invariant no longer holds.
 *
 * Expected conditions (stale handles, missing components) are reported
 * through boolean/undefined results and never reach this class. Seeing one
 * of these means the ECS is corrupted and the current state cannot be
 * trusted.
 */
export class EcsInvariantError extends Error {
  constructor(
    message: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'EcsInvariantError';
  }
}

// PostgreSQL SQLSTATE codes the engine reacts to
export const PG_UNIQUE_VIOLATION = '23505';
export const PG_CHECK_VIOLATION = '23514';
export const PG_SERIALIZATION_FAILURE = '40001';
export const PG_DEADLOCK_DETECTED = '40P01';
export const PG_LOCK_NOT_AVAILABLE = '55P03';

const TRANSIENT_CODES = new Set([
     PG_SERIALIZATION_FAILURE,
     PG_DEADLOCK_DETECTED,
     PG_LOCK_NOT_AVAILABLE,
]);

export function getPgErrorCode(err: unknown): string | undefined {
     if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
          return err.code;
     }
     return undefined;
}

export function getPgConstraint(err: unknown): string | undefined {
     if (
          typeof err === 'object' &&
          err !== null &&
          'constraint' in err &&
          typeof err.constraint === 'string'
     ) {
          return err.constraint;
     }
     return undefined;
}

/**
 * Errors after which PostgreSQL has aborted the transaction to resolve a
 * conflict with another transaction; re-running the unit of work may succeed.
 */
export function isTransientPgError(err: unknown): boolean {
     const code = getPgErrorCode(err);
     return code !== undefined && TRANSIENT_CODES.has(code);
}

export function isUniqueViolation(err: unknown, constraint?: string): boolean {
     if (getPgErrorCode(err) !== PG_UNIQUE_VIOLATION) {
          return false;
     }
     return constraint === undefined || getPgConstraint(err) === constraint;
}

export function isCheckViolation(err: unknown, constraint?: string): boolean {
     if (getPgErrorCode(err) !== PG_CHECK_VIOLATION) {
          return false;
     }
     return constraint === undefined || getPgConstraint(err) === constraint;
}

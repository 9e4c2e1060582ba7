import type { LogisticsTableName } from '@mft/shared';

export type ConstraintViolationKind = 'domain' | 'referential' | 'uniqueness';

/** A write rejected by the schema. Never retried, never recovered. */
export abstract class ConstraintViolation extends Error {
  abstract readonly kind: ConstraintViolationKind;
  readonly table: LogisticsTableName | null;
  readonly constraint: string | null;

  constructor(message: string, table: LogisticsTableName | null, constraint: string | null = null) {
    super(message);
    this.name = new.target.name;
    this.table = table;
    this.constraint = constraint;
  }
}

/** Value outside an enumerated set or a column domain, or a failed check constraint. */
export class DomainViolation extends ConstraintViolation {
  readonly kind = 'domain' as const;
}

/** Missing referenced row on insert/update, or delete of a row that is still referenced. */
export class ReferentialIntegrityViolation extends ConstraintViolation {
  readonly kind = 'referential' as const;
}

/** Primary-key collision. */
export class UniquenessViolation extends ConstraintViolation {
  readonly kind = 'uniqueness' as const;
}

/** Update or delete of a key that does not exist. Not a constraint violation. */
export class RowNotFoundError extends Error {
  readonly table: LogisticsTableName;

  constructor(table: LogisticsTableName, key: string) {
    super(`row not found in ${table}: ${key}`);
    this.name = 'RowNotFoundError';
    this.table = table;
  }
}

// SQLSTATE classes raised by PostgreSQL for the constraints of the schema.
const DOMAIN_CODES = new Set([
  '23514', // check_violation
  '23502', // not_null_violation
  '22P02', // invalid_text_representation (enum input)
  '22001', // string_data_right_truncation
  '22003', // numeric_value_out_of_range
  '22007', // invalid_datetime_format
  '22008', // datetime_field_overflow
]);

type PgErrorLike = {
  code: string;
  constraint: string | null;
  message: string;
};

function asPgError(err: unknown): PgErrorLike | null {
  if (!err || typeof err !== 'object') return null;
  if ('code' in err && typeof err.code === 'string') {
    return {
      code: err.code,
      constraint: 'constraint' in err && typeof err.constraint === 'string' ? err.constraint : null,
      message: 'message' in err && typeof err.message === 'string' ? err.message : err.code,
    };
  }
  // Some drizzle releases wrap the driver error.
  if ('cause' in err) return asPgError(err.cause);
  return null;
}

/**
 * Translates a PostgreSQL error to the constraint violation it stands for.
 * Returns null for anything else (connection loss, syntax errors...), which callers rethrow.
 */
export function fromPgError(err: unknown, table: LogisticsTableName | null): ConstraintViolation | null {
  const pgErr = asPgError(err);
  if (!pgErr) return null;
  const { code, constraint, message } = pgErr;
  if (code === '23505') return new UniquenessViolation(message, table, constraint);
  if (code === '23503') return new ReferentialIntegrityViolation(message, table, constraint);
  if (DOMAIN_CODES.has(code)) return new DomainViolation(message, table, constraint);
  return null;
}

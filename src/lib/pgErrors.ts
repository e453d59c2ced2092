export type PgError = {
  code?: string;
  constraint?: string;
  detail?: string;
};

export type PgErrorMapping<T> = {
  unique?: (err: PgError) => T | null;
  foreignKey?: (err: PgError) => T | null;
  check?: (err: PgError) => T | null;
  notNull?: (err: PgError) => T | null;
  lockNotAvailable?: (err: PgError) => T | null;
};

function readString(source: object, key: keyof PgError): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}

export function toPgError(err: unknown): PgError | null {
  if (!err || typeof err !== 'object') {
    return null;
  }
  const code = readString(err, 'code');
  if (!code) {
    return null;
  }
  return { code, constraint: readString(err, 'constraint'), detail: readString(err, 'detail') };
}

/**
 * Maps Postgres errors by SQLSTATE. There are no default results: callers
 * supply one per class they care about, anything else maps to null.
 */
export function mapPgError<T>(err: unknown, mapping: PgErrorMapping<T>): T | null {
  const pgErr = toPgError(err);
  if (!pgErr) {
    return null;
  }
  switch (pgErr.code) {
    case '23505':
      return mapping.unique?.(pgErr) ?? null;
    case '23503':
      return mapping.foreignKey?.(pgErr) ?? null;
    case '23514':
      return mapping.check?.(pgErr) ?? null;
    case '23502':
      return mapping.notNull?.(pgErr) ?? null;
    case '55P03':
      return mapping.lockNotAvailable?.(pgErr) ?? null;
    default:
      return null;
  }
}

/**
 * Every failure the tracker surfaces is a FettersError tagged with one of these kinds.
 */
export const ERROR_KINDS = [
  'ApplicationDirUnavailable',
  'StoreResult',
  'IO',
  'Prompt',
  'Migration',
  'NoJobsAvailable',
  'NoCurrentSprint',
  'SheetName',
  'SprintNameConflict',
  'StoreConnection',
  'ConfigDeserialize',
  'ConfigSerialize',
  'Unknown',
  'Xlsx',
] as const;

export type FettersErrorKind = (typeof ERROR_KINDS)[number];

/** Kinds that describe a normal user-facing condition rather than an internal failure. */
const USER_FACING_KINDS: ReadonlySet<FettersErrorKind> = new Set([
  'NoJobsAvailable',
  'NoCurrentSprint',
  'SprintNameConflict',
]);

function messageOf(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}

export class FettersError extends Error {
  constructor(
    public readonly kind: FettersErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'FettersError';
  }

  get userFacing(): boolean {
    return USER_FACING_KINDS.has(this.kind);
  }

  static applicationDirUnavailable(): FettersError {
    return new FettersError(
      'ApplicationDirUnavailable',
      'Could not retrieve system application directories!',
    );
  }

  static storeResult(cause: unknown): FettersError {
    return new FettersError('StoreResult', `Database query error: ${messageOf(cause)}`, { cause });
  }

  static io(cause: unknown): FettersError {
    return new FettersError('IO', `IO error: ${messageOf(cause)}`, { cause });
  }

  static prompt(cause: unknown): FettersError {
    return new FettersError('Prompt', `Prompt error: ${messageOf(cause)}`, { cause });
  }

  static migration(cause: unknown): FettersError {
    return new FettersError('Migration', `Failed to run migrations! ${messageOf(cause)}`, { cause });
  }

  static noJobsAvailable(sprintName: string): FettersError {
    return new FettersError(
      'NoJobsAvailable',
      `No job applications tracked for the current sprint [${sprintName}]`,
    );
  }

  static noCurrentSprint(): FettersError {
    return new FettersError(
      'NoCurrentSprint',
      'No current sprint is set. Run `fetters sprint new` or `fetters sprint set` first.',
    );
  }

  static sheetName(message: string): FettersError {
    return new FettersError('SheetName', `Set sheet name error: ${message}`);
  }

  static sprintNameConflict(name: string): FettersError {
    return new FettersError(
      'SprintNameConflict',
      `There is already a sprint with name ${name}. Try renaming the sprint.`,
    );
  }

  static storeConnection(cause: unknown): FettersError {
    return new FettersError(
      'StoreConnection',
      `Failed to connect to SQLite database: ${messageOf(cause)}`,
      { cause },
    );
  }

  static configDeserialize(cause: unknown): FettersError {
    return new FettersError('ConfigDeserialize', `TOML deserialization error: ${messageOf(cause)}`, {
      cause,
    });
  }

  static configSerialize(cause: unknown): FettersError {
    return new FettersError('ConfigSerialize', `TOML serialization error: ${messageOf(cause)}`, {
      cause,
    });
  }

  static unknown(message: string, cause?: unknown): FettersError {
    return new FettersError('Unknown', message, { cause });
  }

  static xlsx(cause: unknown): FettersError {
    return new FettersError('Xlsx', `XLSX write error: ${messageOf(cause)}`, { cause });
  }
}

/**
 * True for errors raised by better-sqlite3, which carry a `SQLITE_*` code.
 */
export function isSqliteError(err: unknown): err is Error & { code: string } {
  return (
    err instanceof Error &&
    'code' in err &&
    typeof err.code === 'string' &&
    err.code.startsWith('SQLITE_')
  );
}

export function isUniqueViolation(err: unknown): boolean {
  return isSqliteError(err) && err.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

/**
 * Normalize anything thrown inside a command into a FettersError.
 */
export function toFettersError(err: unknown): FettersError {
  if (err instanceof FettersError) return err;
  if (isSqliteError(err)) return FettersError.storeResult(err);
  return FettersError.unknown(messageOf(err), err);
}

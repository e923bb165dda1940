export type ErrorCode =
  | 'VALIDATION'
  | 'NOT_FOUND'
  | 'CYCLE_DETECTED'
  | 'HAS_CHILDREN'
  | 'ALREADY_ACTIVE'
  | 'NO_ACTIVE_SESSION'
  | 'ALREADY_RUNNING'
  | 'NOT_RUNNING'
  | 'BUSY'
  | 'CORRUPT'
  | 'UNSUPPORTED_SCHEMA';

export type EntityKind = 'issue' | 'parent' | 'blocker' | 'milestone' | 'session';

export type Relation = 'dependency' | 'hierarchy';

/**
 * Base class for every error the core reports to its callers.
 * `retryable` is only true for lock contention.
 */
export abstract class WaypostError extends Error {
  abstract readonly code: ErrorCode;
  readonly retryable: boolean = false;

  toJSON(): Record<string, unknown> {
    return { code: this.code, message: this.message, retryable: this.retryable };
  }
}

export class ValidationError extends WaypostError {
  readonly code = 'VALIDATION';

  constructor(
    public field: string,
    public constraint: string,
    message?: string
  ) {
    super(message ?? `Invalid ${field}: ${constraint}`);
    this.name = 'ValidationError';
  }
}

export class NotFoundError extends WaypostError {
  readonly code = 'NOT_FOUND';

  constructor(
    public entity: EntityKind,
    public id: number
  ) {
    super(`${capitalize(entity)} #${id} not found`);
    this.name = 'NotFoundError';
  }
}

export class CycleDetectedError extends WaypostError {
  readonly code = 'CYCLE_DETECTED';

  constructor(
    public relation: Relation,
    public issueId: number,
    public otherId: number
  ) {
    super(
      relation === 'dependency'
        ? `Blocking #${issueId} on #${otherId} would create a dependency cycle`
        : `Moving #${issueId} under #${otherId} would create a hierarchy cycle`
    );
    this.name = 'CycleDetectedError';
  }
}

export class HasChildrenError extends WaypostError {
  readonly code = 'HAS_CHILDREN';

  constructor(
    public issueId: number,
    public childIds: number[]
  ) {
    super(
      `Issue #${issueId} has ${childIds.length} subissue(s) (${childIds.map((id) => `#${id}`).join(', ')}); delete with cascade to remove them`
    );
    this.name = 'HasChildrenError';
  }
}

export class AlreadyActiveError extends WaypostError {
  readonly code = 'ALREADY_ACTIVE';

  constructor(public sessionId: number) {
    super(`Session #${sessionId} is already active; end it before starting a new one`);
    this.name = 'AlreadyActiveError';
  }
}

export class NoActiveSessionError extends WaypostError {
  readonly code = 'NO_ACTIVE_SESSION';

  constructor() {
    super('No active session; start one first');
    this.name = 'NoActiveSessionError';
  }
}

export class AlreadyRunningError extends WaypostError {
  readonly code = 'ALREADY_RUNNING';

  constructor(public pid: number) {
    super(`Daemon already running (PID: ${pid})`);
    this.name = 'AlreadyRunningError';
  }
}

export class NotRunningError extends WaypostError {
  readonly code = 'NOT_RUNNING';

  constructor() {
    super('Daemon is not running');
    this.name = 'NotRunningError';
  }
}

export class BusyError extends WaypostError {
  readonly code = 'BUSY';
  override readonly retryable = true;

  constructor(
    public operation: string,
    public attempts: number
  ) {
    super(`Store is busy (${operation} gave up after ${attempts} attempt(s)); retry shortly`);
    this.name = 'BusyError';
  }
}

export class CorruptStoreError extends WaypostError {
  readonly code = 'CORRUPT';

  constructor(
    public path: string,
    public problems: string[]
  ) {
    super(`Store at ${path} failed its integrity check; run "waypost recover" to repair it`);
    this.name = 'CorruptStoreError';
  }
}

export class UnsupportedSchemaError extends WaypostError {
  readonly code = 'UNSUPPORTED_SCHEMA';

  constructor(
    public found: number,
    public supported: number
  ) {
    super(`Store schema version ${found} is newer than this build supports (${supported})`);
    this.name = 'UnsupportedSchemaError';
  }
}

export function isWaypostError(error: unknown): error is WaypostError {
  return error instanceof WaypostError;
}

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

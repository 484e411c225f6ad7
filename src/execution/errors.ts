export type RobotRunErrorCode =
  | 'CONFIG_ERROR'
  | 'UNREACHABLE'
  | 'UPLOAD_FAILED'
  | 'RUN_CREATE_FAILED'
  | 'ACTION_FAILED'
  | 'ROBOT_API_ERROR'
  | 'TRANSPORT_ERROR'
  | 'RUN_FAILED'
  | 'RUN_TIMEOUT'
  | 'SMOKE_TEST_FAILED';

/**
 * Base class for every failure the runner reports.
 *
 * `details()` returns the structured fields that are logged next to the
 * message when the CLI exits.
 */
export class RobotRunError extends Error {
  readonly code: RobotRunErrorCode;

  constructor(code: RobotRunErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }

  details(): Record<string, unknown> {
    return {};
  }
}

export class ConfigError extends RobotRunError {
  constructor(message: string) {
    super('CONFIG_ERROR', message);
  }
}

export class UnreachableError extends RobotRunError {
  readonly candidates: readonly string[];

  constructor(message: string, candidates: readonly string[]) {
    super('UNREACHABLE', message);
    this.candidates = candidates;
  }

  override details(): Record<string, unknown> {
    return { candidates: this.candidates };
  }
}

export class UploadError extends RobotRunError {
  readonly responseBody: string;

  constructor(message: string, responseBody: string) {
    super('UPLOAD_FAILED', message);
    this.responseBody = responseBody;
  }

  override details(): Record<string, unknown> {
    return { responseBody: this.responseBody };
  }
}

export class RunCreateError extends RobotRunError {
  readonly responseBody: string;

  constructor(message: string, responseBody: string) {
    super('RUN_CREATE_FAILED', message);
    this.responseBody = responseBody;
  }

  override details(): Record<string, unknown> {
    return { responseBody: this.responseBody };
  }
}

export class ActionError extends RobotRunError {
  readonly actionType: string;
  readonly responseBody: string;

  constructor(message: string, actionType: string, responseBody: string) {
    super('ACTION_FAILED', message);
    this.actionType = actionType;
    this.responseBody = responseBody;
  }

  override details(): Record<string, unknown> {
    return { actionType: this.actionType, responseBody: this.responseBody };
  }
}

export class RobotApiError extends RobotRunError {
  readonly httpStatus: number;
  readonly responseBody: string;

  constructor(message: string, httpStatus: number, responseBody: string) {
    super('ROBOT_API_ERROR', message);
    this.httpStatus = httpStatus;
    this.responseBody = responseBody;
  }

  override details(): Record<string, unknown> {
    return { httpStatus: this.httpStatus, responseBody: this.responseBody };
  }
}

/**
 * A run API request that got no response: connection failure, or no answer
 * within the request time limit.
 */
export class TransportError extends RobotRunError {
  readonly method: string;
  readonly path: string;
  readonly timedOut: boolean;

  constructor(method: string, path: string, cause: unknown, timeoutMs: number) {
    const timedOut = cause instanceof Error && cause.name === 'TimeoutError';
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      'TRANSPORT_ERROR',
      timedOut ? `${method} ${path} timed out after ${timeoutMs}ms` : `${method} ${path} failed: ${reason}`,
    );
    this.method = method;
    this.path = path;
    this.timedOut = timedOut;
  }

  override details(): Record<string, unknown> {
    return { method: this.method, path: this.path, timedOut: this.timedOut };
  }
}

export class RunFailedError extends RobotRunError {
  readonly runId: string;
  readonly status: string;
  readonly errors: unknown;

  constructor(runId: string, status: string, errors: unknown) {
    super('RUN_FAILED', `Run ended with status=${status}, run_id=${runId}`);
    this.runId = runId;
    this.status = status;
    this.errors = errors;
  }

  override details(): Record<string, unknown> {
    return { runId: this.runId, status: this.status, errors: this.errors ?? null };
  }
}

export class TimeoutError extends RobotRunError {
  readonly runId: string;
  readonly timeoutSeconds: number;

  constructor(runId: string, timeoutSeconds: number) {
    super('RUN_TIMEOUT', `Timed out after ${timeoutSeconds}s waiting for run ${runId}`);
    this.runId = runId;
    this.timeoutSeconds = timeoutSeconds;
  }

  override details(): Record<string, unknown> {
    return { runId: this.runId, timeoutSeconds: this.timeoutSeconds };
  }
}

export class SmokeTestError extends RobotRunError {
  readonly exitCode: number;

  constructor(message: string, exitCode: number) {
    super('SMOKE_TEST_FAILED', message);
    this.exitCode = exitCode;
  }

  override details(): Record<string, unknown> {
    return { exitCode: this.exitCode };
  }
}

/**
 * Base error for everything the sidecar reports to a caller or records on a job.
 * `code` is stable and safe to match on; `statusCode` is the HTTP status used
 * when the error reaches a synchronous endpoint.
 */
export class SidecarError extends Error {
  public readonly code: string;
  public readonly statusCode: number;
  public readonly details?: unknown;

  constructor(code: string, message: string, statusCode: number = 500, details?: unknown) {
    super(message);
    this.name = 'SidecarError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;

    Error.captureStackTrace?.(this, new.target);
  }
}

export class NotFoundError extends SidecarError {
  constructor(message: string) {
    super('not_found', message, 404);
    this.name = 'NotFoundError';
  }
}

export class UnsupportedModelError extends SidecarError {
  public readonly modelName: string;

  constructor(modelName: string) {
    super('model_not_supported', `Model not supported: ${modelName}`, 404);
    this.name = 'UnsupportedModelError';
    this.modelName = modelName;
  }
}

export class ValidationError extends SidecarError {
  constructor(message: string, details?: unknown) {
    super('bad_request', message, 400, details);
    this.name = 'ValidationError';
  }
}

/**
 * The external separation engine exited abnormally (non-zero code or signal)
 */
export class EngineFailureError extends SidecarError {
  public readonly exitCode: number | null;
  public readonly signal: NodeJS.Signals | null;
  public readonly stderrTail: string;

  constructor(exitCode: number | null, signal: NodeJS.Signals | null, stderrTail: string = '') {
    const reason = signal ? `signal ${signal}` : `exit code ${exitCode}`;
    super('engine_failure', `Separation engine terminated with ${reason}`, 500, { exitCode, signal });
    this.name = 'EngineFailureError';
    this.exitCode = exitCode;
    this.signal = signal;
    this.stderrTail = stderrTail;
  }
}

export class EngineTimeoutError extends SidecarError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('engine_timeout', `Separation engine did not finish within ${timeoutMs} ms and was stopped`, 500);
    this.name = 'EngineTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export const ENGINE_CRASH_HINT =
  'Separation engine crashed. Check the server log: likely missing FFmpeg/codec support or an unsupported or corrupt audio file.';

/**
 * Text recorded on a failed job.
 */
export function describeJobFailure(error: unknown): string {
  if (error instanceof EngineFailureError) {
    return ENGINE_CRASH_HINT;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export interface ErrorBody {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export function toErrorBody(error: SidecarError): ErrorBody {
  const body: ErrorBody = { error: { code: error.code, message: error.message } };
  if (error.details !== undefined) {
    body.error.details = error.details;
  }
  return body;
}

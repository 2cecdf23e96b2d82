/**
 * Supervisor error taxonomy.
 *
 * These travel inside `Result` values; the registry never throws them.
 * `code` is the stable discriminant transports should switch on.
 */

export type SupervisorErrorCode =
  | "NOT_FOUND"
  | "ALREADY_EXISTS"
  | "ALREADY_RUNNING"
  | "NOT_RUNNING"
  | "KILL_FAILED"
  | "TRUNCATED"
  | "STILL_RUNNING"
  | "STDIN_FAILED"
  | "INVALID_SPEC"
  | "TIMEOUT"
  | "SHUTDOWN";

export abstract class SupervisorError extends Error {
  abstract readonly code: SupervisorErrorCode;

  constructor(
    message: string,
    readonly processId?: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class NotFoundError extends SupervisorError {
  readonly code = "NOT_FOUND";

  constructor(processId: string) {
    super(`Process not found: ${processId}`, processId);
  }
}

export class AlreadyExistsError extends SupervisorError {
  readonly code = "ALREADY_EXISTS";

  constructor(processId: string) {
    super(`Process already exists: ${processId}`, processId);
  }
}

export class AlreadyRunningError extends SupervisorError {
  readonly code = "ALREADY_RUNNING";

  constructor(processId: string) {
    super(`Process already running: ${processId}`, processId);
  }
}

export class NotRunningError extends SupervisorError {
  readonly code = "NOT_RUNNING";

  constructor(processId: string, status: string) {
    super(`Process not running: ${processId} (${status})`, processId);
  }
}

export class KillError extends SupervisorError {
  readonly code = "KILL_FAILED";

  constructor(processId: string, detail: string, cause?: unknown) {
    super(`Failed to kill process ${processId}: ${detail}`, processId, { cause });
  }
}

export class TruncatedError extends SupervisorError {
  readonly code = "TRUNCATED";

  constructor(
    processId: string,
    readonly requestedSequence: number,
    readonly floorSequence: number
  ) {
    super(
      `Output truncated for ${processId}: requested after ${requestedSequence}, history starts after ${floorSequence}`,
      processId
    );
  }
}

export class StillRunningError extends SupervisorError {
  readonly code = "STILL_RUNNING";

  constructor(processId: string) {
    super(`Process is still running: ${processId}`, processId);
  }
}

export class StdinError extends SupervisorError {
  readonly code = "STDIN_FAILED";

  constructor(processId: string, cause: Error) {
    super(`Failed to write stdin of ${processId}: ${cause.message}`, processId, { cause });
  }
}

export class InvalidSpecError extends SupervisorError {
  readonly code = "INVALID_SPEC";
}

export class TimeoutError extends SupervisorError {
  readonly code = "TIMEOUT";
}

export class ShutdownError extends SupervisorError {
  readonly code = "SHUTDOWN";

  constructor() {
    super("Supervisor is shut down");
  }
}

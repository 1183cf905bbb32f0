/**
 * Error types raised inside stages and adapters.
 *
 * Stages convert these into `StageFailure` values; nothing here escapes the
 * pipeline as an exception.
 */

/**
 * Missing or malformed caller input (e.g. no storage location at intake).
 */
export class InputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InputError";
  }
}

/**
 * An external capability call failed.
 */
export class CapabilityError extends Error {
  readonly capability: string;

  constructor(capability: string, message: string, options?: { cause?: unknown }) {
    super(`${capability}: ${message}`, options);
    this.name = "CapabilityError";
    this.capability = capability;
  }
}

/**
 * An external call did not settle within its deadline.
 */
export class TimeoutError extends CapabilityError {
  readonly timeoutMs: number;

  constructor(capability: string, timeoutMs: number) {
    super(capability, `timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A stage tried to set a context field an earlier stage already owns.
 */
export class ContextConflictError extends Error {
  readonly fields: string[];

  constructor(fields: string[]) {
    super(`Context fields already set: ${fields.join(", ")}`);
    this.name = "ContextConflictError";
    this.fields = fields;
  }
}

/**
 * Best-effort message for an unknown thrown value.
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}

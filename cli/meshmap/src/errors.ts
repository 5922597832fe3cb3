/**
 * Error hierarchy for the collection pipeline.
 *
 * Every error carries a string `kind` so status payloads can report what went
 * wrong without matching on messages.
 */

export type ErrorKind =
  | "connection_failed"
  | "auth_failed"
  | "connection_closed"
  | "success_floor"
  | "command_failed"
  | "timeout"
  | "invalid_input"
  | "internal";

export class MeshmapError extends Error {
  readonly kind: ErrorKind;
  readonly context?: Record<string, unknown>;

  constructor(message: string, kind: ErrorKind, context?: Record<string, unknown>) {
    super(message);
    this.name = "MeshmapError";
    this.kind = kind;
    this.context = context;
  }
}

/** The controller could not be reached, refused our token, or went away. */
export class ConnectionError extends MeshmapError {
  constructor(message: string, kind: "connection_failed" | "auth_failed" | "connection_closed" = "connection_failed") {
    super(message, kind);
    this.name = "ConnectionError";
  }
}

/** Too few nodes answered for the cycle to be trusted. */
export class CollectionError extends MeshmapError {
  constructor(message: string, context: { listed: number; fetched: number; errors: number }) {
    super(message, "success_floor", context);
    this.name = "CollectionError";
  }
}

export class CommandError extends MeshmapError {
  readonly command: string;

  constructor(command: string, message: string, kind: "command_failed" | "timeout" = "command_failed") {
    super(`${command}: ${message}`, kind, { command });
    this.name = "CommandError";
    this.command = command;
  }
}

export class ValidationError extends MeshmapError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length ? `${message}: ${issues.join("; ")}` : message, "invalid_input", { issues });
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export function describeError(err: unknown): { message: string; kind: ErrorKind } {
  if (err instanceof MeshmapError) return { message: err.message, kind: err.kind };
  if (err instanceof Error) return { message: err.message, kind: "internal" };
  return { message: String(err), kind: "internal" };
}

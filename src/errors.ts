/**
 * Error taxonomy for the buffer engine.
 *
 * Every error here is recoverable: the driving loop reports it and carries on.
 * History operations never throw; "nothing to undo" is `undefined`.
 */

import type { ValueError } from "@sinclair/typebox/errors";

export type EngineErrorKind = "OutOfBounds" | "InvalidOperation" | "Io" | "Config";

export abstract class EngineError extends Error {
  abstract readonly kind: EngineErrorKind;
}

/** An offset, index or line outside its valid domain. Re-clamp and retry, or ignore. */
export class OutOfBoundsError extends EngineError {
  override readonly kind = "OutOfBounds";
  readonly value: number;
  readonly limit: number;

  constructor(what: string, value: number, limit: number) {
    super(`${what} ${value} is out of bounds (limit ${limit})`);
    this.name = "OutOfBoundsError";
    this.value = value;
    this.limit = limit;
  }
}

/** A structurally disallowed action given the current state. */
export class InvalidOperationError extends EngineError {
  override readonly kind = "InvalidOperation";

  constructor(message: string) {
    super(message);
    this.name = "InvalidOperationError";
  }
}

export type FileServiceFailure =
  | "NotFound"
  | "PermissionDenied"
  | "TooLarge"
  | "InvalidName"
  | "Failed";

/** Raised by file services. Sessions pass it through untouched. */
export class FileServiceError extends EngineError {
  override readonly kind = "Io";
  readonly reason: FileServiceFailure;
  readonly fileName: string;

  constructor(reason: FileServiceFailure, fileName: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "FileServiceError";
    this.reason = reason;
    this.fileName = fileName;
  }
}

export class ConfigError extends EngineError {
  override readonly kind = "Config";
  readonly issues: readonly ValueError[];

  constructor(issues: Iterable<ValueError>, message = "Invalid engine configuration") {
    const normalized = Array.from(issues);
    const summary = normalized
      .map((issue) => `${issue.path === "" ? "config" : issue.path}: ${issue.message}`)
      .join("\n");
    super(summary ? `${message}\n${summary}` : message);
    this.name = "ConfigError";
    this.issues = normalized;
  }
}

export function isEngineError(value: unknown, kind?: EngineErrorKind): value is EngineError {
  if (!(value instanceof EngineError)) return false;
  return kind === undefined || value.kind === kind;
}

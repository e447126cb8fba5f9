/**
 * Error hierarchy for survey derivation, reconstruction and sessions.
 */

import type { ResponsePath } from "./responsePath.js";

/** Base error class for every error raised by this package */
export class SurveyError extends Error {
  public readonly code: string;
  public readonly context: Record<string, unknown>;

  constructor(message: string, code: string, context: Record<string, unknown> = {}) {
    super(message);
    this.name = "SurveyError";
    this.code = code;
    this.context = context;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      stack: this.stack,
    };
  }
}

/** A shape declaration is malformed. Raised while deriving a schema. */
export class AuthoringError extends SurveyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "AUTHORING_ERROR", context);
    this.name = "AuthoringError";
  }
}

/** An answer store could not be turned back into a value */
export class ReconstructionError extends SurveyError {
  public readonly path: ResponsePath;

  constructor(
    message: string,
    path: ResponsePath,
    code = "RECONSTRUCTION_ERROR",
    context: Record<string, unknown> = {},
  ) {
    super(message, code, { path: path.toString(), ...context });
    this.name = "ReconstructionError";
    this.path = path;
  }
}

export class MissingAnswerError extends ReconstructionError {
  constructor(path: ResponsePath) {
    super(`Missing answer at '${path.toString()}'`, path, "MISSING_ANSWER");
    this.name = "MissingAnswerError";
  }
}

export class AnswerTypeMismatchError extends ReconstructionError {
  public readonly expected: string;
  public readonly actual: string;

  constructor(path: ResponsePath, expected: string, actual: string) {
    super(
      `Type mismatch at '${path.toString()}': expected ${expected}, got ${actual}`,
      path,
      "ANSWER_TYPE_MISMATCH",
      { expected, actual },
    );
    this.name = "AnswerTypeMismatchError";
    this.expected = expected;
    this.actual = actual;
  }
}

export class UnknownVariantError extends ReconstructionError {
  public readonly index: number;
  public readonly variantCount: number;

  constructor(path: ResponsePath, index: number, variantCount: number) {
    super(
      `Unknown variant ${index} at '${path.toString()}' (${variantCount} variants)`,
      path,
      "UNKNOWN_VARIANT",
      { index, variantCount },
    );
    this.name = "UnknownVariantError";
    this.index = index;
    this.variantCount = variantCount;
  }
}

/** Collected answers did not pass validation */
export class ValidationFailedError extends SurveyError {
  public readonly messages: Record<string, string>;

  constructor(messages: Record<string, string>) {
    const summary = Object.entries(messages)
      .map(([path, message]) => `${path || "<root>"}: ${message}`)
      .join("; ");
    super(`Validation failed: ${summary}`, "VALIDATION_FAILED", { messages });
    this.name = "ValidationFailedError";
    this.messages = messages;
  }
}

/** A value cannot be represented as a response value */
export class InvalidValueError extends SurveyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "INVALID_VALUE", context);
    this.name = "InvalidValueError";
  }
}

export class SessionError extends SurveyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "SESSION_ERROR", context);
    this.name = "SessionError";
  }
}

export class SerializationError extends SurveyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "SERIALIZATION_ERROR", context);
    this.name = "SerializationError";
  }
}

export class ConfigError extends SurveyError {
  constructor(message: string, context: Record<string, unknown> = {}) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Custom error classes for the property registry and its call boundary
 */

export class PropertyRegistryError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
  ) {
    super(message);
    this.name = "PropertyRegistryError";
  }
}

export class ValidationError extends PropertyRegistryError {
  constructor(message: string) {
    super(message, "VALIDATION_ERROR");
    this.name = "ValidationError";
  }
}

export class LockError extends PropertyRegistryError {
  constructor(message: string) {
    super(message, "LOCK_ERROR");
    this.name = "LockError";
  }
}

export class UnknownMethodError extends PropertyRegistryError {
  constructor(public readonly method: string) {
    super(`Unknown method: ${method}`, "UNKNOWN_METHOD");
    this.name = "UnknownMethodError";
  }
}

// Error codes for easy reference
export const ErrorCodes = {
  VALIDATION_ERROR: "VALIDATION_ERROR",
  LOCK_ERROR: "LOCK_ERROR",
  UNKNOWN_METHOD: "UNKNOWN_METHOD",
  UNKNOWN_ERROR: "UNKNOWN_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

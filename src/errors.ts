export class VaultError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "VaultError";
  }
}

export class ValidationError extends VaultError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

export class LockedError extends VaultError {
  constructor(message = "Storage is locked") {
    super(message);
    this.name = "LockedError";
  }
}

export class InvalidPasswordError extends VaultError {
  constructor(message = "Invalid password") {
    super(message);
    this.name = "InvalidPasswordError";
  }
}

export class CorruptDataError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CorruptDataError";
  }
}

export class KeyNotFoundError extends VaultError {
  constructor(public readonly key: string) {
    super(`Key "${key}" not found`);
    this.name = "KeyNotFoundError";
  }
}

export class NoKeyError extends VaultError {
  constructor(message = "No password has been set for this storage") {
    super(message);
    this.name = "NoKeyError";
  }
}

/** Underlying medium failure on save/load (the IOError kind). */
export class PersistenceError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export class CryptoError extends VaultError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CryptoError";
  }
}

/**
 * Tag verification failed. Raised by the cipher layer only; the storage
 * translates it into {@link InvalidPasswordError} or {@link CorruptDataError}.
 */
export class AuthenticationError extends VaultError {
  constructor(message = "Invalid key or data.") {
    super(message);
    this.name = "AuthenticationError";
  }
}

// Errors from node: built-ins can come from another realm (Jest runs code in a
// vm context), so these read fields instead of checking `instanceof Error`.

export function errorMessage(e: unknown): string {
  if (typeof e === "object" && e !== null && "message" in e && typeof e.message === "string") return e.message;
  return String(e);
}

/** The `code` of a system error such as `ENOENT`, if there is one. */
export function errnoCode(e: unknown): string | undefined {
  return typeof e === "object" && e !== null && "code" in e && typeof e.code === "string" ? e.code : undefined;
}

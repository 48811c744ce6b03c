import { ValidationError } from "../errors";

export function assertPassword(password: unknown): asserts password is string {
  if (typeof password !== "string" || password.trim().length === 0) {
    throw new ValidationError("Password must be a non-empty string");
  }
}

export function assertKeyName(key: unknown): asserts key is string {
  if (typeof key !== "string" || key.length === 0) {
    throw new ValidationError("Key must be a non-empty string");
  }
}

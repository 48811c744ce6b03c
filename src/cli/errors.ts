import {
  CorruptDataError,
  InvalidPasswordError,
  KeyNotFoundError,
  LockedError,
  NoKeyError,
  PersistenceError,
  ValidationError
} from "../errors";

export const EXIT_CODE_SUCCESS = 0;
export const EXIT_CODE_FAILURE = 1;
export const EXIT_CODE_USAGE = 2;
export const EXIT_CODE_INVALID_PASSWORD = 3;
export const EXIT_CODE_LOCKED = 4;
export const EXIT_CODE_KEY_NOT_FOUND = 5;
export const EXIT_CODE_NO_KEY = 6;
export const EXIT_CODE_CORRUPT = 7;
export const EXIT_CODE_PERSISTENCE = 8;

export function toExitCode(error: unknown): number {
  if (error instanceof ValidationError) return EXIT_CODE_USAGE;
  if (error instanceof InvalidPasswordError) return EXIT_CODE_INVALID_PASSWORD;
  if (error instanceof LockedError) return EXIT_CODE_LOCKED;
  if (error instanceof KeyNotFoundError) return EXIT_CODE_KEY_NOT_FOUND;
  if (error instanceof NoKeyError) return EXIT_CODE_NO_KEY;
  if (error instanceof CorruptDataError) return EXIT_CODE_CORRUPT;
  if (error instanceof PersistenceError) return EXIT_CODE_PERSISTENCE;
  return EXIT_CODE_FAILURE;
}

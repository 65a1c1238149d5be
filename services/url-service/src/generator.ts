import { customAlphabet } from "nanoid";

export const SHORT_ID_ALPHABET = "0123456789abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ";
export const DEFAULT_SHORT_ID_LENGTH = 8;

export interface ShortIdGenerator {
  generate(): string;
}

/**
 * Random fixed-length ids over {@link SHORT_ID_ALPHABET}.
 * Uniqueness is not checked here; stores reject an id that is already taken.
 */
export function createShortIdGenerator(length = DEFAULT_SHORT_ID_LENGTH): ShortIdGenerator {
  if (!Number.isInteger(length) || length <= 0) {
    throw new Error(`Invalid short id length: ${length}`);
  }
  const next = customAlphabet(SHORT_ID_ALPHABET, length);
  return { generate: () => next() };
}

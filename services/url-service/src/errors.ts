import type { StoreKind } from "./storage.js";

/** A backend failure seen by the service, wrapped with the id or URL involved. */
export class StorageError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StorageError";
  }
}

export class ShortIdGenerationError extends Error {
  constructor() {
    super("short id generator returned an empty id; check SHORT_ID_LENGTH");
    this.name = "ShortIdGenerationError";
  }
}

export class ShortIdConflictError extends Error {
  constructor(readonly shortId: string) {
    super(`short id already exists: ${shortId}`);
    this.name = "ShortIdConflictError";
  }
}

/** Raised when an insert would give a URL a second live short id. */
export class OriginalUrlConflictError extends Error {
  constructor(readonly originalUrl: string) {
    super(`url already has a live short id: ${originalUrl}`);
    this.name = "OriginalUrlConflictError";
  }
}

export class PingNotSupportedError extends Error {
  constructor(readonly storeKind: StoreKind) {
    super(`${storeKind} storage does not support a database connection check`);
    this.name = "PingNotSupportedError";
  }
}

export function isConflict(err: unknown): err is ShortIdConflictError | OriginalUrlConflictError {
  return err instanceof ShortIdConflictError || err instanceof OriginalUrlConflictError;
}

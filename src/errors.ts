/**
 * Base class for every error the digest run raises on purpose.
 */
export class DigestError extends Error {
  constructor(message: string, options?: { readonly cause?: unknown }) {
    super(message, options);
    this.name = "DigestError";
  }
}

/**
 * Missing or invalid configuration. Raised before any fetch happens.
 */
export class ConfigurationError extends DigestError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A persisted ledger exists but does not have the expected shape.
 * Never recovered from automatically: resetting would re-announce everything.
 */
export class LedgerCorruptionError extends DigestError {
  readonly location: string;

  constructor(location: string, detail: string, cause?: unknown) {
    super(`ledger at ${location} is corrupt: ${detail}`, { cause });
    this.name = "LedgerCorruptionError";
    this.location = location;
  }
}

export type Collaborator = "feed" | "transport";

/**
 * The feed source or the transport sink failed. Fatal to the run; the ledger
 * is not committed.
 */
export class CollaboratorError extends DigestError {
  readonly collaborator: Collaborator;

  constructor(collaborator: Collaborator, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "CollaboratorError";
    this.collaborator = collaborator;
  }
}

/**
 * A single feed entry is unusable (no id or no publication time).
 * The entry is dropped and the run continues.
 */
export class ItemValidationError extends DigestError {
  readonly rawId: string;

  constructor(rawId: string, reason: string) {
    super(`invalid feed entry ${rawId || "(no id)"}: ${reason}`);
    this.name = "ItemValidationError";
    this.rawId = rawId;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

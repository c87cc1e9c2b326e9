export class MissingTokensError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ConfigError extends MissingTokensError {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
  }
}

/** The missing-token list could not be fetched; fatal for the run. */
export class SourceQueryError extends MissingTokensError {
  constructor(public readonly queryName: string, reason: string, options?: { cause?: unknown }) {
    super(`${queryName}: ${reason}`, options);
  }
}

/** Metadata lookup failed for a single token; the token is skipped. */
export class ResolutionError extends MissingTokensError {
  constructor(public readonly address: string, options?: { cause?: unknown }) {
    super(`Could not resolve token details for ${address}`, options);
  }
}

export class UnsupportedNetworkError extends MissingTokensError {
  constructor(public readonly network: string) {
    super(`Incompatible Network ${network}`);
  }
}

export class PersistenceError extends MissingTokensError {
  constructor(public readonly path: string, options?: { cause?: unknown }) {
    super(`Failed to write ${path}`, options);
  }
}

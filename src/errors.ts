export type ScanErrorCode =
  | "EXTRACTION_FAILED"
  | "TRANSPORT_FAILED"
  | "SCHEMA_MISMATCH"
  | "INVALID_CONFIGURATION";

/**
 * Base class for every failure the scan pipeline knows how to recover from
 * (or, for configuration, how to report).
 */
export class ScanError extends Error {
  readonly code: ScanErrorCode;

  constructor(code: ScanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A function body could not be parsed; only that function is skipped. */
export class ExtractionError extends ScanError {
  constructor(
    readonly functionName: string,
    message: string,
  ) {
    super("EXTRACTION_FAILED", message);
  }
}

/** The judgment call itself failed (network, auth, rate limit, timeout). */
export class TransportError extends ScanError {
  constructor(
    message: string,
    readonly retryable: boolean,
    cause?: unknown,
  ) {
    super("TRANSPORT_FAILED", message, { cause });
  }
}

/** The judgment response did not match the expected verdict shape. */
export class SchemaError extends ScanError {
  constructor(
    message: string,
    readonly responseText: string,
  ) {
    super("SCHEMA_MISMATCH", message);
  }
}

/** Fatal: missing credential, bad option or unreadable input. Aborts the run. */
export class ConfigurationError extends ScanError {
  constructor(message: string) {
    super("INVALID_CONFIGURATION", message);
  }
}

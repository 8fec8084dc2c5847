import type { RecordSource } from "./models/raw.js";

export class SyncError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SyncError";
  }
}

export class ConfigError extends SyncError {
  constructor(
    message: string,
    public readonly variable: string,
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export class CredentialError extends SyncError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CredentialError";
  }
}

export class ApiError extends SyncError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly status: number | null,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ApiError";
  }
}

/** A raw record whose fields cannot be turned into a transaction. */
export class MalformedRecordError extends SyncError {
  constructor(
    public readonly source: RecordSource,
    public readonly reference: string,
    public readonly reason: string,
  ) {
    super(`Malformed ${source} record ${reference}: ${reason}`);
    this.name = "MalformedRecordError";
  }
}

export class UnsupportedTransactionTypeError extends SyncError {
  constructor(
    public readonly reference: string,
    public readonly subtype: string,
  ) {
    super(`Unsupported cash transaction type "${subtype}" in record ${reference}`);
    this.name = "UnsupportedTransactionTypeError";
  }
}

export class ExportError extends SyncError {
  constructor(
    message: string,
    public readonly destination: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "ExportError";
  }
}

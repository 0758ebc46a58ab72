export type BundlescopeErrorCode =
  | 'usage'
  | 'bundle_file'
  | 'archive_read'
  | 'entry_read'
  | 'config'
  | 'missing_credential'
  | 'transport'
  | 'upstream'
  | 'decode';

/**
 * Base class for every failure the pipeline reports to the CLI.
 * `code` is stable and is what quiet mode emits.
 */
export class BundlescopeError extends Error {
  readonly code: BundlescopeErrorCode;

  constructor(code: BundlescopeErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BundlescopeError';
    this.code = code;
  }
}

export class UsageError extends BundlescopeError {
  constructor(message: string) {
    super('usage', message);
    this.name = 'UsageError';
  }
}

export class BundleFileError extends BundlescopeError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super('bundle_file', `Failed to read bundle file ${path}: ${causeMessage(options?.cause)}`, options);
    this.name = 'BundleFileError';
    this.path = path;
  }
}

export class ArchiveReadError extends BundlescopeError {
  constructor(options?: { cause?: unknown }) {
    super('archive_read', `Not a valid zip archive: ${causeMessage(options?.cause)}`, options);
    this.name = 'ArchiveReadError';
  }
}

export class EntryReadError extends BundlescopeError {
  readonly entry: string;

  constructor(entry: string, options?: { cause?: unknown }) {
    super('entry_read', `Failed to read archive entry ${entry}: ${causeMessage(options?.cause)}`, options);
    this.name = 'EntryReadError';
    this.entry = entry;
  }
}

export class ConfigError extends BundlescopeError {
  constructor(message: string) {
    super('config', message);
    this.name = 'ConfigError';
  }
}

export class MissingCredentialError extends BundlescopeError {
  readonly variable: string;

  constructor(variable: string) {
    super('missing_credential', `${variable} not set`);
    this.name = 'MissingCredentialError';
    this.variable = variable;
  }
}

export class TransportError extends BundlescopeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transport', message, options);
    this.name = 'TransportError';
  }
}

export class UpstreamError extends BundlescopeError {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super('upstream', `API call failed with status ${status}: ${body}`);
    this.name = 'UpstreamError';
    this.status = status;
    this.body = body;
  }
}

export class DecodeError extends BundlescopeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('decode', message, options);
    this.name = 'DecodeError';
  }
}

/** Human-readable message for any thrown value. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

function causeMessage(cause: unknown): string {
  return cause === undefined ? 'unknown error' : describeError(cause);
}

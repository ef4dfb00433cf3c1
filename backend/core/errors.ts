export type ErrorCode = 'connectivity' | 'listing' | 'locked' | 'transport' | 'config';

export class ExportError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Probe did not succeed; the session is not usable. */
export class ConnectivityError extends ExportError {
  readonly baseUrl: string;

  constructor(baseUrl: string) {
    super('connectivity', `Verbindungstest gegen ${baseUrl} fehlgeschlagen`);
    this.baseUrl = baseUrl;
  }
}

export class ListingError extends ExportError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('listing', message, options);
  }
}

export class LockedDetailError extends ExportError {
  constructor(message: string) {
    super('locked', message);
  }
}

export class TransportError extends ExportError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('transport', message, options);
    this.url = url;
  }
}

export class ConfigError extends ExportError {
  constructor(message: string) {
    super('config', message);
  }
}

/**
 * Error taxonomy
 *
 * ConfigurationError - the caller supplied a rule, filter or setting that can
 *                      never work (fix the input and re-run)
 * LookupError        - the named column is not in the table header
 * TransportError     - the report could not be handed to the mail server
 */

export class ConfigurationError extends Error {
  readonly filter?: string;

  constructor(message: string, options: { filter?: string; cause?: unknown } = {}) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ConfigurationError';
    this.filter = options.filter;
  }
}

export class LookupError extends Error {
  readonly property: string;
  /** Header texts seen on the row that failed to resolve (empty if no header) */
  readonly headers: string[];

  constructor(message: string, property: string, headers: string[] = []) {
    super(message);
    this.name = 'LookupError';
    this.property = property;
    this.headers = headers;
  }
}

export class TransportError extends Error {
  readonly smtpHost: string;

  constructor(message: string, smtpHost: string, cause?: unknown) {
    super(message, cause !== undefined ? { cause } : undefined);
    this.name = 'TransportError';
    this.smtpHost = smtpHost;
  }
}

/** Extract a printable message from anything thrown */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

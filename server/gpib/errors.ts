/**
 * GPIB error taxonomy
 *
 * TransportError   - the adapter rejected or never answered one transaction
 * ConnectionFault  - the network link is unusable until open() is called again
 * FileIOError      - persisting a payload locally failed; the bus is fine
 */

export type TransportErrorCode =
  | number
  | 'timeout'
  | 'invalid_address'
  | 'no_response'
  | 'malformed_response'
  | 'native_error'
  | 'length_mismatch'
  | 'no_controller';

export class GpibError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'GpibError';
  }
}

export class TransportError extends GpibError {
  readonly code: TransportErrorCode;

  constructor(code: TransportErrorCode, message?: string) {
    super(message ?? defaultMessage(code));
    this.name = 'TransportError';
    this.code = code;
  }

  /** Status code reported by the adapter, if this came from one */
  get status(): number | undefined {
    return typeof this.code === 'number' ? this.code : undefined;
  }

  get isTimeout(): boolean {
    return this.code === 'timeout';
  }
}

export class ConnectionFault extends GpibError {
  constructor(message: string = 'Controller connection faulted', options?: { cause?: Error }) {
    super(message);
    this.name = 'ConnectionFault';
    if (options?.cause) this.cause = options.cause;
  }
}

export class FileIOError extends GpibError {
  readonly code: string;
  readonly path: string;

  constructor(path: string, cause: Error) {
    const code = errnoCode(cause) ?? 'EIO';
    super(`Failed to write ${path}: ${cause.message}`);
    this.name = 'FileIOError';
    this.code = code;
    this.path = path;
    this.cause = cause;
  }
}

function defaultMessage(code: TransportErrorCode): string {
  if (typeof code === 'number') return `Adapter reported status ${code}`;
  switch (code) {
    case 'timeout':
      return 'Timed out waiting for the controller';
    case 'invalid_address':
      return 'GPIB address must be an integer between 1 and 30';
    case 'no_response':
      return 'Adapter returned no response buffer';
    case 'malformed_response':
      return 'Instrument response could not be parsed';
    case 'native_error':
      return 'Vendor library call failed';
    case 'length_mismatch':
      return 'Reported binary length does not fit the returned buffer';
    case 'no_controller':
      return 'No GPIB-Ethernet controller found';
  }
}

function errnoCode(err: Error): string | undefined {
  if ('code' in err && typeof err.code === 'string') return err.code;
  return undefined;
}

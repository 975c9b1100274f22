// Shared types for the bus server and its HTTP clients

// ============ Result Type ============
// Use Result<T, E> instead of throwing exceptions.
// Try/catch only at boundaries (transport layer wrapping sockets and the native library).

export type Result<T, E = Error> =
  | { ok: true; value: T }
  | { ok: false; error: E };

// Helper constructors
export function Ok(): Result<void, never>;
export function Ok<T>(value: T): Result<T, never>;
export function Ok<T>(value?: T): Result<T | undefined, never> {
  return { ok: true, value };
}

export const Err = <E>(error: E): Result<never, E> => ({ ok: false, error });

// Normalize anything thrown into an Error
export const toError = (e: unknown): Error => (e instanceof Error ? e : new Error(String(e)));

// ============ Bus API Types ============

export type AdapterKind = 'local' | 'network';

export interface BusDevicesResponse {
  adapter: AdapterKind;
  addresses: number[];
}

export interface CommandRequest {
  command: string;
}

export interface TextResponse {
  response: string;
}

export interface SaveFileRequest {
  filename: string;
  mode?: boolean;
}

export interface SaveFileResponse {
  path: string;
  bytesWritten: number;
}

export interface ControllerSummary {
  ipAddress: string;
  macAddress: string;
  name: string;
  appVersion: string;
}

export interface ControllerListResponse {
  controllers: ControllerSummary[];
}

export interface HealthResponse {
  status: 'ok';
  adapter: AdapterKind;
  connection: string;
}

export type ApiErrorCode =
  | 'INVALID_ADDRESS'
  | 'INVALID_REQUEST'
  | 'BUS_ERROR'
  | 'TIMEOUT'
  | 'CONNECTION_FAULT'
  | 'FILE_IO';

export interface ApiError {
  error: ApiErrorCode;
  message: string;
}

import type { ConnectionStatus } from './connection/types.js';

export type VmConnectionErrorCode =
  | 'auth'
  | 'transport'
  | 'session-invalidated'
  | 'command-timeout'
  | 'reboot-timeout'
  | 'max-retries'
  | 'not-connected'
  | 'boot-signature-unavailable';

export class VmConnectionError extends Error {
  constructor(
    readonly code: VmConnectionErrorCode,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'VmConnectionError';
  }
}

/** Bad or unusable credentials. Never retried. */
export class AuthenticationError extends VmConnectionError {
  constructor(message: string, options?: ErrorOptions) {
    super('auth', message, options);
    this.name = 'AuthenticationError';
  }
}

/** Transient channel failure; the supervisor recovers from these. */
export class TransportError extends VmConnectionError {
  constructor(
    message: string,
    options?: ErrorOptions,
    code: 'transport' | 'session-invalidated' = 'transport',
  ) {
    super(code, message, options);
    this.name = 'TransportError';
  }
}

/** The session a command was started on was closed or replaced. */
export class SessionInvalidatedError extends TransportError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options, 'session-invalidated');
    this.name = 'SessionInvalidatedError';
  }
}

export class CommandTimeoutError extends VmConnectionError {
  constructor(
    readonly command: string,
    readonly timeoutMs: number,
  ) {
    super('command-timeout', `Command produced no output for ${timeoutMs}ms: ${command}`);
    this.name = 'CommandTimeoutError';
  }
}

export class RebootTimeoutError extends VmConnectionError {
  constructor(
    readonly hostAlias: string,
    readonly deadlineMs: number,
  ) {
    super('reboot-timeout', `Host ${hostAlias} did not come back from a reboot within ${deadlineMs}ms`);
    this.name = 'RebootTimeoutError';
  }
}

export class MaxRetriesExceededError extends VmConnectionError {
  constructor(
    readonly hostAlias: string,
    readonly attempts: number,
    options?: ErrorOptions,
  ) {
    super('max-retries', `Gave up connecting to ${hostAlias} after ${attempts} attempt(s)`, options);
    this.name = 'MaxRetriesExceededError';
  }
}

export class NotConnectedError extends VmConnectionError {
  constructor(
    readonly status: ConnectionStatus,
    message = `Connection is ${status}; commands require a connected session`,
  ) {
    super('not-connected', message);
    this.name = 'NotConnectedError';
  }
}

/** Neither a boot id nor an uptime value could be compared across a reconnect. */
export class BootSignatureUnavailableError extends VmConnectionError {
  constructor(message: string) {
    super('boot-signature-unavailable', message);
    this.name = 'BootSignatureUnavailableError';
  }
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export function toTransportError(error: unknown, context: string): VmConnectionError {
  if (error instanceof VmConnectionError) {
    return error;
  }

  if (error instanceof Error) {
    return new TransportError(`${error.message} (${context})`, { cause: error });
  }

  return new TransportError(`Unknown transport error (${context}): ${String(error)}`);
}

export function toAuthenticationError(error: unknown, hostAlias: string): AuthenticationError {
  if (error instanceof AuthenticationError) {
    return error;
  }

  const cause = toError(error);
  return new AuthenticationError(`${cause.message} (host: ${hostAlias})`, { cause });
}

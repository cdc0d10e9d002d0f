import type { ErrorCode, ErrorFragment, StreamFragment } from './generation.js';

export class GatewayError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// Missing configuration or ungranted consent; raised before any I/O
export class ConfigurationError extends GatewayError {
  constructor(
    code: 'NOT_CONFIGURED' | 'CONSENT_REQUIRED' | 'INVALID_CONFIG',
    message: string,
    options?: { cause?: unknown }
  ) {
    super(code, message, options);
  }
}

export class ConnectivityError extends GatewayError {
  readonly status?: number;

  constructor(
    code: 'CONNECTIVITY' | 'TIMEOUT' | 'HTTP_STATUS',
    message: string,
    options?: { cause?: unknown; status?: number }
  ) {
    super(code, message, options);
    this.status = options?.status;
  }
}

export class ProtocolError extends GatewayError {
  constructor(message: string, options?: { cause?: unknown; code?: 'PROTOCOL' | 'PROVIDER' }) {
    super(options?.code ?? 'PROTOCOL', message, options);
  }
}

export class CredentialError extends GatewayError {
  constructor(message: string) {
    super('CREDENTIAL', message);
  }
}

export const NOT_CONFIGURED_MESSAGE = 'No AI backend configured.';
export const CONSENT_REQUIRED_MESSAGE =
  'Cloud processing requires both institutional and data-sharing consent.';

function causeMessage(error: Error): string {
  const cause = error.cause;
  if (cause instanceof Error && cause.message) return cause.message;
  if (typeof cause === 'string' && cause) return cause;
  return error.message;
}

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

export function toGatewayError(error: unknown): GatewayError {
  if (error instanceof GatewayError) return error;

  // Abort reasons are DOMExceptions, which are not always Error instances
  switch (errorName(error)) {
    case 'TimeoutError':
      return new ConnectivityError('TIMEOUT', 'Request timed out', { cause: error });
    case 'AbortError':
      return new ConnectivityError('CONNECTIVITY', 'Request aborted', { cause: error });
  }

  if (error instanceof TypeError) {
    // fetch() reports DNS failures and refused connections this way
    if (error.message === 'fetch failed') {
      return new ConnectivityError('CONNECTIVITY', `Connection failed: ${causeMessage(error)}`, {
        cause: error
      });
    }
    // undici's error for a body cut off mid-stream
    if (error.message === 'terminated') {
      return new ConnectivityError('CONNECTIVITY', `Connection lost: ${causeMessage(error)}`, {
        cause: error
      });
    }
  }

  if (error instanceof Error) {
    return new GatewayError('INTERNAL', error.message, { cause: error });
  }
  return new GatewayError('INTERNAL', String(error));
}

export function describeError(error: unknown): string {
  return toGatewayError(error).message;
}

export function errorFragment(error: unknown): ErrorFragment {
  const gatewayError = toGatewayError(error);
  return { kind: 'error', code: gatewayError.code, message: gatewayError.message };
}

export function renderFragment(fragment: StreamFragment): string {
  return fragment.kind === 'text' ? fragment.text : `[Error: ${fragment.message}]`;
}

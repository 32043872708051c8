export enum PinswapErrorCode {
  TOOL_INVOCATION_FAILED = 'TOOL_INVOCATION_FAILED',
  MALFORMED_CERTIFICATE = 'MALFORMED_CERTIFICATE',
  INTERCEPTION_CERT_MISSING = 'INTERCEPTION_CERT_MISSING',
  PINNED_CERT_NOT_FOUND = 'PINNED_CERT_NOT_FOUND',
  PINNED_CERT_DIRTY = 'PINNED_CERT_DIRTY',
  INVALID_CONFIG = 'INVALID_CONFIG',
  SESSION_CANCELLED = 'SESSION_CANCELLED',
}

export class PinswapError extends Error {
  readonly code: PinswapErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: PinswapErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'PinswapError';
    this.code = code;
    this.context = context;
  }
}

// exitCode is null when the program never started (not on PATH, not executable).
export class ToolInvocationError extends PinswapError {
  readonly command: string;
  readonly args: readonly string[];
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    message: string,
    details: { command: string; args: readonly string[]; exitCode: number | null; stderr?: string }
  ) {
    super(PinswapErrorCode.TOOL_INVOCATION_FAILED, message, {
      command: details.command,
      args: [...details.args],
      exitCode: details.exitCode,
      stderr: details.stderr ?? '',
    });
    this.name = 'ToolInvocationError';
    this.command = details.command;
    this.args = details.args;
    this.exitCode = details.exitCode;
    this.stderr = details.stderr ?? '';
  }
}

export class MalformedCertificateError extends PinswapError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super(PinswapErrorCode.MALFORMED_CERTIFICATE, `Not a valid certificate: ${path} (${reason})`, { path, reason });
    this.name = 'MalformedCertificateError';
    this.path = path;
  }
}

export class InterceptionCertificateMissingError extends PinswapError {
  readonly path: string;

  constructor(path: string) {
    super(
      PinswapErrorCode.INTERCEPTION_CERT_MISSING,
      `Interception certificate missing at ${path}. Launch the proxy once so it can generate its CA certificate.`,
      { path }
    );
    this.name = 'InterceptionCertificateMissingError';
    this.path = path;
  }
}

export class SessionCancelledError extends PinswapError {
  readonly signal: string;

  constructor(signal: string) {
    super(PinswapErrorCode.SESSION_CANCELLED, `Session cancelled by ${signal}`, { signal });
    this.name = 'SessionCancelledError';
    this.signal = signal;
  }
}

export type SessionPhase =
  | 'convert'
  | 'substitute'
  | 'enable-network-proxy'
  | 'run-proxy'
  | 'disable-network-proxy'
  | 'restore-certificate';

export interface PhaseError {
  readonly phase: SessionPhase;
  readonly error: Error;
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Error types shared by clients, modules and the dashboard
 *
 * RequestError  - one failed call to an external API
 * ModuleError   - a RequestError (or other failure) tagged with the module name
 * ConfigError   - startup misconfiguration, fatal for the CLI
 */

export type RequestErrorKind = 'network' | 'timeout' | 'auth' | 'http' | 'parse';

export class RequestError extends Error {
  readonly kind: RequestErrorKind;
  readonly status?: number;

  constructor(kind: RequestErrorKind, message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'RequestError';
    this.kind = kind;
    this.status = options.status;
  }
}

export class ModuleError extends Error {
  readonly moduleName: string;

  constructor(moduleName: string, cause: unknown) {
    super(`Module ${moduleName} failed: ${describeCause(cause)}`, { cause });
    this.name = 'ModuleError';
    this.moduleName = moduleName;
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function describeCause(cause: unknown): string {
  if (cause instanceof RequestError) {
    const status = cause.status !== undefined ? ` ${cause.status}` : '';
    return `${cause.kind}${status}: ${cause.message}`;
  }
  if (cause instanceof Error) return cause.message;
  return String(cause);
}

/**
 * One-line diagnostic for logs and fragments
 */
export function formatError(err: unknown): string {
  if (err instanceof ModuleError) return err.message;
  if (err instanceof RequestError) return `Request failed (${describeCause(err)})`;
  return describeCause(err);
}

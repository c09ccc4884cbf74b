export type ProxyErrorKind = 'bind-listener' | 'start-server' | 'serve';

/** A fatal error from {@link runProxy}. None of these is retried. */
export abstract class ProxyError extends Error {
  abstract readonly kind: ProxyErrorKind;
  declare readonly cause: Error;

  protected constructor(message: string, cause: Error) {
    super(`${message}: ${cause.message}`, { cause });
  }
}

export class BindListenerError extends ProxyError {
  readonly kind = 'bind-listener';

  constructor(cause: Error) {
    super('failed to bind listener', cause);
    this.name = 'BindListenerError';
  }
}

export class StartServerError extends ProxyError {
  readonly kind = 'start-server';

  constructor(cause: Error) {
    super('failed to start http server', cause);
    this.name = 'StartServerError';
  }
}

export class ServeError extends ProxyError {
  readonly kind = 'serve';

  constructor(cause: Error) {
    super('http server stopped with error', cause);
    this.name = 'ServeError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

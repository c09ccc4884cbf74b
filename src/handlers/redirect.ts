import type { SocketAddr } from '../addr.js';
import { toError } from '../errors.js';
import { fail, ok, type HandlerResult, type OutboundClient, type ProxyRequest, type RequestHandler } from './types.js';

/** The exchangeable part of a {@link Redirect}: rewrites the target in place. */
export interface RedirectLogic {
  changeUri(uri: URL): void;
}

export function redirectFn(fn: (uri: URL) => void): RedirectLogic {
  return { changeUri: fn };
}

export class InvalidAuthorityError extends Error {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`invalid authority "${input}": ${reason}`);
    this.name = 'InvalidAuthorityError';
    this.input = input;
  }
}

const AUTHORITY = /^(\[[^\]]+\]|[^:/?#@[\]\s]+)(?::(\d{1,5}))?$/;

/** `host[:port]`, validated once so rewriting can never build a broken URL. */
export class Authority {
  readonly hostname: string;
  /** Empty when the scheme's default port applies. */
  readonly port: string;

  private constructor(hostname: string, port: string) {
    this.hostname = hostname;
    this.port = port;
  }

  static parse(input: string): Authority {
    const match = AUTHORITY.exec(input.trim());
    if (!match) throw new InvalidAuthorityError(input, 'expected host[:port]');

    let hostname: string;
    try {
      hostname = new URL(`http://${match[1]}/`).hostname;
    } catch {
      throw new InvalidAuthorityError(input, 'invalid host');
    }

    const port = match[2] ?? '';
    if (port !== '' && parseInt(port, 10) > 65535) {
      throw new InvalidAuthorityError(input, 'port out of range');
    }
    return new Authority(hostname, port);
  }

  toString() {
    return this.port ? `${this.hostname}:${this.port}` : this.hostname;
  }
}

/**
 * Points every request at a fixed authority. Configured with `example.com`,
 * `http://proxy.local/a/b?c=1` becomes `http://example.com/a/b?c=1`.
 */
export class ChangeAuthority implements RedirectLogic {
  readonly to: Authority;

  constructor(to: Authority | string) {
    this.to = typeof to === 'string' ? Authority.parse(to) : to;
  }

  changeUri(uri: URL) {
    uri.hostname = this.to.hostname;
    uri.port = this.to.port;
  }
}

/**
 * Terminal handler: rewrites the request target and sends the request through
 * the shared client. Transport failures come back exactly as the client
 * reported them.
 */
export class Redirect implements RequestHandler<Error> {
  readonly logic: RedirectLogic;

  constructor(logic: RedirectLogic) {
    this.logic = logic;
  }

  static changeAuthority(to: Authority | string): Redirect {
    return new Redirect(new ChangeAuthority(to));
  }

  async handle(
    _from: SocketAddr,
    request: ProxyRequest,
    client: OutboundClient,
  ): Promise<HandlerResult<Error>> {
    this.logic.changeUri(request.uri);

    try {
      return ok(await client.request(request));
    } catch (err) {
      return fail(toError(err));
    }
  }
}

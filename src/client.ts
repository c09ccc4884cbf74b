import { Agent, type Dispatcher } from 'undici';
import type { HeaderMap, OutboundClient, ProxyRequest, ProxyResponse } from './handlers/types.js';

// Per-connection headers; never forwarded in either direction.
export const HOP_BY_HOP_HEADERS: ReadonlySet<string> = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'proxy-connection',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
]);

type RequestMethod = Dispatcher.RequestOptions['method'];

const METHODS = ['GET', 'HEAD', 'POST', 'PUT', 'DELETE', 'OPTIONS', 'TRACE', 'PATCH'];

function isRequestMethod(method: string): method is RequestMethod {
  return METHODS.includes(method);
}

export class UnsupportedRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedRequestError';
  }
}

/**
 * Copy of `headers` without hop-by-hop headers, anything the `connection`
 * header names, and `drop`. Undefined values are left out.
 */
export function endToEndHeaders(headers: HeaderMap, drop: string[] = []): Record<string, string | string[]> {
  const excluded = new Set(drop);
  const connection = headers.connection;
  const listed = Array.isArray(connection) ? connection.join(',') : connection ?? '';
  for (const name of listed.split(',')) {
    if (name.trim()) excluded.add(name.trim().toLowerCase());
  }

  const out: Record<string, string | string[]> = {};
  for (const [name, value] of Object.entries(headers)) {
    const lower = name.toLowerCase();
    if (value === undefined || HOP_BY_HOP_HEADERS.has(lower) || excluded.has(lower)) continue;
    out[lower] = value;
  }
  return out;
}

export interface PooledClientOptions {
  /** Max sockets per upstream origin. Unlimited when unset. */
  connections?: number;
  keepAliveTimeout?: number;
  headersTimeout?: number;
  bodyTimeout?: number;
}

/**
 * Keep-alive client shared by every request a proxy forwards. Connections to
 * an origin are pooled and reused across calls.
 */
export class PooledClient implements OutboundClient {
  private readonly dispatcher: Dispatcher;

  constructor(options: PooledClientOptions = {}, dispatcher?: Dispatcher) {
    this.dispatcher =
      dispatcher ??
      new Agent({
        connections: options.connections ?? null,
        keepAliveTimeout: options.keepAliveTimeout ?? 4_000,
        headersTimeout: options.headersTimeout ?? 300_000,
        bodyTimeout: options.bodyTimeout ?? 300_000,
      });
  }

  async request(request: ProxyRequest): Promise<ProxyResponse> {
    const { uri, method, body } = request;
    if (uri.protocol !== 'http:' && uri.protocol !== 'https:') {
      throw new UnsupportedRequestError(`unsupported scheme ${uri.protocol}`);
    }
    if (!isRequestMethod(method)) {
      throw new UnsupportedRequestError(`unsupported method ${method}`);
    }

    // undici sets host from the origin; a buffered body gets a fresh length
    const drop = ['host', 'expect'];
    if (typeof body === 'string' || Buffer.isBuffer(body)) drop.push('content-length');

    const { statusCode, headers, body: responseBody } = await this.dispatcher.request({
      origin: uri.origin,
      path: uri.pathname + uri.search,
      method,
      headers: endToEndHeaders(request.headers, drop),
      body,
      signal: request.signal,
    });

    return { status: statusCode, headers, body: responseBody };
  }

  close(): Promise<void> {
    return this.dispatcher.close();
  }
}

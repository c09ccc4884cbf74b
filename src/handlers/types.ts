import type { Readable } from 'stream';
import type { SocketAddr } from '../addr.js';

export type HeaderMap = Record<string, string | string[] | undefined>;

export type MessageBody = Readable | string | Buffer | null;

export interface ProxyRequest {
  method: string;
  /** Absolute request target. Handlers may rewrite it in place. */
  uri: URL;
  headers: HeaderMap;
  body: MessageBody;
  /** Aborted when the inbound caller disconnects before a response is sent. */
  signal?: AbortSignal;
}

export interface ProxyResponse {
  status: number;
  headers: HeaderMap;
  body: MessageBody;
}

export type HandlerResult<E> =
  | { ok: true; response: ProxyResponse }
  | { ok: false; error: E };

/** Shared upstream client. Rejects with the transport's own error. */
export interface OutboundClient {
  request(request: ProxyRequest): Promise<ProxyResponse>;
}

/**
 * Turns one inbound request into a response or a typed failure.
 *
 * The request is handed over: a handler may rewrite it but settles exactly
 * one result for it. The client is shared with every other request in flight.
 */
export interface RequestHandler<E extends Error = Error> {
  handle(from: SocketAddr, request: ProxyRequest, client: OutboundClient): Promise<HandlerResult<E>>;
}

export function ok(response: ProxyResponse): HandlerResult<never> {
  return { ok: true, response };
}

export function fail<E>(error: E): HandlerResult<E> {
  return { ok: false, error };
}

export function isRequestHandler(value: unknown): value is RequestHandler {
  return (
    typeof value === 'object' &&
    value !== null &&
    'handle' in value &&
    typeof value.handle === 'function'
  );
}

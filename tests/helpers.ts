import http from 'http';
import net from 'net';
import { text } from 'stream/consumers';
import { Hono } from 'hono';
import { serve, type ServerType } from '@hono/node-server';
import type { SocketAddr } from '../src/addr.js';
import type {
  HandlerResult,
  MessageBody,
  OutboundClient,
  ProxyRequest,
  ProxyResponse,
  RequestHandler,
} from '../src/handlers/types.js';

export function makeRequest(overrides?: Partial<ProxyRequest>): ProxyRequest {
  return {
    method: 'GET',
    uri: new URL('http://old.example/a/b?q=1'),
    headers: { host: 'old.example', 'user-agent': 'test' },
    body: null,
    ...overrides,
  };
}

export function makeResponse(overrides?: Partial<ProxyResponse>): ProxyResponse {
  return {
    status: 200,
    headers: { 'content-type': 'text/plain', 'x-upstream': 'yes' },
    body: 'upstream says hi',
    ...overrides,
  };
}

export async function readBody(body: MessageBody): Promise<string> {
  if (body === null) return '';
  if (typeof body === 'string') return body;
  if (Buffer.isBuffer(body)) return body.toString('utf8');
  return text(body);
}

/** Outbound client stand-in that records every request it is given. */
export class FakeClient implements OutboundClient {
  readonly requests: ProxyRequest[] = [];
  private readonly respond: (request: ProxyRequest) => ProxyResponse;

  constructor(respond: (request: ProxyRequest) => ProxyResponse = () => makeResponse()) {
    this.respond = respond;
  }

  async request(request: ProxyRequest): Promise<ProxyResponse> {
    this.requests.push(request);
    return this.respond(request);
  }
}

/** Handler that settles a fixed result and counts its invocations. */
export class RecordingHandler<E extends Error = Error> implements RequestHandler<E> {
  readonly calls: { from: SocketAddr; request: ProxyRequest; client: OutboundClient }[] = [];
  private readonly result: HandlerResult<E>;

  constructor(result: HandlerResult<E>) {
    this.result = result;
  }

  async handle(from: SocketAddr, request: ProxyRequest, client: OutboundClient): Promise<HandlerResult<E>> {
    this.calls.push({ from, request, client });
    return this.result;
  }
}

export interface Upstream {
  port: number;
  hits: number;
  close(): Promise<void>;
}

/** Echo server on 127.0.0.1 that describes each request it receives as JSON. */
export function startUpstream(): Promise<Upstream> {
  const app = new Hono();
  let server: ServerType;
  const upstream: Upstream = {
    port: 0,
    hits: 0,
    close: () =>
      new Promise<void>((resolve) => {
        server.close(() => resolve());
      }),
  };

  app.all('*', async (c) => {
    upstream.hits += 1;
    return c.json(
      {
        method: c.req.method,
        path: c.req.path,
        q: c.req.query('q') ?? null,
        host: c.req.header('host') ?? null,
        custom: c.req.header('x-custom') ?? null,
        body: await c.req.text(),
      },
      201,
      { 'x-upstream': 'hono' },
    );
  });

  return new Promise((resolve) => {
    server = serve({ fetch: app.fetch, port: 0, hostname: '127.0.0.1' }, (info) => {
      upstream.port = info.port;
      resolve(upstream);
    });
  });
}

/** A port nothing is listening on. */
export function closedPort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const probe = net.createServer();
    probe.once('error', reject);
    probe.listen(0, '127.0.0.1', () => {
      const address = probe.address();
      const port = address && typeof address === 'object' ? address.port : 0;
      probe.close(() => resolve(port));
    });
  });
}

export interface SentResponse {
  status: number;
  headers: http.IncomingHttpHeaders;
  body: string;
}

export function send(
  port: number,
  options: { method?: string; path: string; headers?: http.OutgoingHttpHeaders; body?: string },
): Promise<SentResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        host: '127.0.0.1',
        port,
        method: options.method ?? 'GET',
        path: options.path,
        headers: options.headers,
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on('data', (chunk: Buffer) => chunks.push(chunk));
        res.on('end', () =>
          resolve({ status: res.statusCode ?? 0, headers: res.headers, body: Buffer.concat(chunks).toString('utf8') }),
        );
        res.on('error', reject);
      },
    );
    req.on('error', reject);
    req.end(options.body);
  });
}

import http from 'http';
import net from 'net';
import { pipeline } from 'stream/promises';
import { formatAddr, normalizeIp, type SocketAddr } from './addr.js';
import { endToEndHeaders, PooledClient, type PooledClientOptions } from './client.js';
import { BindListenerError, ServeError, StartServerError, toError } from './errors.js';
import { createLogger } from './log.js';
import type { OutboundClient, ProxyRequest, ProxyResponse, RequestHandler } from './handlers/types.js';

const log = createLogger('proxy');

export interface ProxyConfig<E extends Error = Error> {
  /** Where the proxy listens for requests. */
  listenOn: SocketAddr;
  /** Root handler every inbound request enters through. */
  handler: RequestHandler<E>;
  client?: PooledClientOptions;
  /** Passed to `http.createServer`; its header and request timeouts apply. */
  server?: http.ServerOptions;
  /**
   * Turns a handler failure into a response for the caller. Without it, or
   * when it returns undefined, the caller's connection is dropped.
   */
  mapError?: (error: E, from: SocketAddr) => ProxyResponse | undefined;
  logTraffic?: boolean;
}

export interface RunOptions {
  /** Stops accepting, drops open connections and resolves `runProxy`. */
  signal?: AbortSignal;
  onListening?: (address: SocketAddr) => void;
}

interface ServeContext<E extends Error> {
  config: ProxyConfig<E>;
  client: OutboundClient;
  peers: WeakMap<net.Socket, SocketAddr>;
}

function listen(server: http.Server, addr: SocketAddr): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(new BindListenerError(err));

    server.once('error', onError);
    server.listen({ host: addr.ip, port: addr.port }, () => {
      server.off('error', onError);
      resolve();
    });
  });
}

function localAddr(server: http.Server, fallback: SocketAddr): SocketAddr {
  const address = server.address();
  if (address && typeof address === 'object') {
    return { ip: normalizeIp(address.address), port: address.port };
  }
  return fallback;
}

function remotePeer(socket: net.Socket): SocketAddr | null {
  const { remoteAddress, remotePort } = socket;
  if (remoteAddress === undefined || remotePort === undefined) return null;
  return { ip: normalizeIp(remoteAddress), port: remotePort };
}

function hasBody(req: http.IncomingMessage) {
  const length = req.headers['content-length'];
  return req.headers['transfer-encoding'] !== undefined || (length !== undefined && length !== '0');
}

/**
 * Absolute request target. Forward-proxy requests carry it in absolute form;
 * origin-form targets are resolved against the Host header. The authority of
 * an origin-form target always comes from Host, even for a `//` path.
 */
export function requestTarget(url: string | undefined, host: string | undefined): URL | null {
  const target = url || '/';
  try {
    if (/^[a-z][a-z\d+.-]*:\/\//i.test(target)) return new URL(target);
    if (!host || !target.startsWith('/')) return null;

    const base = new URL(`http://${host}`);
    // Host must be a bare authority
    if (base.username || base.password || base.pathname !== '/' || base.search || base.hash) return null;
    return new URL(`${base.origin}${target}`);
  } catch {
    // unparseable target or host
    return null;
  }
}

async function relay(response: ProxyResponse, res: http.ServerResponse) {
  for (const [name, value] of Object.entries(endToEndHeaders(response.headers))) {
    res.setHeader(name, value);
  }
  res.writeHead(response.status);

  const { body } = response;
  if (body === null) {
    res.end();
  } else if (typeof body === 'string' || Buffer.isBuffer(body)) {
    res.end(body);
  } else {
    try {
      await pipeline(body, res);
    } catch (err) {
      log.debug(`response body aborted: ${toError(err).message}`);
    }
  }
}

async function serveRequest<E extends Error>(
  ctx: ServeContext<E>,
  req: http.IncomingMessage,
  res: http.ServerResponse,
) {
  const from = ctx.peers.get(req.socket);
  if (!from) {
    res.destroy();
    return;
  }

  const uri = requestTarget(req.url, req.headers.host);
  if (!uri) {
    res.writeHead(400, { 'content-type': 'text/plain' });
    res.end('Bad Request: cannot resolve request target');
    return;
  }

  const controller = new AbortController();
  res.once('close', () => {
    if (!res.writableFinished) controller.abort();
  });

  const method = req.method || 'GET';
  const target = uri.href;
  const request: ProxyRequest = {
    method,
    uri,
    headers: { ...req.headers },
    body: hasBody(req) ? req : null,
    signal: controller.signal,
  };

  const result = await ctx.config.handler.handle(from, request, ctx.client);

  if (result.ok) {
    if (ctx.config.logTraffic) {
      log.info(`${formatAddr(from)} ${method} ${target} → ${result.response.status}`);
    }
    await relay(result.response, res);
    return;
  }

  const mapped = ctx.config.mapError?.(result.error, from);
  if (ctx.config.logTraffic || !mapped) {
    log.warn(`${formatAddr(from)} ${method} ${target} failed: ${result.error.message}`);
  }
  if (mapped) {
    await relay(mapped, res);
  } else {
    res.destroy();
  }
}

/**
 * Run a proxy with the given configuration.
 *
 * Resolves only once `options.signal` aborts; rejects with a
 * {@link ProxyError} when the http server cannot be created, its address
 * cannot be bound, or it fails while serving.
 */
export async function runProxy<E extends Error>(config: ProxyConfig<E>, options: RunOptions = {}): Promise<void> {
  let server: http.Server;
  try {
    server = http.createServer(config.server ?? {});
  } catch (err) {
    throw new StartServerError(toError(err));
  }

  // listen() also starts the server's header and request timeout checks
  await listen(server, config.listenOn);

  const peers = new WeakMap<net.Socket, SocketAddr>();
  const client = new PooledClient(config.client);
  const ctx: ServeContext<E> = { config, client, peers };

  server.on('connection', (socket: net.Socket) => {
    const peer = remotePeer(socket);
    if (peer) peers.set(socket, peer);
    else socket.destroy();
  });

  server.on('request', (req: http.IncomingMessage, res: http.ServerResponse) => {
    serveRequest(ctx, req, res).catch((err) => {
      log.error(`handler threw for ${req.method} ${req.url}`, err);
      res.destroy();
    });
  });

  const bound = localAddr(server, config.listenOn);
  log.info(`listening on http://${formatAddr(bound)}`);
  options.onListening?.(bound);

  const { signal } = options;
  const stop = () => {
    server.close();
    server.closeAllConnections();
  };

  try {
    await new Promise<void>((resolve, reject) => {
      server.once('error', (err: Error) => reject(new ServeError(err)));
      server.once('close', () => resolve());
      if (signal?.aborted) stop();
      else signal?.addEventListener('abort', stop, { once: true });
    });
  } finally {
    signal?.removeEventListener('abort', stop);
    if (server.listening) stop();
    await client.close();
  }
}

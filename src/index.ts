/**
 * relaykit: forwarding HTTP proxies from composable request handlers.
 *
 * ```ts
 * import { Filter, Redirect, parseAddr, runProxy } from 'relaykit';
 *
 * const handler = Filter.addrWhitelist(Redirect.changeAuthority('example.com'), [
 *   parseAddr('127.0.0.1:8000'),
 * ]);
 * await runProxy({ listenOn: parseAddr('127.0.0.1:8080'), handler });
 * ```
 */

export { runProxy, requestTarget } from './proxy.js';
export type { ProxyConfig, RunOptions } from './proxy.js';

export { PooledClient, UnsupportedRequestError, endToEndHeaders, HOP_BY_HOP_HEADERS } from './client.js';
export type { PooledClientOptions } from './client.js';

export { ProxyError, BindListenerError, StartServerError, ServeError } from './errors.js';
export type { ProxyErrorKind } from './errors.js';

export { AddrParseError, addrKey, formatAddr, normalizeIp, parseAddr, resolveAddrs } from './addr.js';
export type { SocketAddr } from './addr.js';

export { createLogger, setLogLevel, getLogLevel } from './log.js';
export type { Logger, LogLevel } from './log.js';

export * from './handlers/index.js';

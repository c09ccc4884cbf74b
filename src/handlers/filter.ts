import { addrKey, formatAddr, type SocketAddr } from '../addr.js';
import { createLogger } from '../log.js';
import { fail, type HandlerResult, type OutboundClient, type ProxyRequest, type RequestHandler } from './types.js';

const log = createLogger('filter');

/** The exchangeable part of a {@link Filter}: returns whether a request may pass. */
export interface FilterLogic {
  filter(from: SocketAddr, request: Readonly<ProxyRequest>): boolean;
}

export function filterFn(fn: (from: SocketAddr, request: Readonly<ProxyRequest>) => boolean): FilterLogic {
  return { filter: fn };
}

export class FilterInnerError<E extends Error> extends Error {
  readonly kind = 'inner';
  readonly inner: E;

  constructor(inner: E) {
    super(inner.message, { cause: inner });
    this.name = 'FilterInnerError';
    this.inner = inner;
  }
}

export class FilteredOutError extends Error {
  readonly kind = 'filtered-out';
  readonly from: SocketAddr;
  /** The rejected request, untouched, for whoever maps failures to responses. */
  readonly request: ProxyRequest;

  constructor(from: SocketAddr, request: ProxyRequest) {
    super(`request from ${formatAddr(from)} was filtered out`);
    this.name = 'FilteredOutError';
    this.from = from;
    this.request = request;
  }
}

export type FilterError<E extends Error> = FilterInnerError<E> | FilteredOutError;

/** Called for every rejected request. Observation only: it cannot change the outcome. */
export type RejectHook = (from: SocketAddr, request: Readonly<ProxyRequest>) => void;

export interface FilterOptions {
  onReject?: RejectHook;
}

/**
 * Runs `logic` before handing the request to `inner`. Rejected requests
 * settle straight away with {@link FilteredOutError} and never reach `inner`.
 */
export class Filter<E extends Error> implements RequestHandler<FilterError<E>> {
  readonly inner: RequestHandler<E>;
  readonly logic: FilterLogic;
  private readonly onReject?: RejectHook;

  constructor(inner: RequestHandler<E>, logic: FilterLogic, options: FilterOptions = {}) {
    this.inner = inner;
    this.logic = logic;
    this.onReject = options.onReject;
  }

  static addrWhitelist<E extends Error>(
    inner: RequestHandler<E>,
    whitelist: Iterable<SocketAddr>,
    options: FilterOptions & AddrLookupOptions = {},
  ): Filter<E> {
    return new Filter(inner, new AddrLookupFilter(whitelist, false, options), options);
  }

  static addrBlacklist<E extends Error>(
    inner: RequestHandler<E>,
    blacklist: Iterable<SocketAddr>,
    options: FilterOptions & AddrLookupOptions = {},
  ): Filter<E> {
    return new Filter(inner, new AddrLookupFilter(blacklist, true, options), options);
  }

  async handle(
    from: SocketAddr,
    request: ProxyRequest,
    client: OutboundClient,
  ): Promise<HandlerResult<FilterError<E>>> {
    if (!this.logic.filter(from, request)) {
      this.notifyRejected(from, request);
      return fail(new FilteredOutError(from, request));
    }

    const result = await this.inner.handle(from, request, client);
    return result.ok ? result : fail(new FilterInnerError(result.error));
  }

  private notifyRejected(from: SocketAddr, request: ProxyRequest) {
    if (!this.onReject) return;
    try {
      this.onReject(from, request);
    } catch (err) {
      log.error(`onReject hook failed for ${formatAddr(from)}`, err);
    }
  }
}

export interface AddrLookupOptions {
  /** Compare the port as well as the IP. Defaults to true. */
  matchPort?: boolean;
}

/**
 * Looks the caller up in a fixed address set. As a whitelist only listed
 * addresses pass, as a blacklist only unlisted ones do.
 */
export class AddrLookupFilter implements FilterLogic {
  readonly isBlacklist: boolean;
  readonly matchPort: boolean;
  private readonly keys: ReadonlySet<string>;

  constructor(list: Iterable<SocketAddr>, isBlacklist: boolean, options: AddrLookupOptions = {}) {
    this.isBlacklist = isBlacklist;
    this.matchPort = options.matchPort ?? true;
    this.keys = new Set(Array.from(list, (addr) => addrKey(addr, this.matchPort)));
  }

  has(addr: SocketAddr): boolean {
    return this.keys.has(addrKey(addr, this.matchPort));
  }

  get size() {
    return this.keys.size;
  }

  filter(from: SocketAddr): boolean {
    return this.isBlacklist !== this.has(from);
  }
}

import fs from 'fs';
import path from 'path';
import { createJiti } from 'jiti';
import { formatAddr, resolveAddrs, type SocketAddr } from './addr.js';
import type { PooledClientOptions } from './client.js';
import { createLogger, errorMessage, isLogLevel, type LogLevel } from './log.js';
import { AddrLookupFilter, Filter, FilteredOutError, FilterInnerError } from './handlers/filter.js';
import { Redirect } from './handlers/redirect.js';
import { isRequestHandler, type ProxyRequest, type ProxyResponse, type RequestHandler } from './handlers/types.js';
import { MATCH_TYPES, UriPatternFilter, type MatchType, type UriMatch } from './handlers/uri-filter.js';

const jiti = createJiti(import.meta.url, { interopDefault: true });
const log = createLogger('config');

export const DEFAULT_CONFIG_PATH = 'relaykit.json';
export const DEFAULT_LISTEN = '127.0.0.1:8080';

export type FilterMode = 'whitelist' | 'blacklist';

export interface AddrFilterConfig {
  mode: FilterMode;
  /** `ip:port` literals or `host:port` names resolved at startup. */
  addresses: string[];
  matchPort?: boolean;
}

export interface UriRulesConfig {
  mode: FilterMode;
  patterns: UriMatch[];
}

export interface FileConfig {
  listen?: string;
  redirect?: { to: string };
  filter?: AddrFilterConfig;
  rules?: UriRulesConfig;
  logTraffic?: boolean;
  logLevel?: LogLevel;
  client?: PooledClientOptions;
}

export interface CliOptions {
  config?: string;
  listen?: string;
  to?: string;
  allow?: string[];
  deny?: string[];
  ignorePort?: boolean;
  handler?: string;
  logTraffic?: boolean;
  logLevel?: LogLevel;
}

export class ConfigError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`${field}: ${message}`);
    this.name = 'ConfigError';
    this.field = field;
  }
}

// --- validation ---

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isFilterMode(value: unknown): value is FilterMode {
  return value === 'whitelist' || value === 'blacklist';
}

function isMatchType(value: unknown): value is MatchType {
  return typeof value === 'string' && MATCH_TYPES.some((type) => type === value);
}

function optionalString(obj: Record<string, unknown>, key: string, field: string): string | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') throw new ConfigError(field, 'must be a string');
  return value;
}

function optionalBoolean(obj: Record<string, unknown>, key: string, field: string): boolean | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw new ConfigError(field, 'must be a boolean');
  return value;
}

function optionalNumber(obj: Record<string, unknown>, key: string, field: string): number | undefined {
  const value = obj[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'number' || !Number.isInteger(value) || value < 0) {
    throw new ConfigError(field, 'must be a non-negative integer');
  }
  return value;
}

function parseMode(value: unknown, field: string): FilterMode {
  if (!isFilterMode(value)) throw new ConfigError(field, 'must be "whitelist" or "blacklist"');
  return value;
}

function parseUriMatch(value: unknown, field: string): UriMatch {
  if (!isRecord(value)) throw new ConfigError(field, 'must be an object');
  if (typeof value.pattern !== 'string' || !value.pattern) {
    throw new ConfigError(`${field}.pattern`, 'must be a non-empty string');
  }
  const match: UriMatch = { pattern: value.pattern };
  if (value.type !== undefined) {
    if (!isMatchType(value.type)) throw new ConfigError(`${field}.type`, `must be one of ${MATCH_TYPES.join(', ')}`);
    match.type = value.type;
  }
  if (value.methods !== undefined) {
    if (!isStringArray(value.methods)) throw new ConfigError(`${field}.methods`, 'must be an array of strings');
    match.methods = value.methods;
  }
  return match;
}

/** Validate parsed JSON into a {@link FileConfig}. */
export function parseFileConfig(value: unknown): FileConfig {
  if (!isRecord(value)) throw new ConfigError('config', 'must be a JSON object');
  const config: FileConfig = {};

  config.listen = optionalString(value, 'listen', 'listen');
  config.logTraffic = optionalBoolean(value, 'logTraffic', 'logTraffic');

  if (value.logLevel !== undefined) {
    if (!isLogLevel(value.logLevel)) throw new ConfigError('logLevel', 'unknown log level');
    config.logLevel = value.logLevel;
  }

  if (value.redirect !== undefined) {
    if (!isRecord(value.redirect)) throw new ConfigError('redirect', 'must be an object');
    const to = optionalString(value.redirect, 'to', 'redirect.to');
    if (!to) throw new ConfigError('redirect.to', 'is required');
    config.redirect = { to };
  }

  if (value.filter !== undefined) {
    const filter = value.filter;
    if (!isRecord(filter)) throw new ConfigError('filter', 'must be an object');
    if (!isStringArray(filter.addresses)) throw new ConfigError('filter.addresses', 'must be an array of strings');
    config.filter = {
      mode: parseMode(filter.mode, 'filter.mode'),
      addresses: filter.addresses,
      matchPort: optionalBoolean(filter, 'matchPort', 'filter.matchPort'),
    };
  }

  if (value.rules !== undefined) {
    const rules = value.rules;
    if (!isRecord(rules)) throw new ConfigError('rules', 'must be an object');
    if (!Array.isArray(rules.patterns)) throw new ConfigError('rules.patterns', 'must be an array');
    config.rules = {
      mode: parseMode(rules.mode, 'rules.mode'),
      patterns: rules.patterns.map((p, i) => parseUriMatch(p, `rules.patterns[${i}]`)),
    };
  }

  if (value.client !== undefined) {
    const client = value.client;
    if (!isRecord(client)) throw new ConfigError('client', 'must be an object');
    config.client = {
      connections: optionalNumber(client, 'connections', 'client.connections'),
      keepAliveTimeout: optionalNumber(client, 'keepAliveTimeout', 'client.keepAliveTimeout'),
      headersTimeout: optionalNumber(client, 'headersTimeout', 'client.headersTimeout'),
      bodyTimeout: optionalNumber(client, 'bodyTimeout', 'client.bodyTimeout'),
    };
  }

  return config;
}

/** Read and validate a config file. Returns null when the file does not exist. */
export function readConfigFile(filePath: string): FileConfig | null {
  if (!fs.existsSync(filePath)) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (err) {
    throw new ConfigError(filePath, `invalid JSON: ${errorMessage(err)}`);
  }
  return parseFileConfig(parsed);
}

/** Command-line flags win over the file. */
export function applyCliOverrides(file: FileConfig, cli: CliOptions): FileConfig {
  if (cli.allow && cli.deny) {
    throw new ConfigError('--allow/--deny', 'cannot whitelist and blacklist at the same time');
  }

  const config: FileConfig = { ...file };
  if (cli.listen) config.listen = cli.listen;
  if (cli.to) config.redirect = { to: cli.to };
  if (cli.logTraffic) config.logTraffic = true;
  if (cli.logLevel) config.logLevel = cli.logLevel;

  const addresses = cli.allow ?? cli.deny;
  if (addresses) {
    config.filter = {
      mode: cli.allow ? 'whitelist' : 'blacklist',
      addresses,
      matchPort: cli.ignorePort ? false : file.filter?.matchPort,
    };
  } else if (cli.ignorePort && config.filter) {
    config.filter = { ...config.filter, matchPort: false };
  }

  return config;
}

// --- handler assembly ---

function logRejection(scope: string) {
  return (from: SocketAddr, request: Readonly<ProxyRequest>) => {
    log.info(`${scope} rejected ${formatAddr(from)} ${request.method} ${request.uri.href}`);
  };
}

/**
 * Build the root handler a config describes: a redirect, wrapped in the
 * URI rules filter, wrapped in the address filter. Host names in the
 * address list are resolved here, once.
 */
export async function buildHandler(config: FileConfig): Promise<RequestHandler> {
  if (!config.redirect) throw new ConfigError('redirect.to', 'is required');

  let handler: RequestHandler;
  try {
    handler = Redirect.changeAuthority(config.redirect.to);
  } catch (err) {
    throw new ConfigError('redirect.to', errorMessage(err));
  }

  if (config.rules) {
    const logic = new UriPatternFilter(config.rules.patterns, config.rules.mode === 'blacklist');
    handler = new Filter(handler, logic, { onReject: logRejection('rules') });
  }

  if (config.filter) {
    const { mode, addresses, matchPort } = config.filter;
    let resolved: SocketAddr[][];
    try {
      resolved = await Promise.all(addresses.map((address) => resolveAddrs(address)));
    } catch (err) {
      throw new ConfigError('filter.addresses', errorMessage(err));
    }
    const logic = new AddrLookupFilter(resolved.flat(), mode === 'blacklist', { matchPort });
    log.debug(`${mode} of ${logic.size} address(es)`);
    handler = new Filter(handler, logic, { onReject: logRejection(mode) });
  }

  return handler;
}

/**
 * Load a module whose default export is a root handler, or a function
 * (possibly async) returning one. TypeScript modules load through jiti.
 */
export async function loadHandlerModule(modulePath: string): Promise<RequestHandler> {
  const resolvedPath = path.resolve(modulePath);

  let loaded: unknown;
  try {
    loaded = await jiti.import(resolvedPath, { default: true });
    if (typeof loaded === 'function') loaded = await loaded();
  } catch (err) {
    throw new ConfigError('--handler', `failed to load ${modulePath}: ${errorMessage(err)}`);
  }

  if (!isRequestHandler(loaded)) {
    throw new ConfigError('--handler', `${modulePath} does not export a request handler`);
  }
  return loaded;
}

// --- failure responses ---

function jsonResponse(status: number, body: Record<string, string>): ProxyResponse {
  const text = JSON.stringify(body);
  return {
    status,
    headers: { 'content-type': 'application/json', 'content-length': String(Buffer.byteLength(text)) },
    body: text,
  };
}

/**
 * Status mapping used by the CLI: rejected requests get 403, anything the
 * upstream side failed with gets 502.
 */
export function errorResponse(error: Error): ProxyResponse {
  let cause: Error = error;
  while (cause instanceof FilterInnerError) cause = cause.inner;

  if (cause instanceof FilteredOutError) {
    return jsonResponse(403, { error: 'Forbidden', details: cause.message });
  }
  return jsonResponse(502, { error: 'Proxy error', details: cause.message });
}

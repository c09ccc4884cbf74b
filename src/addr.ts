import net from 'net';
import { lookup } from 'dns/promises';

/** Remote or local end of a TCP connection. `ip` is always normalized. */
export interface SocketAddr {
  ip: string;
  port: number;
}

export class AddrParseError extends Error {
  readonly input: string;

  constructor(input: string, reason: string) {
    super(`invalid socket address "${input}": ${reason}`);
    this.name = 'AddrParseError';
    this.input = input;
  }
}

const MAPPED_IPV4 = /^::ffff:([0-9a-f]{1,4}):([0-9a-f]{1,4})$/;

/**
 * Canonical text form of an IP address. IPv4-mapped IPv6 addresses (what a
 * dual-stack listener reports for IPv4 peers) collapse to plain IPv4, so
 * `::ffff:127.0.0.1` and `127.0.0.1` name the same peer.
 */
export function normalizeIp(ip: string): string {
  if (net.isIPv4(ip)) return ip;
  if (!net.isIPv6(ip)) throw new AddrParseError(ip, 'not an IP address');

  const zoneAt = ip.indexOf('%');
  const bare = zoneAt === -1 ? ip : ip.slice(0, zoneAt);
  const zone = zoneAt === -1 ? '' : ip.slice(zoneAt);
  const canonical = new URL(`http://[${bare}]`).hostname.slice(1, -1);

  const mapped = MAPPED_IPV4.exec(canonical);
  if (mapped) {
    const hi = parseInt(mapped[1], 16);
    const lo = parseInt(mapped[2], 16);
    return `${hi >> 8}.${hi & 0xff}.${lo >> 8}.${lo & 0xff}`;
  }
  return canonical + zone;
}

export function formatAddr(addr: SocketAddr): string {
  return addr.ip.includes(':') ? `[${addr.ip}]:${addr.port}` : `${addr.ip}:${addr.port}`;
}

/** Lookup key for address sets; with `matchPort` off only the IP counts. */
export function addrKey(addr: SocketAddr, matchPort = true): string {
  const ip = normalizeIp(addr.ip);
  return matchPort ? formatAddr({ ip, port: addr.port }) : ip;
}

function parsePort(input: string, text: string): number {
  if (!/^\d{1,5}$/.test(text)) throw new AddrParseError(input, 'port must be a number');
  const port = parseInt(text, 10);
  if (port > 65535) throw new AddrParseError(input, 'port out of range');
  return port;
}

function splitHostPort(input: string): { host: string; port: number } {
  const bracketed = /^\[([^\]]+)\]:([^:]*)$/.exec(input);
  if (bracketed) {
    return { host: bracketed[1], port: parsePort(input, bracketed[2]) };
  }

  const colon = input.lastIndexOf(':');
  if (colon <= 0) throw new AddrParseError(input, 'expected host:port');

  const host = input.slice(0, colon);
  if (host.includes(':')) throw new AddrParseError(input, 'IPv6 addresses must be bracketed');
  return { host, port: parsePort(input, input.slice(colon + 1)) };
}

/** Parse an `ip:port` or `[ipv6]:port` literal. Host names are rejected. */
export function parseAddr(input: string): SocketAddr {
  const { host, port } = splitHostPort(input.trim());
  if (!net.isIP(host)) throw new AddrParseError(input, 'expected an IP address');
  return { ip: normalizeIp(host), port };
}

/**
 * Like {@link parseAddr}, but a host name is resolved to every address DNS
 * returns for it, e.g. `localhost:8000` yields both loopback addresses.
 */
export async function resolveAddrs(input: string): Promise<SocketAddr[]> {
  const { host, port } = splitHostPort(input.trim());
  if (net.isIP(host)) return [{ ip: normalizeIp(host), port }];

  const records = await lookup(host, { all: true });
  const seen = new Set<string>();
  const addrs: SocketAddr[] = [];
  for (const record of records) {
    const addr = { ip: normalizeIp(record.address), port };
    const key = addrKey(addr);
    if (seen.has(key)) continue;
    seen.add(key);
    addrs.push(addr);
  }
  return addrs;
}

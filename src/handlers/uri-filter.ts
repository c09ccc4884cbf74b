import { minimatch } from 'minimatch';
import type { SocketAddr } from '../addr.js';
import type { FilterLogic } from './filter.js';
import type { ProxyRequest } from './types.js';

export type MatchType = 'substring' | 'regex' | 'glob';

export const MATCH_TYPES: readonly MatchType[] = ['substring', 'regex', 'glob'];

export interface UriMatch {
  pattern: string;
  type?: MatchType;
  methods?: string[];
}

export class InvalidPatternError extends Error {
  readonly pattern: string;

  constructor(pattern: string, cause: unknown) {
    super(`invalid regex pattern "${pattern}"`, { cause });
    this.name = 'InvalidPatternError';
    this.pattern = pattern;
  }
}

type CompiledMatch = {
  test: (url: string) => boolean;
  methods: string[];
};

function compile(match: UriMatch): CompiledMatch {
  const methods = (match.methods ?? []).map((m) => m.toUpperCase());
  const { pattern } = match;

  switch (match.type ?? 'substring') {
    case 'regex': {
      let re: RegExp;
      try {
        re = new RegExp(pattern);
      } catch (err) {
        throw new InvalidPatternError(pattern, err);
      }
      return { test: (url) => re.test(url), methods };
    }
    case 'glob':
      return { test: (url) => minimatch(url, pattern), methods };
    case 'substring':
    default:
      return { test: (url) => url.includes(pattern), methods };
  }
}

function matchesMethod(method: string, methods: string[]): boolean {
  if (methods.length === 0) return true;
  return methods.includes(method.toUpperCase());
}

/**
 * Admits or rejects by request URL and method. As a blacklist a request
 * matching any entry is rejected; as a whitelist it must match one.
 */
export class UriPatternFilter implements FilterLogic {
  readonly isBlacklist: boolean;
  private readonly compiled: CompiledMatch[];

  constructor(matches: UriMatch[], isBlacklist: boolean) {
    this.isBlacklist = isBlacklist;
    this.compiled = matches.map(compile);
  }

  filter(_from: SocketAddr, request: Readonly<ProxyRequest>): boolean {
    const url = request.uri.href;
    const hit = this.compiled.some((m) => matchesMethod(request.method, m.methods) && m.test(url));
    return this.isBlacklist !== hit;
  }
}

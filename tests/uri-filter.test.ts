import { describe, it, expect } from 'vitest';
import { InvalidPatternError, UriPatternFilter, type UriMatch } from '../src/handlers/uri-filter.js';
import { makeRequest } from './helpers.js';

const from = { ip: '127.0.0.1', port: 9000 };

function request(url: string, method = 'GET') {
  return makeRequest({ uri: new URL(url), method });
}

function admits(match: UriMatch, url: string, method = 'GET') {
  return new UriPatternFilter([match], false).filter(from, request(url, method));
}

describe('UriPatternFilter matching', () => {
  it('matches by substring pattern (default)', () => {
    expect(admits({ pattern: 'api.example.com' }, 'https://api.example.com/users')).toBe(true);
    expect(admits({ pattern: 'api.example.com' }, 'https://other.com')).toBe(false);
  });

  it('matches by regex pattern', () => {
    const match: UriMatch = { pattern: '\\.json$', type: 'regex' };
    expect(admits(match, 'https://api.com/data.json')).toBe(true);
    expect(admits(match, 'https://api.com/data.xml')).toBe(false);
  });

  it('rejects an invalid regex up front', () => {
    expect(() => new UriPatternFilter([{ pattern: '[invalid', type: 'regex' }], false)).toThrow(InvalidPatternError);
  });

  it('matches by glob pattern', () => {
    const match: UriMatch = { pattern: '**/api/**', type: 'glob' };
    expect(admits(match, 'https://example.com/api/users')).toBe(true);
    expect(admits(match, 'https://example.com/static/img.png')).toBe(false);
  });

  it('filters by method, case-insensitively', () => {
    const match: UriMatch = { pattern: 'api', methods: ['post'] };
    expect(admits(match, 'https://api.com', 'POST')).toBe(true);
    expect(admits(match, 'https://api.com', 'get')).toBe(false);
  });

  it('matches every method when none are listed', () => {
    expect(admits({ pattern: 'api', methods: [] }, 'https://api.com', 'DELETE')).toBe(true);
  });
});

describe('UriPatternFilter', () => {
  it('as a whitelist admits only matching requests', () => {
    const logic = new UriPatternFilter([{ pattern: '/api/' }], false);
    expect(logic.filter(from, request('http://old.example/api/users'))).toBe(true);
    expect(logic.filter(from, request('http://old.example/admin'))).toBe(false);
  });

  it('as a blacklist rejects matching requests', () => {
    const logic = new UriPatternFilter([{ pattern: '/admin', methods: ['DELETE'] }], true);
    expect(logic.filter(from, request('http://old.example/admin/1', 'DELETE'))).toBe(false);
    expect(logic.filter(from, request('http://old.example/admin/1', 'GET'))).toBe(true);
  });

  it('matches against the full request URL', () => {
    const logic = new UriPatternFilter([{ pattern: '^https://secure\\.', type: 'regex' }], false);
    expect(logic.filter(from, request('https://secure.example/x'))).toBe(true);
    expect(logic.filter(from, request('http://secure.example/x'))).toBe(false);
  });

  it('admits everything as an empty blacklist and nothing as an empty whitelist', () => {
    expect(new UriPatternFilter([], true).filter(from, request('http://old.example/'))).toBe(true);
    expect(new UriPatternFilter([], false).filter(from, request('http://old.example/'))).toBe(false);
  });

  it('compiles patterns when constructed', () => {
    expect(() => new UriPatternFilter([{ pattern: '(', type: 'regex' }], false)).toThrow('invalid regex pattern "("');
  });
});

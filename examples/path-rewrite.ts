// relaykit --handler examples/path-rewrite.ts
//
// A redirect built from a plain function plus a URI rule filter: /api/*
// requests go to api.internal:8081 under /v2, anything else is rejected.
import { Filter, Redirect, UriPatternFilter, redirectFn } from '../src/index.js';

const rewrite = redirectFn((uri) => {
  uri.host = 'api.internal:8081';
  uri.pathname = uri.pathname.replace(/^\/api\//, '/v2/');
});

export default new Filter(
  new Redirect(rewrite),
  new UriPatternFilter([{ pattern: '/api/', type: 'substring' }], false),
);

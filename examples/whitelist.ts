// relaykit --handler examples/whitelist.ts
//
// Only callers on localhost:8000 (every address it resolves to) or
// 255.255.255.255:8000 get through; everything is sent on to example.com.
import { Filter, Redirect, formatAddr, parseAddr, resolveAddrs, type SocketAddr } from '../src/index.js';

export default async function createHandler() {
  const whitelist: SocketAddr[] = [...(await resolveAddrs('localhost:8000')), parseAddr('255.255.255.255:8000')];

  return Filter.addrWhitelist(Redirect.changeAuthority('example.com'), whitelist, {
    onReject: (from) => console.log(`blocked ${formatAddr(from)}`),
  });
}

#!/usr/bin/env node
import { Command, Option } from 'commander';
import chalk from 'chalk';
import { parseAddr } from './addr.js';
import {
  applyCliOverrides,
  buildHandler,
  DEFAULT_CONFIG_PATH,
  DEFAULT_LISTEN,
  errorResponse,
  loadHandlerModule,
  readConfigFile,
  type CliOptions,
} from './config.js';
import { BindListenerError } from './errors.js';
import { errorMessage, LOG_LEVELS, setLogLevel } from './log.js';
import { runProxy } from './proxy.js';

const program = new Command('relaykit');

program
  .description('Forwarding HTTP proxy built from composable request handlers')
  .option('-c, --config <path>', 'JSON config file', DEFAULT_CONFIG_PATH)
  .option('-l, --listen <addr>', `listen address (default ${DEFAULT_LISTEN})`)
  .option('-t, --to <authority>', 'upstream host[:port] every request is redirected to')
  .option('--allow <addr...>', 'admit only these caller addresses (ip:port or host:port)')
  .option('--deny <addr...>', 'reject these caller addresses')
  .option('--ignore-port', 'match caller addresses by IP only')
  .option('--handler <module>', 'module whose default export is the root request handler')
  .option('--log-traffic', 'log every proxied request')
  .addOption(new Option('--log-level <level>', 'log verbosity').choices(LOG_LEVELS))
  .parse(process.argv);

const opts = program.opts<CliOptions>();
let listen = DEFAULT_LISTEN;

function isAddrInUse(err: unknown): boolean {
  return (
    err instanceof BindListenerError &&
    'code' in err.cause &&
    err.cause.code === 'EADDRINUSE'
  );
}

async function main() {
  const configPath = opts.config ?? DEFAULT_CONFIG_PATH;
  const fileConfig = readConfigFile(configPath);
  if (!fileConfig && program.getOptionValueSource('config') !== 'default') {
    throw new Error(`config file ${configPath} not found`);
  }

  const config = applyCliOverrides(fileConfig ?? {}, opts);
  setLogLevel(config.logLevel ?? 'info');

  if (fileConfig) {
    console.log(chalk.gray(`  Loaded config from ${configPath}`));
  }

  const handler = opts.handler ? await loadHandlerModule(opts.handler) : await buildHandler(config);
  listen = config.listen ?? DEFAULT_LISTEN;

  const controller = new AbortController();
  let shuttingDown = false;
  const shutdown = () => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log('\n  Shutting down...');
    controller.abort();
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await runProxy(
    {
      listenOn: parseAddr(listen),
      handler,
      client: config.client,
      mapError: errorResponse,
      logTraffic: config.logTraffic,
    },
    {
      signal: controller.signal,
      onListening: () => {
        const target = opts.handler ? `handler ${opts.handler}` : `http://${config.redirect?.to}`;
        console.log(chalk.green(`  ✓ Proxy running on http://${listen} → ${target}`));
      },
    },
  );
}

main().catch((err: unknown) => {
  if (isAddrInUse(err)) {
    console.error(chalk.red(`\n  ✗ ${listen} is already in use.`));
  } else {
    console.error(chalk.red('  ✗ Failed to start:'), errorMessage(err));
  }
  process.exit(1);
});

#!/usr/bin/env node

/**
 * Light Deck
 *
 * Dashboard for a home lighting bridge. Serves a server-rendered page and
 * wires its buttons up over a WebSocket session.
 *
 * Usage:
 *   light-deck                     # Use config.yml in current directory
 *   light-deck --config ./my.yml   # Use a specific config file
 */

import { createAppState } from './app-state';
import { loadConfig, resolveConfigRelative } from './config';
import { buildDashboardPage } from './dashboard';
import { loadBridgeSnapshot } from './hue/bridge-snapshot';
import { UnlinkedLightControl } from './hue/lights';
import { getLogger, initLogger } from './logger';
import { PersistConfig, UserID, defaultPersistConfig, setLightGroup } from './persist-config';
import { DashboardServer } from './server/web-server';

/** The dashboard serves a single local user until sessions carry an identity */
export const LOCAL_USER_ID: UserID = 'local';

interface CliArgs {
  configPath?: string;
  help: boolean;
}

function parseArgs(argv: string[]): CliArgs {
  const args: CliArgs = { help: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--config' && i + 1 < argv.length) {
      args.configPath = argv[++i];
    } else if (arg === '--help' || arg === '-h') {
      args.help = true;
    }
  }
  return args;
}

function printUsage(): void {
  console.log('');
  console.log('  Light Deck');
  console.log('  Dashboard for a home lighting bridge');
  console.log('');
  console.log('  Usage: light-deck [--config <path>]');
  console.log('');
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    printUsage();
    return;
  }

  const config = loadConfig(args.configPath);
  initLogger(config.logging);
  const log = getLogger('Main');

  const snapshotPath = resolveConfigRelative(args.configPath, config.bridge.configPath);
  const response = loadBridgeSnapshot(snapshotPath);
  if (!response.whitelisted) {
    throw new Error(
      `[Bridge] ${snapshotPath} holds the unauthenticated config of "${response.config.name}" ` +
      `(API ${response.config.apiVersion}); pair a user with the bridge first`,
    );
  }
  log.info({ bridge: response.config.name, bridgeID: response.config.bridgeID }, 'Bridge config loaded');

  let persistConfig: PersistConfig = defaultPersistConfig;
  for (const [groupName, members] of Object.entries(config.groups)) {
    persistConfig = setLightGroup(persistConfig, groupName, members);
  }

  const app = createAppState(response.config, persistConfig);
  const lightControl = new UnlinkedLightControl();

  const server = new DashboardServer({
    buildPage: page => buildDashboardPage(page, { app, lightControl, userID: LOCAL_USER_ID }),
    title: config.ui.title,
    pendingPageTtlMs: config.session.pendingPageTtlMs,
    elementQueryTimeoutMs: config.session.elementQueryTimeoutMs,
  });
  await server.start(config.server.port, config.server.listenAddress);

  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down');
    server.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ error: err instanceof Error ? err.message : String(err) }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
  });
}

#!/usr/bin/env node

/**
 * alarm-server: alarm bus, liveness watchdogs and kill-switch gateway,
 * served to AI agents over MCP (stdio) and to other processes over WebSocket.
 */

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { ConfigEnv } from './config/loader.js';
import { VERSION } from './constants.js';
import { KillswitchRuntime } from './runtime.js';
import { createMcpServer } from './server.js';
import { Logger } from './utils/logger.js';
import { printStartupChecks, runStartupChecks } from './utils/startup-check.js';

interface CliOptions {
  configPath?: string;
  port?: string;
  verbose: boolean;
}

const HELP = `
alarm-server - alarm bus and liveness watchdogs for a kill switch

Usage: alarm-server [options]

Options:
  --config <path>      Path to a YAML config file
  --port <port>        Gateway port (0 picks a free port)
  --verbose            Enable debug logging
  --version            Show version number
  --help               Show this help message

Environment variables:
  KILLSWITCH_CONFIG          Same as --config
  KILLSWITCH_GATEWAY_PORT    Same as --port
  KILLSWITCH_ADMIN_TOKEN     Token required by gateway force_clear
  KILLSWITCH_LOG_LEVEL       debug, info, warn or error
`;

// --- CLI argument parsing ---
function parseArgs(argv: string[]): CliOptions {
  if (argv.includes('--help') || argv.includes('-h')) {
    console.error(HELP);
    process.exit(0);
  }

  if (argv.includes('--version') || argv.includes('-v')) {
    console.error(VERSION);
    process.exit(0);
  }

  const options: CliOptions = { verbose: false };
  for (let i = 0; i < argv.length; i++) {
    switch (argv[i]) {
      case '--config':
        options.configPath = argv[++i];
        break;
      case '--port':
        options.port = argv[++i];
        break;
      case '--verbose':
        options.verbose = true;
        break;
    }
  }
  return options;
}

const cli = parseArgs(process.argv.slice(2));

const env: ConfigEnv = { ...process.env };
if (cli.port !== undefined) env.KILLSWITCH_GATEWAY_PORT = cli.port;
if (cli.verbose) env.KILLSWITCH_LOG_LEVEL = 'debug';

// Startup self-test
const bootLogger = new Logger({ level: cli.verbose ? 'debug' : 'info' });
const startupResult = runStartupChecks({ configPath: cli.configPath, env });
printStartupChecks(startupResult, bootLogger);
if (!startupResult.passed || !startupResult.config) {
  process.exit(1);
}

const config = startupResult.config;
const runtime = new KillswitchRuntime(config);
const log = runtime.logger;
const server = createMcpServer(runtime, log);

async function shutdown(signal: string): Promise<void> {
  log.info(`Received ${signal}, shutting down...`);
  await runtime.stop();
  await server.close();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal)
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        log.error('Shutdown failed', { error });
        process.exit(1);
      });
  });
}

// Start
async function main(): Promise<void> {
  log.info(`Starting alarm-server v${VERSION}`, { config: config.name });
  log.info(`Watchdogs: ${config.watchdogs.map(w => w.alarmName).join(', ') || 'none'}`);
  log.info(`Meta alarms: ${config.metaAlarms.map(m => m.name).join(', ') || 'none'}`);

  const { gatewayPort } = await runtime.start();
  if (gatewayPort !== null) {
    log.info(`Gateway: ws://${config.gateway.host}:${gatewayPort}`);
  }

  await server.connect(new StdioServerTransport());
}

main().catch((error: unknown) => {
  log.error('Failed to start', { error });
  process.exit(1);
});

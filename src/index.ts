#!/usr/bin/env node

/**
 * rf-telemetry-hub
 *
 * Holds one real-time stream (SSE or WebSocket) per wireless-microphone
 * device against the vendor API and fans device updates out to browser
 * viewers over WebSockets.
 *
 * Usage:
 *   rf-telemetry-hub                       # Use rf-telemetry.yml in current directory
 *   rf-telemetry-hub --config ./my.yml     # Use a specific config file
 *   rf-telemetry-hub --port 9090           # Override the HTTP/WebSocket port
 *   rf-telemetry-hub --verbose             # Debug logging
 *   rf-telemetry-hub --status [--verbose]  # Print stored connection status and exit
 */

import { loadConfig } from './config';
import { AppConfig } from './config-schema';
import { ConfigError, errorMessage } from './errors';
import { initLogger, getLogger } from './logger';
import { createStore, TelemetryService } from './service';
import { formatConsoleReport, summarize } from './status-reporter';

export interface CliOptions {
  configPath?: string;
  port?: number;
  verbose: boolean;
  status: boolean;
  help: boolean;
}

export function parseArgs(argv: string[]): CliOptions {
  const options: CliOptions = { verbose: false, status: false, help: false };

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];
    switch (arg) {
      case '--config':
      case '-c':
        options.configPath = argv[++i];
        if (!options.configPath) throw new ConfigError('--config requires a file path');
        break;
      case '--port':
      case '-p': {
        const port = Number.parseInt(argv[++i] ?? '', 10);
        if (!Number.isInteger(port) || port < 0 || port > 65535) {
          throw new ConfigError('--port requires a port number (0-65535)');
        }
        options.port = port;
        break;
      }
      case '--verbose':
      case '-v':
        options.verbose = true;
        break;
      case '--status':
        options.status = true;
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new ConfigError(`Unknown option: ${arg}`);
    }
  }
  return options;
}

function printHelp(): void {
  console.log('');
  console.log('  rf-telemetry-hub');
  console.log('  Real-time wireless device telemetry relay');
  console.log('');
  console.log('  Options:');
  console.log('    --config, -c <path>   Path to config YAML file (default ./rf-telemetry.yml)');
  console.log('    --port, -p <port>     HTTP/WebSocket port (default 8080)');
  console.log('    --verbose, -v         Debug logging; with --status, per-device detail');
  console.log('    --status              Print stored connection status and exit');
  console.log('    --help, -h            Show this help');
  console.log('');
}

async function printStatus(config: AppConfig, verbose: boolean): Promise<void> {
  const states = await createStore(config).list();
  const summary = summarize(states, config.staleAfterMs);
  console.log(formatConsoleReport(summary, states, verbose));
}

async function main(): Promise<void> {
  const options = parseArgs(process.argv);
  if (options.help) {
    printHelp();
    return;
  }

  const config = loadConfig(options.configPath);
  if (options.port !== undefined) config.server.port = options.port;
  initLogger({ level: options.verbose ? 'debug' : config.logging.level });
  const log = getLogger('Main');

  if (options.status) {
    await printStatus(config, options.verbose);
    return;
  }

  const service = new TelemetryService(config);

  let shuttingDown = false;
  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');
    service.stop()
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        log.error({ error: errorMessage(err) }, 'Shutdown failed');
        process.exit(1);
      });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  await service.start();
}

// Only run main() when this file is the entry point (not when imported for testing)
if (require.main === module) {
  main().catch((err: unknown) => {
    console.error(`[Error] ${errorMessage(err)}`);
    process.exit(1);
  });
}

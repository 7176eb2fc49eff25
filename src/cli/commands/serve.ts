/**
 * Serve command - Load the ledger and start the HTTP API
 */

import { Command } from '../command.js';
import { loadConfig } from '../../config.js';
import { Suits } from '../../suits.js';
import { LedgerFileStore, LEDGER_FILE } from '../../store/ledger-store.js';
import { SuitsWebServer } from '../../web/server.js';
import { join } from 'path';

export class ServeCommand extends Command {
  constructor() {
    super('serve', 'Start the ledger API server');
  }

  async execute(args: string[]): Promise<void> {
    const { options } = this.parseArgs(args);

    if (options.help || options.h) {
      this.showHelp();
      return;
    }

    const config = loadConfig();
    const portOption = this.stringOption(options, 'port');
    const port = portOption === undefined ? config.port : Number.parseInt(portOption, 10);
    if (!Number.isSafeInteger(port) || port <= 0 || port > 65535) {
      throw new Error(`Invalid port: ${portOption}`);
    }

    const ledger = new Suits({
      store: new LedgerFileStore(join(config.dataDir, LEDGER_FILE))
    });

    const server = new SuitsWebServer({
      ledger,
      port,
      production: config.production,
      allowedOrigins: config.allowedOrigins,
      trustProxy: config.trustProxy,
      enableFaucet: config.enableFaucet,
      signatureWindowMs: config.signatureWindowMs
    });

    await server.start();

    const shutdown = () => {
      console.log('\n[Server] Shutting down...');
      ledger.close();
      server.stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          console.error('[Server] Shutdown failed:', error);
          process.exit(1);
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  }

  showHelp(): void {
    console.log(`
USAGE:
  suits serve [--port N]

Loads <data dir>/${LEDGER_FILE} (SUITS_DATA_DIR, default ~/.suits) and
serves the JSON API. Every committed transaction is saved back to disk.

OPTIONS:
  --port N      Listen port (default: PORT or 3000)
  -h, --help    Show this help message
`);
  }
}

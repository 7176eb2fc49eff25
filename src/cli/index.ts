#!/usr/bin/env node
/**
 * Suits CLI - Command-line interface for the Suits ledger
 */

import { Command } from './command.js';
import { IdentityCommand } from './commands/identity.js';
import { ServeCommand } from './commands/serve.js';
import { SealCommand } from './commands/seal.js';
import { getErrorMessage } from '../web/routes/validation.js';

const VERSION = '0.1.0';

async function main() {
  const args = process.argv.slice(2);

  // Show help if no arguments
  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return;
  }

  if (args[0] === '--version' || args[0] === '-v') {
    console.log(`Suits CLI v${VERSION}`);
    return;
  }

  const commandName = args[0];
  const commandArgs = args.slice(1);

  const commands: Map<string, Command> = new Map<string, Command>([
    ['serve', new ServeCommand()],
    ['identity', new IdentityCommand()],
    ['seal', new SealCommand()]
  ]);

  const command = commands.get(commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.error('Run "suits --help" for usage information');
    process.exit(1);
  }

  await command.execute(commandArgs);
}

function showHelp() {
  console.log(`
Suits CLI v${VERSION}
Social ledger: profiles, suits, interactions, tips and encrypted chats

USAGE:
  suits <command> [options]

COMMANDS:
  serve          Start the ledger API server
  identity       Manage local signing identities
  seal           Encrypt a chat message for a recipient

OPTIONS:
  -h, --help     Show this help message
  -v, --version  Show version information

EXAMPLES:
  # Create an identity (its public key is your ledger address)
  suits identity create alice

  # Start the API on port 8080
  suits serve --port 8080

  # Seal a message for another address
  suits seal a1b2c3d4e5f6... "hello"

For detailed command help:
  suits <command> --help
`);
}

main().catch((error: unknown) => {
  console.error(`Error: ${getErrorMessage(error)}`);
  if (process.env.DEBUG && error instanceof Error) {
    console.error(error.stack);
  }
  process.exit(1);
});

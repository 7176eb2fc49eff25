/**
 * Identity command - Manage local signing identities
 */

import { Command } from '../command.js';
import { IdentityManager } from '../identity-manager.js';

export class IdentityCommand extends Command {
  constructor() {
    super('identity', 'Manage local signing identities');
  }

  async execute(args: string[]): Promise<void> {
    const { positional, options } = this.parseArgs(args);

    if (options.help || options.h) {
      this.showHelp();
      return;
    }

    const subcommand = positional[0];

    if (!subcommand) {
      this.showHelp();
      return;
    }

    const identityManager = new IdentityManager();

    switch (subcommand) {
      case 'create':
        this.create(identityManager, positional[1] || 'default', options.default !== false);
        break;

      case 'list':
        this.list(identityManager);
        break;

      case 'show':
        this.show(identityManager, positional[1], options.secret === true);
        break;

      default:
        this.showHelp();
        throw new Error(`Unknown subcommand: ${subcommand}`);
    }
  }

  private create(manager: IdentityManager, name: string, setDefault: boolean): void {
    const identity = manager.createIdentity(name, setDefault);

    console.log('✅ Identity created successfully!');
    console.log('');
    console.log(`Name:    ${identity.name}`);
    console.log(`Address: ${identity.publicKey}`);
    console.log('');
    console.log('⚠️  IMPORTANT: Back up your secret key!');
    console.log('');
    console.log(`Secret Key: ${identity.secretKey}`);
    console.log('');
    console.log('Anyone with this secret key can sign ledger transactions as you.');
    console.log('');

    if (setDefault) {
      console.log(`✓ Set as default identity`);
    }
  }

  private list(manager: IdentityManager): void {
    const identities = manager.listIdentities();
    const defaultIdentity = manager.getDefaultIdentityName();

    if (identities.length === 0) {
      console.log('No identities found. Create one with: suits identity create');
      return;
    }

    console.log('');
    console.log('Identities:');
    console.log('');

    for (const identity of identities) {
      const isDefault = identity.name === defaultIdentity ? ' (default)' : '';
      const date = new Date(identity.created).toLocaleString();

      console.log(`  ${identity.name}${isDefault}`);
      console.log(`    Address: ${identity.publicKey}`);
      console.log(`    Created: ${date}`);
      console.log('');
    }
  }

  private show(manager: IdentityManager, name: string | undefined, showSecret: boolean): void {
    const identity = manager.getIdentity(name);
    const isDefault = identity.name === manager.getDefaultIdentityName();
    const date = new Date(identity.created).toLocaleString();

    console.log('');
    console.log(`Identity: ${identity.name}${isDefault ? ' (default)' : ''}`);
    console.log('');
    console.log(`Address: ${identity.publicKey}`);
    console.log(`Created: ${date}`);
    console.log('');

    if (showSecret) {
      console.log('⚠️  SECRET KEY (keep safe!):');
      console.log(identity.secretKey);
      console.log('');
    } else {
      console.log('Use --secret to show secret key');
      console.log('');
    }
  }

  showHelp(): void {
    console.log(`
USAGE:
  suits identity <subcommand> [options]

SUBCOMMANDS:
  create [name]              Create a new identity
  list                       List all identities
  show [name]                Show identity details

OPTIONS:
  --secret      Show secret key
  --no-default  Do not make the new identity the default
  -h, --help    Show this help message

EXAMPLES:
  # Create a named identity
  suits identity create alice

  # Show identity with secret
  suits identity show alice --secret
`);
  }
}

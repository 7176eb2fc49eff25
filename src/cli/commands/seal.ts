/**
 * Seal command - Encrypt a chat message client-side
 */

import { Command } from '../command.js';
import { Crypto } from '../../crypto.js';
import { sealMessage } from '../../client/sealed-message.js';

export class SealCommand extends Command {
  constructor() {
    super('seal', 'Encrypt a message for a recipient address');
  }

  async execute(args: string[]): Promise<void> {
    const { positional, options } = this.parseArgs(args);

    if (options.help || options.h || positional.length === 0) {
      this.showHelp();
      return;
    }

    const recipient = this.requireArg(positional, 0, 'recipient');
    const message = positional.slice(1).join(' ');
    if (!Crypto.isHex32(recipient)) {
      throw new Error('Recipient must be a 64-character lowercase hex address');
    }
    if (message.length === 0) {
      throw new Error('Missing required argument: <message>');
    }

    const sealed = sealMessage(message, recipient);

    console.log(JSON.stringify({
      ciphertext: Crypto.toHex(sealed.ciphertext),
      contentHash: Crypto.toHex(sealed.contentHash)
    }, null, 2));
  }

  showHelp(): void {
    console.log(`
USAGE:
  suits seal <recipient> <message>

Prints the ciphertext and content hash (hex) to submit with
POST /api/chats/:id/messages.
`);
  }
}

import { readFileSync, writeFileSync, existsSync, mkdirSync } from 'fs';
import { join, dirname } from 'path';
import { getSuitsDataDir } from '../config.js';

export const LEDGER_FILE = 'ledger.automerge';

/**
 * Keeps the ledger document (Automerge binary) on disk
 */
export class LedgerFileStore {
  readonly path: string;

  constructor(customPath?: string) {
    this.path = customPath || join(getSuitsDataDir(), LEDGER_FILE);
  }

  /**
   * Read the saved document, or undefined on first start
   */
  load(): Uint8Array | undefined {
    if (!existsSync(this.path)) {
      console.log(`[LedgerStore] No ledger at ${this.path}, starting fresh`);
      return undefined;
    }
    const bytes = new Uint8Array(readFileSync(this.path));
    console.log(`[LedgerStore] ✅ Loaded ${bytes.length} bytes from ${this.path}`);
    return bytes;
  }

  save(snapshot: Uint8Array): void {
    this.ensureDir();
    try {
      writeFileSync(this.path, snapshot);
    } catch (error) {
      console.error(`[LedgerStore] ❌ Failed to save to ${this.path}:`, error);
      throw error;
    }
  }

  private ensureDir(): void {
    const dir = dirname(this.path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }
}

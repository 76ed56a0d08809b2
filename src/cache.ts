/**
 * Process-lifetime cache of loaded tables, keyed by resolved file path.
 * Entries are frozen tables, so every session can share them.
 */

import { resolve } from "node:path";
import type { VisitTable } from "./types.js";

export class TableCache {
  private entries = new Map<string, VisitTable>();

  /** Get the table loaded from this path, or null if it was never loaded. */
  get(path: string): VisitTable | null {
    return this.entries.get(this.key(path)) ?? null;
  }

  set(path: string, table: VisitTable): void {
    this.entries.set(this.key(path), table);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  private key(path: string): string {
    return resolve(path);
  }
}

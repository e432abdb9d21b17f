import { appendFile, mkdir } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { dirname } from 'node:path';

import type { ErrorCode } from '../errors.js';

export type JournalResult = 'created' | 'updated' | 'skipped' | 'dry_run' | 'error';
export type JournalKind = 'folder' | 'dataSource' | 'dataSet' | 'report' | 'reference';

export interface JournalEntry {
  id: string;
  timestamp: string;
  operation: string;
  kind: JournalKind;
  target: string;
  result: JournalResult;
  durationMs?: number;
  errorCode?: ErrorCode;
  message?: string;
  details?: Record<string, unknown>;
}

export interface JournalQuery {
  operation?: string;
  kind?: JournalKind;
  result?: JournalResult;
  since?: string;
  limit?: number;
}

export interface JournalPersistFailure {
  path: string;
  error: unknown;
}

export class DeployJournal {
  private readonly entries: JournalEntry[] = [];
  private persistFailure: JournalPersistFailure | null = null;

  constructor(
    private readonly maxEntries: number,
    private readonly persistPath?: string
  ) {}

  async record(entry: Omit<JournalEntry, 'id' | 'timestamp'>): Promise<JournalEntry> {
    const created: JournalEntry = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      ...entry
    };

    this.entries.push(created);
    if (this.entries.length > this.maxEntries) {
      this.entries.splice(0, this.entries.length - this.maxEntries);
    }

    if (this.persistPath && !this.persistFailure) {
      const line = `${JSON.stringify(created)}\n`;
      try {
        await mkdir(dirname(this.persistPath), { recursive: true });
        await appendFile(this.persistPath, line, 'utf8');
      } catch (error) {
        // Keep deploying; the caller surfaces this once through lastPersistFailure().
        this.persistFailure = { path: this.persistPath, error };
      }
    }

    return created;
  }

  lastPersistFailure(): JournalPersistFailure | null {
    return this.persistFailure;
  }

  query(query: JournalQuery = {}): JournalEntry[] {
    const sinceMs = query.since ? Date.parse(query.since) : Number.NaN;
    const limit = query.limit && Number.isFinite(query.limit) ? Math.max(1, query.limit) : 100;

    const filtered = this.entries.filter((entry) => {
      if (query.operation && entry.operation !== query.operation) {
        return false;
      }
      if (query.kind && entry.kind !== query.kind) {
        return false;
      }
      if (query.result && entry.result !== query.result) {
        return false;
      }
      if (Number.isFinite(sinceMs) && Date.parse(entry.timestamp) < sinceMs) {
        return false;
      }
      return true;
    });

    return filtered.slice(-limit).reverse();
  }

  summarize(): Record<JournalResult, number> {
    const counts: Record<JournalResult, number> = {
      created: 0,
      updated: 0,
      skipped: 0,
      dry_run: 0,
      error: 0
    };
    for (const entry of this.entries) {
      counts[entry.result] += 1;
    }
    return counts;
  }

  size(): number {
    return this.entries.length;
  }
}

import fs from 'fs';
import path from 'path';
import { kMeasurementListSchema, kStoreSchema, type KStore } from '@shared/schema';
import { logger } from '../logger';
import type { Tracer } from './types';

/**
 * K-Factor Store
 * Persists the history of measured calibration constants k as one JSON object:
 *   { "{tracer}_{reconProfile}": [k1, k2, ...] }
 *
 * Keys other than the one being read or appended are carried through verbatim,
 * whatever they hold. Reads and writes are whole-file and synchronous. Two
 * processes appending at the same time race and the last full write wins.
 */

export type StoreLoadResult =
  | { status: 'ok'; store: KStore }
  | { status: 'not-found'; store: KStore }
  | { status: 'parse-error'; store: KStore; error: string };

export type StoreWriteResult =
  | { status: 'ok' }
  | { status: 'write-error'; error: string }
  /** Nothing was written: the file or the touched key cannot be appended to safely */
  | { status: 'skipped'; error: string };

export interface KStoreUpdate {
  store: KStore;
  persistence: StoreWriteResult;
}

export interface KSummary {
  median: number;
  p25: number;
  p75: number;
  n: number;
}

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

export function storeKey(tracer: Tracer, reconProfile: string): string {
  return `${tracer}_${reconProfile}`;
}

/** Percentile with linear interpolation between the closest ranks of sorted values */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 1) return sorted[0];
  const rank = (p / 100) * (sorted.length - 1);
  const lower = Math.floor(rank);
  const upper = Math.ceil(rank);
  return sorted[lower] + (sorted[upper] - sorted[lower]) * (rank - lower);
}

export class KFactorStore {
  private readonly storeFile: string;

  constructor(storeFile: string = path.join('storage', 'k_store.json')) {
    this.storeFile = storeFile;
  }

  get filePath(): string {
    return this.storeFile;
  }

  load(): StoreLoadResult {
    if (!fs.existsSync(this.storeFile)) {
      return { status: 'not-found', store: {} };
    }
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(this.storeFile, 'utf-8'));
      const parsed = kStoreSchema.safeParse(raw);
      if (!parsed.success) {
        const error = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
        logger.warn(`Ignoring malformed k store ${this.storeFile}: ${error}`, 'k-store');
        return { status: 'parse-error', store: {}, error };
      }
      return { status: 'ok', store: parsed.data };
    } catch (err) {
      const error = errorMessage(err);
      logger.warn(`Failed to read k store ${this.storeFile}: ${error}`, 'k-store');
      return { status: 'parse-error', store: {}, error };
    }
  }

  save(store: KStore): StoreWriteResult {
    try {
      const dir = path.dirname(this.storeFile);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
      fs.writeFileSync(this.storeFile, JSON.stringify(store, null, 2), 'utf-8');
      return { status: 'ok' };
    } catch (err) {
      const error = errorMessage(err);
      logger.warn(`Failed to write k store ${this.storeFile}: ${error}`, 'k-store');
      return { status: 'write-error', error };
    }
  }

  /**
   * Append k under (tracer, reconProfile) and persist the whole mapping.
   * The input mapping is left untouched.
   */
  addMeasurement(store: KStore, tracer: Tracer, reconProfile: string, k: number): KStoreUpdate {
    const key = storeKey(tracer, reconProfile);
    const existing = store[key] === undefined ? [] : kMeasurementListSchema.safeParse(store[key]).data;
    if (!existing) {
      const error = `${key} does not hold a list of numbers`;
      logger.warn(`Not recording k in ${this.storeFile}: ${error}`, 'k-store');
      return { store, persistence: { status: 'skipped', error } };
    }
    const next: KStore = { ...store, [key]: [...existing, k] };
    const persistence = this.save(next);
    if (persistence.status === 'ok') {
      logger.info(`Recorded k=${k.toExponential(4)} for ${key} (n=${existing.length + 1})`, 'k-store');
    }
    return { store: next, persistence };
  }

  /**
   * Load the file and append k to it. An unreadable file is left untouched.
   */
  recordMeasurement(tracer: Tracer, reconProfile: string, k: number): KStoreUpdate & { load: StoreLoadResult } {
    const load = this.load();
    if (load.status === 'parse-error') {
      return {
        load,
        store: load.store,
        persistence: { status: 'skipped', error: `K store is unreadable: ${load.error}` },
      };
    }
    return { load, ...this.addMeasurement(load.store, tracer, reconProfile, k) };
  }

  /** Null when the key is missing, empty or does not hold a list of numbers */
  summarize(store: KStore, tracer: Tracer, reconProfile: string): KSummary | null {
    const values = kMeasurementListSchema.safeParse(store[storeKey(tracer, reconProfile)] ?? []).data ?? [];
    if (values.length === 0) return null;
    const sorted = [...values].sort((a, b) => a - b);
    return {
      median: percentile(sorted, 50),
      p25: percentile(sorted, 25),
      p75: percentile(sorted, 75),
      n: sorted.length,
    };
  }

  getSiteSummary(tracer: Tracer, reconProfile: string): { load: StoreLoadResult; summary: KSummary | null } {
    const load = this.load();
    return { load, summary: this.summarize(load.store, tracer, reconProfile) };
  }
}

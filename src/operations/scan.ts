/**
 * Directory scanning for Node.js environments.
 *
 * Provides scanDir() and scanFiles() which sniff every matching file and
 * return a ScanReport. A file that cannot be read is recorded as failed;
 * the scan carries on.
 */

import { readdir } from 'node:fs/promises';
import { join, resolve } from 'node:path';
import { classifyByName } from '../classify.js';
import { matchGlob } from '../glob.js';
import { sniffFile } from './sniff.js';
import type { ScanEntry, ScanOptions, ScanReport } from '../types.js';

// ─── File collection ──────────────────────────────────────────────────────────

async function collectFiles(dir: string, options: ScanOptions): Promise<string[]> {
  const { recursive = true, include, exclude, encryptedOnly = false } = options;
  const results: string[] = [];
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      if (recursive) {
        results.push(...(await collectFiles(fullPath, options)));
      }
    } else if (entry.isFile()) {
      if (exclude?.some(p => matchGlob(entry.name, p))) continue;
      if (include && include.length > 0 && !include.some(p => matchGlob(entry.name, p))) continue;
      if (encryptedOnly && classifyByName(entry.name) === undefined) continue;
      results.push(fullPath);
    }
  }

  return results;
}

// ─── Single-file sniffing ─────────────────────────────────────────────────────

async function scanSingleFile(file: string): Promise<ScanEntry> {
  try {
    const result = await sniffFile(file);
    return { file, success: true, ...result };
  } catch (err) {
    return { file, success: false, error: err instanceof Error ? err.message : String(err) };
  }
}

function isRecognized(entry: ScanEntry): boolean {
  return (
    entry.scheme !== undefined || entry.audioFormat !== undefined || entry.imageMime !== undefined
  );
}

// ─── Concurrency helper ───────────────────────────────────────────────────────

async function runConcurrent<T, R>(
  items: T[],
  concurrency: number,
  fn: (item: T) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const queue = items.entries();

  // Workers share one iterator, so each item is taken exactly once
  const worker = async (): Promise<void> => {
    for (const [index, item] of queue) {
      results[index] = await fn(item);
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, worker));
  return results;
}

const DEFAULT_CONCURRENCY = 4;

/**
 * Worker count: a finite value is floored and raised to at least 1,
 * anything else falls back to the default
 */
function resolveConcurrency(value: number | undefined): number {
  if (value === undefined || !Number.isFinite(value)) {
    return DEFAULT_CONCURRENCY;
  }
  return Math.max(1, Math.floor(value));
}

// ─── Public API ───────────────────────────────────────────────────────────────

/**
 * Sniff every file under a directory.
 *
 * @param dirPath  Path to the directory to scan.
 * @param options  Filters and concurrency; recursion is on by default.
 */
export async function scanDir(dirPath: string, options: ScanOptions = {}): Promise<ScanReport> {
  const files = await collectFiles(resolve(dirPath), options);
  return scanFiles(files, options);
}

/**
 * Sniff an explicit list of files. Entries keep the order of `filePaths`.
 */
export async function scanFiles(
  filePaths: string[],
  options: Pick<ScanOptions, 'concurrency'> = {},
): Promise<ScanReport> {
  const timestamp = new Date().toISOString();
  const concurrency = resolveConcurrency(options.concurrency);
  const entries = await runConcurrent(filePaths.map(f => resolve(f)), concurrency, scanSingleFile);

  const failed = entries.filter(e => !e.success).length;
  const recognized = entries.filter(e => e.success && isRecognized(e)).length;

  return {
    timestamp,
    totalFiles: entries.length,
    recognized,
    unrecognized: entries.length - failed - recognized,
    failed,
    entries,
  };
}

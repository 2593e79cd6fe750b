import { fileURLToPath } from 'node:url';
import { setTimeout as delay } from 'node:timers/promises';
import fs from 'node:fs';
import path from 'node:path';
import { homedir } from 'node:os';
import { nanoid } from 'nanoid';
import { CancelledError } from './errors.js';

export function generateId(size = 21): string {
  return nanoid(size);
}

export function resolvePath(p: string): string {
  if (p.startsWith('~/') || p === '~') {
    return path.join(homedir(), p.slice(1));
  }
  return path.resolve(p);
}

export function getPackageRoot(): string {
  // Walk up from the current file to the directory containing package.json.
  // Works from both src/shared/utils.ts and dist/shared/utils.js.
  let dir = path.dirname(fileURLToPath(import.meta.url));
  while (true) {
    if (fs.existsSync(path.join(dir, 'package.json'))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) break;
    dir = parent;
  }
  return path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', '..');
}

export function getHarvestDir(): string {
  return resolvePath('~/.shopharvest');
}

/** Source of uniform floats in [0, 1). */
export type RandomSource = () => number;

/**
 * Deterministic PRNG (mulberry32). Same seed, same sequence.
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Timer-backed sleep. Rejects with CancelledError when the signal aborts.
 */
export const sleep: SleepFn = async (ms, signal) => {
  if (signal?.aborted) throw new CancelledError();
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (err instanceof Error && err.name === 'AbortError') {
      throw new CancelledError();
    }
    throw err;
  }
};

export function throwIfAborted(signal: AbortSignal | undefined, details?: Record<string, unknown>): void {
  if (signal?.aborted) {
    throw new CancelledError('Operation cancelled', details);
  }
}

/**
 * Strip credentials (appid, api_key, key) from a URL before it is logged.
 */
export function redactUrl(raw: string): string {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return raw;
  }
  for (const key of ['appid', 'api_key', 'apikey', 'key', 'token']) {
    if (url.searchParams.has(key)) url.searchParams.set(key, '***');
  }
  return url.toString();
}

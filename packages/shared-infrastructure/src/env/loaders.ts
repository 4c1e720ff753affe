/**
 * Environment variable loading utilities.
 */
import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';
import { parseEnv } from 'node:util';

export interface LoadEnvOptions {
  cwd?: string;
  files?: string[];
  override?: boolean;
  assignToProcess?: boolean;
}

export interface LoadEnvSummary {
  values: Record<string, string>;
  loadedFiles: string[];
  missingFiles: string[];
  assignedKeys: string[];
}

/**
 * Load `.env`-style files. Later files win over earlier ones; existing
 * `process.env` entries are kept unless `override` is set.
 */
export function loadEnvFiles(options: LoadEnvOptions = {}): LoadEnvSummary {
  const cwd = resolve(options.cwd ?? process.cwd());
  const files = (options.files && options.files.length > 0 ? options.files : ['.env']).map(
    (file) => (isAbsolute(file) ? file : resolve(cwd, file)),
  );
  const override = options.override ?? false;
  const assignToProcess = options.assignToProcess ?? true;

  const values: Record<string, string> = {};
  const loadedFiles: string[] = [];
  const missingFiles: string[] = [];
  const assignedKeys = new Set<string>();

  for (const file of files) {
    if (!existsSync(file)) {
      missingFiles.push(file);
      continue;
    }

    const parsed: Record<string, unknown> = { ...parseEnv(readFileSync(file, 'utf8')) };
    loadedFiles.push(file);

    for (const [key, value] of Object.entries(parsed)) {
      if (typeof value !== 'string') continue;
      values[key] = value;
    }
  }

  if (assignToProcess) {
    for (const [key, value] of Object.entries(values)) {
      if (override || process.env[key] === undefined) {
        process.env[key] = value;
        assignedKeys.add(key);
      }
    }
  }

  return { values, loadedFiles, missingFiles, assignedKeys: [...assignedKeys] };
}

export function readBool(name: string, def: boolean): boolean {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v === '1' || v.toLowerCase() === 'true';
}

export function readInt(name: string, def: number): number {
  const v = process.env[name];
  if (!v) return def;
  const n = Number(v);
  return Number.isInteger(n) ? n : def;
}

export function readString(name: string, def?: string): string | undefined {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v;
}

/**
 * Comma separated list; blank entries are dropped.
 */
export function readList(name: string, def: string[] = []): string[] {
  const v = process.env[name];
  if (v == null || v.trim() === '') return def;
  return v
    .split(',')
    .map((entry) => entry.trim())
    .filter(Boolean);
}

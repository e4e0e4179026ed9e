/**
 * Environment loading for the reindexer CLI and its library entry points.
 * `.env` files are parsed with dotenv; values already present in
 * `process.env` win unless `override` is set.
 */
import { parse } from 'dotenv';
import { existsSync, readFileSync } from 'node:fs';
import { isAbsolute, resolve } from 'node:path';

export interface LoadEnvOptions {
  cwd?: string;
  files?: string[];
  override?: boolean;
  assignToProcess?: boolean;
}

export interface LoadEnvSummary {
  loadedFiles: string[];
  missingFiles: string[];
  assignedKeys: string[];
  overriddenKeys: string[];
}

interface CollectedEnv extends LoadEnvSummary {
  values: Record<string, string>;
}

function resolveEnvFiles(options: LoadEnvOptions): string[] {
  const cwd = resolve(options.cwd ?? process.cwd());
  const files = options.files && options.files.length > 0 ? options.files : ['.env'];
  return files.map((file) => (isAbsolute(file) ? file : resolve(cwd, file)));
}

function collectEnv(options: LoadEnvOptions): CollectedEnv {
  const override = options.override ?? false;
  const assignToProcess = options.assignToProcess ?? true;

  const values: Record<string, string> = {};
  const loadedFiles: string[] = [];
  const missingFiles: string[] = [];
  const assignedKeys = new Set<string>();
  const overriddenKeys = new Set<string>();

  for (const file of resolveEnvFiles(options)) {
    if (!existsSync(file)) {
      missingFiles.push(file);
      continue;
    }
    loadedFiles.push(file);

    const parsed = parse(readFileSync(file, 'utf8'));
    for (const [key, value] of Object.entries(parsed)) {
      // earlier files take precedence unless overriding
      if (override || values[key] === undefined) {
        values[key] = value;
      }

      if (!assignToProcess) continue;
      const alreadySet = process.env[key] !== undefined;
      if (alreadySet && !override) continue;
      if (alreadySet) {
        overriddenKeys.add(key);
      } else {
        assignedKeys.add(key);
      }
      process.env[key] = value;
    }
  }

  return {
    values,
    loadedFiles,
    missingFiles,
    assignedKeys: [...assignedKeys],
    overriddenKeys: [...overriddenKeys],
  };
}

/**
 * Load environment variables from .env files and return the parsed values.
 */
export function loadEnvFiles(options: LoadEnvOptions = {}): Record<string, string> {
  return collectEnv(options).values;
}

/**
 * Load env files and return a summary of what happened (without exposing values).
 */
export function loadEnvFilesWithSummary(options: LoadEnvOptions = {}): LoadEnvSummary {
  const { loadedFiles, missingFiles, assignedKeys, overriddenKeys } = collectEnv(options);
  return { loadedFiles, missingFiles, assignedKeys, overriddenKeys };
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
  return Number.isFinite(n) ? n : def;
}

export function readString(name: string, def?: string): string | undefined {
  const v = process.env[name];
  if (v == null || v === '') return def;
  return v;
}

/**
 * Read a comma-separated list. Blank entries are dropped.
 */
export function readList(name: string, def: string[] = []): string[] {
  const v = readString(name);
  if (v === undefined) return def;
  const items = v
    .split(',')
    .map((item) => item.trim())
    .filter(Boolean);
  return items.length > 0 ? items : def;
}

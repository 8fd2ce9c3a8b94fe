import * as fs from 'fs';
import * as path from 'path';

export function ensureDir(dir: string) { fs.mkdirSync(dir, { recursive: true }); }

/** Parsed JSON document, or null when the file does not exist yet. */
export function readJSON(filePath: string): unknown {
  if (!fs.existsSync(filePath)) return null;
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

export function writeJSON(filePath: string, data: unknown) {
  ensureDir(path.dirname(filePath));
  fs.writeFileSync(filePath, JSON.stringify(data, null, 2));
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

import fs from 'node:fs'; import path from 'node:path';

export function ensureDir(dir: string) {
  fs.mkdirSync(dir, { recursive: true });
}

export function saveJSON(dir: string, name: string, obj: unknown): string {
  ensureDir(dir);
  const file = path.join(dir, `${name}.json`);
  fs.writeFileSync(file, JSON.stringify(obj, null, 2), 'utf-8');
  return file;
}

export function readText(file: string): string {
  return fs.readFileSync(file, 'utf-8');
}

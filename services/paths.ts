import os from 'node:os';
import path from 'node:path';
import { IMAGE_FILE_SUFFIXES } from '../constants';

const SUFFIXES = new Set([...IMAGE_FILE_SUFFIXES, ...IMAGE_FILE_SUFFIXES.map((s) => s.toUpperCase())]);

/** Strip one pair of surrounding quotes, expand a leading `~` and make the path absolute. */
export function processPath(raw: string): string {
  let value = raw;
  if (value.length >= 2 && value.startsWith('"') && value.endsWith('"')) value = value.slice(1, -1);
  if (value.length >= 2 && value.startsWith("'") && value.endsWith("'")) value = value.slice(1, -1);
  if (value === '~') {
    value = os.homedir();
  } else if (value.startsWith('~/') || value.startsWith(`~${path.sep}`)) {
    value = path.join(os.homedir(), value.slice(2));
  }
  return path.resolve(value);
}

export function hasImageSuffix(fileName: string, suffixes: ReadonlySet<string> = SUFFIXES): boolean {
  return suffixes.has(path.extname(fileName));
}

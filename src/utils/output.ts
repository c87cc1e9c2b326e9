import fs from 'fs';
import path from 'path';
import { PersistenceError } from '../errors';

export type LineWriter = (dir: string, filename: string, lines: string[]) => string;

/**
 * Overwrites `dir/filename` with one newline-terminated line per entry,
 * creating `dir` when it does not exist. Returns the written path.
 */
export const writeLines: LineWriter = (dir, filename, lines) => {
  const filePath = path.join(dir, filename);
  try {
    fs.mkdirSync(dir, { recursive: true });
    fs.writeFileSync(filePath, lines.map(line => `${line}\n`).join(''), 'utf-8');
  } catch (e) {
    throw new PersistenceError(filePath, { cause: e });
  }
  console.log(`Results written to ${filename}`);
  return filePath;
};

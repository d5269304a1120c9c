import fs from 'fs';
import path from 'path';

export function currentDirectory(): string {
  return process.cwd();
}

// Relative paths resolve against the current directory.
export function resolveDirectory(dir?: string): string {
  return dir === undefined ? currentDirectory() : path.resolve(currentDirectory(), dir);
}

export function directoryExists(dir: string): boolean {
  try {
    return fs.statSync(dir).isDirectory();
  } catch {
    return false;
  }
}

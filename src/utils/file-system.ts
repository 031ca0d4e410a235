/**
 * File system operations used by the template registry and the synthesizer.
 */
import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Read a file and return its contents as a string.
 */
export async function readFile(filePath: string): Promise<string> {
  return fs.promises.readFile(filePath, 'utf-8');
}

/**
 * Read a file as raw bytes.
 */
export async function readBytes(filePath: string): Promise<Buffer> {
  return fs.promises.readFile(filePath);
}

/**
 * Write content to a file, creating parent directories.
 * Strings are written as UTF-8, buffers unchanged.
 */
export async function writeFile(filePath: string, content: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  await fs.promises.writeFile(filePath, content);
}

/**
 * Check if a file exists.
 */
export async function fileExists(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.F_OK);
    return true;
  } catch { /* file not found */ }
  return false;
}

/**
 * Check if a path is a directory.
 */
export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(filePath);
    return stat.isDirectory();
  } catch { /* path not found or not accessible */ }
  return false;
}

/**
 * Ensure a directory exists, creating it if necessary.
 * Returns true when the directory had to be created.
 */
export async function ensureDir(dirPath: string): Promise<boolean> {
  const created = await fs.promises.mkdir(dirPath, { recursive: true });
  return created !== undefined;
}

/**
 * List the entry names of a directory.
 */
export async function listDir(dirPath: string): Promise<string[]> {
  return fs.promises.readdir(dirPath);
}

/**
 * Permission bits of a path (mode & 0o7777).
 */
export async function getPermission(filePath: string): Promise<number> {
  const stat = await fs.promises.stat(filePath);
  return stat.mode & 0o7777;
}

export async function setPermission(filePath: string, mode: number): Promise<void> {
  await fs.promises.chmod(filePath, mode);
}

/**
 * Get the real path of a file (resolving symlinks).
 */
export async function realPath(filePath: string): Promise<string> {
  return fs.promises.realpath(filePath);
}

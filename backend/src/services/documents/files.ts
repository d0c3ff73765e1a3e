import crypto from 'crypto';
import fs from 'fs/promises';
import path from 'path';

const CHECKSUM_ALGORITHM = 'md5';
const CHECKSUM_ENCODING = 'hex';

export function md5Checksum(content: Uint8Array): string {
  return crypto.createHash(CHECKSUM_ALGORITHM).update(content).digest(CHECKSUM_ENCODING);
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function exists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function writeFileCreatingDirs(filePath: string, content: Uint8Array): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
}

export async function moveFile(from: string, to: string): Promise<void> {
  await fs.mkdir(path.dirname(to), { recursive: true });
  await fs.rename(from, to);
}

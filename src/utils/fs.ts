import fs from 'fs';
import path from 'path';

// lstat, so a dangling symlink still counts as something being there.
export async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.promises.lstat(p);
    return true;
  } catch {
    return false;
  }
}

export async function isDirectory(p: string): Promise<boolean> {
  try {
    const stat = await fs.promises.stat(p);
    return stat.isDirectory();
  } catch {
    return false;
  }
}

export async function ensureDir(dir: string): Promise<void> {
  await fs.promises.mkdir(dir, { recursive: true });
}

export async function readLinkAbsolute(linkPath: string): Promise<string | null> {
  try {
    const link = await fs.promises.readlink(linkPath);
    return path.isAbsolute(link) ? link : path.resolve(path.dirname(linkPath), link);
  } catch {
    return null;
  }
}

/** Copies without ever replacing an existing destination. */
export async function copyFileExclusive(source: string, target: string): Promise<void> {
  await fs.promises.copyFile(source, target, fs.constants.COPYFILE_EXCL);
}

export async function fileContains(p: string, needle: string): Promise<boolean> {
  const content = await fs.promises.readFile(p, 'utf8');
  return content.includes(needle);
}

import { dirname } from 'path';
import * as fs from 'fs';

export const ensureDir = (dir: string) => {
  fs.mkdirSync(dir, { recursive: true });
};

export const pathExists = async (path: string) => {
  try {
    await fs.promises.access(path, fs.constants.F_OK);
    return true;
  } catch {
    return false;
  }
};

// Missing files are fine: callers rely on deletion being repeatable.
export const removeFile = async (path: string) => {
  await fs.promises.rm(path, { force: true });
};

export const moveFile = async (src: string, dest: string) => {
  ensureDir(dirname(dest));
  try {
    await fs.promises.rename(src, dest);
  } catch (err: unknown) {
    // rename() cannot cross devices (e.g. a tmpfs work dir and a mounted volume).
    if (!isErrnoException(err) || err.code !== 'EXDEV') throw err;
    await fs.promises.copyFile(src, dest);
    await fs.promises.rm(src, { force: true });
  }
};

export const isErrnoException = (err: unknown): err is NodeJS.ErrnoException =>
  err instanceof Error && 'code' in err;

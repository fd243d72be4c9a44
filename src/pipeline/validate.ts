import { promises as fsp } from 'node:fs';

/** True only for an existing regular file; every failure reads as absent. */
export async function validation(filePath: string): Promise<boolean> {
  try {
    const stats = await fsp.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

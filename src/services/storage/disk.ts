import { randomUUID } from 'node:crypto';
import { access, mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { ArtifactStorage } from './interface';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Markdown artifacts as plain files under one output directory.
 * Writes go through a temp file and a rename so readers never see a partial file.
 */
export class DiskArtifactStorage implements ArtifactStorage {
  constructor(private readonly baseDir: string) {}

  private resolve(key: string): string {
    const safe = key.replace(/[^a-zA-Z0-9._-]/g, '_');
    return path.join(this.baseDir, safe);
  }

  async write(key: string, content: string): Promise<void> {
    await mkdir(this.baseDir, { recursive: true });
    const target = this.resolve(key);
    const temp = `${target}.${randomUUID()}.tmp`;
    try {
      await writeFile(temp, content, 'utf8');
      await rename(temp, target);
    } catch (error) {
      await rm(temp, { force: true });
      throw error;
    }
  }

  async read(key: string): Promise<string | null> {
    try {
      return await readFile(this.resolve(key), 'utf8');
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await mkdir(this.baseDir, { recursive: true });
      await access(this.baseDir);
      return true;
    } catch {
      return false;
    }
  }
}

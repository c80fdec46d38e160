/**
 * @file FileCacheStore.ts
 * @brief Persistent store that keeps one file per key under a directory.
 * @license See LICENSE.md
 */

import { mkdir, readFile, readdir, rm, writeFile } from 'fs/promises';
import { join } from 'path';
import { PersistentStore } from './PersistentStore';

const SUFFIX = '.cache';

function isMissing(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

export class FileCacheStore implements PersistentStore {
  private directory: string;
  private ready: Promise<string | undefined> | null = null;

  constructor(directory: string) {
    this.directory = directory;
  }

  private pathFor(key: string): string {
    return join(this.directory, encodeURIComponent(key) + SUFFIX);
  }

  private ensureDirectory(): Promise<string | undefined> {
    if (!this.ready) {
      this.ready = mkdir(this.directory, { recursive: true });
    }
    return this.ready;
  }

  async read(key: string): Promise<string | null> {
    try {
      return await readFile(this.pathFor(key), 'utf8');
    } catch (e) {
      if (isMissing(e)) return null;
      throw e;
    }
  }

  async write(key: string, value: string): Promise<void> {
    await this.ensureDirectory();
    await writeFile(this.pathFor(key), value, 'utf8');
  }

  async remove(key: string): Promise<void> {
    await rm(this.pathFor(key), { force: true });
  }

  async keys(): Promise<string[]> {
    let names: string[];
    try {
      names = await readdir(this.directory);
    } catch (e) {
      if (isMissing(e)) return [];
      throw e;
    }
    return names
      .filter(name => name.endsWith(SUFFIX))
      .map(name => decodeURIComponent(name.slice(0, -SUFFIX.length)));
  }
}

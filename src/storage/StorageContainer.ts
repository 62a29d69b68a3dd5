/**
 * Durable JSON document store
 *
 * One document per container, stored at `<dataDir>/<category...>/<file>`.
 * Failures never propagate: reads degrade to `undefined`, writes to `false`.
 */
import { existsSync } from 'fs';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import { dirname, join } from 'path';
import type { z } from 'zod';
import type { Logger } from 'pino';
import { createChildLogger } from '../core/Logger.js';

export interface KeyValueStore<T> {
  get(): Promise<T | undefined>;
  set(value: T): Promise<boolean>;
}

export class StorageContainer<T> implements KeyValueStore<T> {
  readonly filename: string;
  private logger: Logger;

  constructor(
    dataDir: string,
    pathAndFilename: string[],
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {
    if (pathAndFilename.length === 0) {
      throw new Error('Storage container path cannot be empty');
    }

    this.filename = join(dataDir, ...pathAndFilename);
    this.logger = createChildLogger({ service: 'Storage', file: this.filename });
  }

  async get(): Promise<T | undefined> {
    if (!existsSync(this.filename)) {
      return undefined;
    }

    try {
      const raw: unknown = JSON.parse(await readFile(this.filename, 'utf-8'));
      const parsed = this.schema.safeParse(raw);

      if (!parsed.success) {
        this.logger.error({ issues: parsed.error.errors.length }, 'Stored document does not match its schema, ignoring it');
        return undefined;
      }

      return parsed.data;
    } catch (error) {
      this.logger.error({ error }, 'Failed to read stored document');
      return undefined;
    }
  }

  async set(value: T): Promise<boolean> {
    const tempFilename = `${this.filename}.tmp`;

    try {
      await mkdir(dirname(this.filename), { recursive: true });
      await writeFile(tempFilename, JSON.stringify(value, null, 2) + '\n', 'utf-8');
      await rename(tempFilename, this.filename);
      return true;
    } catch (error) {
      this.logger.error({ error }, 'Failed to write stored document');
      return false;
    }
  }
}

/**
 * Default data directory, e.g. ~/.ddns-sync
 */
export function defaultDataDir(homeDir: string): string {
  return join(homeDir, '.ddns-sync');
}

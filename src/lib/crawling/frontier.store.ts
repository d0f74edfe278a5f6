/**
 * Frontier Store
 * Persists frontier snapshots so a stopped run can resume its remaining work
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { errorCode } from '../scraping/errors';
import { FrontierSnapshot } from './frontier';

export interface FrontierStore {
  save(snapshot: FrontierSnapshot): Promise<void>;
  load(): Promise<FrontierSnapshot | null>;
  clear(): Promise<void>;
}

const FetchTaskSchema = z.object({
  id: z.string(),
  url: z.string(),
  siteId: z.string(),
  depth: z.number().int().min(0),
  priority: z.number(),
  enqueueTime: z.number(),
  attemptCount: z.number().int().min(0),
  blockedCount: z.number().int().min(0),
  notBefore: z.number(),
  parentUrl: z.string().optional(),
  pageOf: z.object({ seedUrl: z.string(), page: z.number().int() }).optional(),
});

const SnapshotSchema = z.object({
  savedAt: z.number().default(0),
  tasks: z.array(FetchTaskSchema),
});

export class FileFrontierStore implements FrontierStore {
  constructor(private readonly filePath: string) {}

  /**
   * Write to a temp file, then rename over the previous snapshot
   */
  async save(snapshot: FrontierSnapshot): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.tmp`;
    await fs.writeFile(tempPath, JSON.stringify(snapshot), 'utf-8');
    await fs.rename(tempPath, this.filePath);
  }

  async load(): Promise<FrontierSnapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if (errorCode(error) === 'ENOENT') {
        return null;
      }
      throw error;
    }

    const parsed = SnapshotSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Frontier snapshot at ${this.filePath} is malformed: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}

/**
 * Keeps the last snapshot in memory; used when no snapshot path is configured
 */
export class MemoryFrontierStore implements FrontierStore {
  private snapshot: FrontierSnapshot | null = null;

  async save(snapshot: FrontierSnapshot): Promise<void> {
    this.snapshot = { savedAt: snapshot.savedAt, tasks: snapshot.tasks.map((task) => ({ ...task })) };
  }

  async load(): Promise<FrontierSnapshot | null> {
    return this.snapshot;
  }

  async clear(): Promise<void> {
    this.snapshot = null;
  }
}

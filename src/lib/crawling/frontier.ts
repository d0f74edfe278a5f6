/**
 * Frontier
 * Per-site queues of pending fetch tasks with depth priority and
 * retry scheduling. Admission is gated by the deduplication index.
 */

import { randomUUID } from 'crypto';
import { DeduplicationIndex } from '../dedup/dedup.index';
import { urlFingerprint } from '../dedup/fingerprint';
import { FetchTask, SiteConfig, TaskInput } from './crawling.types';
import { normalizeUrl } from './url-normalizer';

export type EnqueueRejection = 'unknown_site' | 'invalid_url' | 'depth_exceeded' | 'duplicate';

export type EnqueueResult =
  | { admitted: true; task: FetchTask }
  | { admitted: false; reason: EnqueueRejection };

export interface EnqueueOptions {
  /**
   * Skip the seen-URL check (re-crawl)
   */
  force?: boolean;
}

export interface FrontierSnapshot {
  savedAt: number;
  tasks: FetchTask[];
}

interface SitePartition {
  ready: FetchTask[];   // sorted by depth, priority, sequence
  delayed: FetchTask[]; // notBefore in the future
  inFlight: Map<string, FetchTask>;
}

type Clock = () => number;

export class Frontier {
  private readonly sites: Map<string, SiteConfig>;
  private readonly partitions: Map<string, SitePartition> = new Map();
  private readonly sequence: Map<string, number> = new Map();
  private nextSequence: number = 0;

  constructor(
    sites: SiteConfig[],
    private readonly dedup: DeduplicationIndex,
    private readonly now: Clock = Date.now
  ) {
    this.sites = new Map(sites.map((site) => [site.siteId, site]));
    for (const site of sites) {
      this.partitions.set(site.siteId, { ready: [], delayed: [], inFlight: new Map() });
    }
  }

  /**
   * Admit a task unless its URL was already seen or it is too deep
   */
  async enqueue(input: TaskInput, options: EnqueueOptions = {}): Promise<EnqueueResult> {
    const site = this.sites.get(input.siteId);
    if (!site) {
      return { admitted: false, reason: 'unknown_site' };
    }

    const url = normalizeUrl(input.url);
    if (!url) {
      return { admitted: false, reason: 'invalid_url' };
    }

    if (input.depth > site.maxDepth) {
      return { admitted: false, reason: 'depth_exceeded' };
    }

    if (!options.force) {
      const isNew = await this.dedup.markSeenURL(urlFingerprint(url));
      if (!isNew) {
        return { admitted: false, reason: 'duplicate' };
      }
    }

    const now = this.now();
    const task: FetchTask = {
      id: randomUUID(),
      url,
      siteId: input.siteId,
      depth: input.depth,
      priority: input.priority ?? 0,
      enqueueTime: now,
      attemptCount: 0,
      blockedCount: 0,
      notBefore: now,
      ...(input.parentUrl ? { parentUrl: input.parentUrl } : {}),
      ...(input.pageOf ? { pageOf: input.pageOf } : {}),
    };

    this.insert(task);
    return { admitted: true, task };
  }

  /**
   * Next eligible task for a site, or null. Never waits.
   */
  dequeue(siteId: string): FetchTask | null {
    const partition = this.partitions.get(siteId);
    if (!partition) {
      return null;
    }

    this.promoteDelayed(partition);
    const task = partition.ready.shift();
    if (!task) {
      return null;
    }

    partition.inFlight.set(task.id, task);
    return task;
  }

  /**
   * Return an in-flight task to the queue (retry path). The URL is already
   * marked seen, so the dedup index is not consulted again.
   */
  requeue(task: FetchTask): boolean {
    const partition = this.partitions.get(task.siteId);
    if (!partition || !partition.inFlight.delete(task.id)) {
      return false;
    }
    this.insert(task);
    return true;
  }

  /**
   * Finish an in-flight task (fetched, or dropped for good)
   */
  complete(taskId: string): boolean {
    for (const partition of this.partitions.values()) {
      if (partition.inFlight.delete(taskId)) {
        this.sequence.delete(taskId);
        return true;
      }
    }
    return false;
  }

  /**
   * Drop pending pages of a seed's series that come after `page`. Pages
   * already in flight finish normally. Returns how many were dropped.
   */
  cancelPagesAfter(siteId: string, seedUrl: string, page: number): number {
    const partition = this.partitions.get(siteId);
    if (!partition) {
      return 0;
    }

    const isLater = (task: FetchTask) =>
      task.pageOf !== undefined && task.pageOf.seedUrl === seedUrl && task.pageOf.page > page;
    const cancelled = [...partition.ready, ...partition.delayed].filter(isLater);
    if (cancelled.length === 0) {
      return 0;
    }

    partition.ready = partition.ready.filter((task) => !isLater(task));
    partition.delayed = partition.delayed.filter((task) => !isLater(task));
    for (const task of cancelled) {
      this.sequence.delete(task.id);
    }
    return cancelled.length;
  }

  hasEligible(siteId: string): boolean {
    const partition = this.partitions.get(siteId);
    if (!partition) {
      return false;
    }
    this.promoteDelayed(partition);
    return partition.ready.length > 0;
  }

  /**
   * Earliest time a pending task of the site becomes eligible, or null if none is pending
   */
  nextEligibleAt(siteId: string): number | null {
    const partition = this.partitions.get(siteId);
    if (!partition) {
      return null;
    }
    if (partition.ready.length > 0) {
      return this.now();
    }
    if (partition.delayed.length === 0) {
      return null;
    }
    return Math.min(...partition.delayed.map((task) => task.notBefore));
  }

  pendingCount(siteId?: string): number {
    return this.count(siteId, (partition) => partition.ready.length + partition.delayed.length);
  }

  inFlightCount(siteId?: string): number {
    return this.count(siteId, (partition) => partition.inFlight.size);
  }

  /**
   * True when nothing is pending or in flight
   */
  isDrained(): boolean {
    return this.pendingCount() === 0 && this.inFlightCount() === 0;
  }

  getSiteIds(): string[] {
    return Array.from(this.sites.keys());
  }

  getSite(siteId: string): SiteConfig | undefined {
    return this.sites.get(siteId);
  }

  /**
   * Remaining work, with in-flight tasks returned to pending
   */
  snapshot(): FrontierSnapshot {
    const tasks: FetchTask[] = [];
    for (const partition of this.partitions.values()) {
      tasks.push(...partition.ready, ...partition.delayed, ...partition.inFlight.values());
    }
    return { savedAt: this.now(), tasks: tasks.map((task) => ({ ...task })) };
  }

  /**
   * Load tasks from a snapshot. Their URLs are marked seen again so that
   * rediscovered links do not duplicate them; tasks of unknown sites are skipped.
   */
  async restore(snapshot: FrontierSnapshot): Promise<number> {
    let restored = 0;
    for (const task of snapshot.tasks) {
      if (!this.partitions.has(task.siteId)) {
        continue;
      }
      await this.dedup.markSeenURL(urlFingerprint(task.url));
      this.insert({ ...task });
      restored++;
    }
    return restored;
  }

  clear(): void {
    for (const partition of this.partitions.values()) {
      partition.ready = [];
      partition.delayed = [];
      partition.inFlight.clear();
    }
    this.sequence.clear();
  }

  private count(siteId: string | undefined, measure: (partition: SitePartition) => number): number {
    if (siteId !== undefined) {
      const partition = this.partitions.get(siteId);
      return partition ? measure(partition) : 0;
    }
    let total = 0;
    for (const partition of this.partitions.values()) {
      total += measure(partition);
    }
    return total;
  }

  private insert(task: FetchTask): void {
    const partition = this.partitions.get(task.siteId);
    if (!partition) {
      return;
    }

    if (!this.sequence.has(task.id)) {
      this.sequence.set(task.id, this.nextSequence++);
    }

    if (task.notBefore > this.now()) {
      partition.delayed.push(task);
    } else {
      this.insertReady(partition, task);
    }
  }

  private promoteDelayed(partition: SitePartition): void {
    if (partition.delayed.length === 0) {
      return;
    }
    const now = this.now();
    const stillDelayed: FetchTask[] = [];
    for (const task of partition.delayed) {
      if (task.notBefore <= now) {
        this.insertReady(partition, task);
      } else {
        stillDelayed.push(task);
      }
    }
    partition.delayed = stillDelayed;
  }

  /**
   * Binary insertion by (depth, priority, sequence); sequence keeps FIFO within a depth
   */
  private insertReady(partition: SitePartition, task: FetchTask): void {
    const ready = partition.ready;
    let low = 0;
    let high = ready.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (this.compare(ready[mid], task) <= 0) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    ready.splice(low, 0, task);
  }

  private compare(a: FetchTask, b: FetchTask): number {
    if (a.depth !== b.depth) {
      return a.depth - b.depth;
    }
    if (a.priority !== b.priority) {
      return a.priority - b.priority;
    }
    return (this.sequence.get(a.id) ?? 0) - (this.sequence.get(b.id) ?? 0);
  }
}

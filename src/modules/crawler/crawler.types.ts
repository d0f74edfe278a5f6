/**
 * Crawler Types
 */

import { CircuitState } from '../../lib/circuit-breaker/circuit-breaker.types';
import { DropReason, FetchTask, PipelineTotals } from '../../lib/crawling/crawling.types';

export enum PipelineState {
  IDLE = 'idle',
  RUNNING = 'running',
  STOPPING = 'stopping',
  STOPPED = 'stopped',
}

export enum PipelineEvent {
  DROPPED = 'dropped',
  EXHAUSTED = 'exhausted',
  DRAINED = 'drained',
  STOPPED = 'stopped',
}

export interface DroppedTaskEvent {
  task: FetchTask;
  reason: DropReason;
  message: string;
}

export interface ExhaustedEvent {
  siteId: string;
  taskId: string;
  retryAt: number;
}

export interface SiteStatus {
  siteId: string;
  pending: number;
  inFlight: number;
  paused: boolean;
  breakerState: CircuitState;
}

export interface PipelineStatus {
  state: PipelineState;
  startedAt: number | null;
  workers: number;
  sites: SiteStatus[];
  totals: PipelineTotals;
}

export function emptyTotals(): PipelineTotals {
  return {
    fetched: 0,
    parsed: 0,
    retried: 0,
    exhausted: 0,
    dropped: {
      retries_exhausted: 0,
      blocked_exhausted: 0,
      permanent: 0,
      parse_error: 0,
      no_parser: 0,
    },
  };
}

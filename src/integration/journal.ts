import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { formatDuration } from '../lib/utils/format.js';

// ── Event types ──

export type DeployEvent =
  | {
      type: 'deploy:start';
      service: string;
      step_count: number;
      config_file: string | null;
      seq: number;
      ts: string;
    }
  | {
      type: 'step:passed';
      service: string;
      step: string;
      detail?: string;
      seq: number;
      ts: string;
    }
  | {
      type: 'step:failed';
      service: string;
      step: string;
      error: string;
      tolerated: boolean;
      seq: number;
      ts: string;
    }
  | {
      type: 'deploy:completed';
      service: string;
      duration_ms: number;
      steps_completed: number;
      seq: number;
      ts: string;
    }
  | {
      type: 'deploy:failed';
      service: string;
      duration_ms: number;
      failed_step: string;
      error_code: string;
      seq: number;
      ts: string;
    };

// ── Event writer ──

export interface JournalOptions {
  /** JSONL file; events are dropped when null */
  path: string | null;
}

let eventSequence = 0;

/** Reset sequence counter (for testing) */
export function resetEventSequence(): void {
  eventSequence = 0;
}

/** Distributive Omit for union types */
type DistributiveOmit<T, K extends keyof T> = T extends unknown ? Omit<T, K> : never;

export type DeployEventInput = DistributiveOmit<DeployEvent, 'seq' | 'ts'>;

/** Append an event to the JSONL journal */
export function recordEvent(options: JournalOptions, event: DeployEventInput): DeployEvent {
  const fullEvent: DeployEvent = {
    ...event,
    seq: eventSequence++,
    ts: new Date().toISOString(),
  };

  if (options.path) {
    mkdirSync(dirname(options.path), { recursive: true });
    appendFileSync(options.path, JSON.stringify(fullEvent) + '\n');
  }
  return fullEvent;
}

/**
 * Record an event, logging a journal write error instead of throwing it.
 * Returns null when the write failed.
 */
export function tryRecordEvent(options: JournalOptions, event: DeployEventInput): DeployEvent | null {
  try {
    return recordEvent(options, event);
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[deploy-sync] Failed to record ${event.type} event: ${message}`);
    return null;
  }
}

// ── Message formatting ──

export function formatEventMessage(event: DeployEvent): string {
  switch (event.type) {
    case 'deploy:start':
      return `deploy:start ${event.service} (${event.step_count} steps)`;

    case 'step:passed':
      return event.detail
        ? `step:passed ${event.service}/${event.step} (${event.detail})`
        : `step:passed ${event.service}/${event.step}`;

    case 'step:failed':
      return `step:failed ${event.service}/${event.step} — ${event.error}${event.tolerated ? ' (tolerated)' : ''}`;

    case 'deploy:completed':
      return `deploy:completed ${event.service} (${formatDuration(event.duration_ms)}, ${event.steps_completed} steps)`;

    case 'deploy:failed':
      return `deploy:failed ${event.service} at ${event.failed_step} — ${event.error_code}`;
  }
}

import { mkdirSync, readFileSync, renameSync, writeFileSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import { z } from 'zod';
import { STATE_DIR } from '../config/types.js';

// ── Last run record ──

export const lastRunSchema = z.object({
  service: z.string(),
  config_file: z.string().nullable(),
  started_at: z.string(),
  completed_at: z.string(),
  status: z.enum(['succeeded', 'failed']),
  dry_run: z.boolean().default(false),
  completed_steps: z.array(z.string()),
  failed_step: z.string().nullable(),
  error: z.string().nullable(),
  error_code: z.string().nullable(),
  tolerated: z.array(z.object({ step: z.string(), error: z.string() })),
  duration_ms: z.number(),
});

export type LastRun = z.infer<typeof lastRunSchema>;

// ── State directory ──

export function stateDir(baseDir: string): string {
  return resolve(baseDir, STATE_DIR);
}

export function lastRunPath(baseDir: string): string {
  return resolve(stateDir(baseDir), 'last-run.json');
}

// ── Persistence (atomic write) ──

export function saveLastRun(record: LastRun, path: string): void {
  mkdirSync(dirname(path), { recursive: true });
  const json = JSON.stringify(record, null, 2) + '\n';
  const tmp = `${path}.tmp`;
  writeFileSync(tmp, json);
  renameSync(tmp, path);
}

/** Load the last run record; null when missing or unreadable */
export function loadLastRun(path: string): LastRun | null {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch {
    return null;
  }

  try {
    const parsed = lastRunSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

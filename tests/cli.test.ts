import { describe, it, expect, vi, beforeAll, afterEach } from 'vitest';
import chalk from 'chalk';
import { existsSync, mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { testContext } from './helpers/test-context.js';
import { summarizeRun, leftStopped } from '../src/commands/run/summary.js';
import { withErrorHandler } from '../src/lib/command/with-error-handler.js';
import { DeployError, ErrorCode } from '../src/lib/errors.js';
import { lastRunPath } from '../src/deploy/state.js';
import { createProgram } from '../src/program.js';
import type { RunResult } from '../src/sequencer/types.js';

const ctx = testContext();

beforeAll(() => {
  chalk.level = 0;
});

afterEach(() => {
  process.exitCode = undefined;
});

function makeResult(overrides: Partial<RunResult> = {}): RunResult {
  return {
    completed_steps: ['stop', 'sync', 'start'],
    failed_step: null,
    error: null,
    error_code: null,
    tolerated: [],
    duration_ms: 5000,
    ...overrides,
  };
}

/** process.exit that throws instead, so the test sees the code */
function mockExit() {
  return vi.spyOn(process, 'exit').mockImplementation((code) => {
    throw new Error(`exit ${code}`);
  });
}

// ── summarizeRun ──

describe('summarizeRun', () => {
  it('exits 0 after a completed run', () => {
    const summary = summarizeRun({ service: 'web', result: makeResult(), report: null });
    expect(summary.exitCode).toBe(0);
    expect(summary.lines).toEqual(['', '✓ Deploy of "web" completed (5s, 3 steps)']);
  });

  it('exits 1 and says the service was left stopped after a failed sync', () => {
    const summary = summarizeRun({
      service: 'web',
      result: makeResult({
        completed_steps: ['stop'],
        failed_step: 'sync',
        error: 'disk full',
        error_code: ErrorCode.SYNC_FAILED,
      }),
      report: null,
    });

    expect(summary.exitCode).toBe(1);
    expect(summary.lines).toEqual([
      '',
      '✗ Deploy of "web" failed at step "sync" [SYNC_FAILED]',
      '  disk full',
      '  Service "web" was left stopped. Fix the problem, then start it or re-run deploy-sync.',
    ]);
  });

  it('gives no stopped hint when stop itself failed', () => {
    const summary = summarizeRun({
      service: 'web',
      result: makeResult({
        completed_steps: [],
        failed_step: 'stop',
        error: 'exit 5: access denied',
        error_code: ErrorCode.SERVICE_STOP_FAILED,
      }),
      report: null,
    });

    expect(summary.exitCode).toBe(1);
    expect(summary.lines).toEqual([
      '',
      '✗ Deploy of "web" failed at step "stop" [SERVICE_STOP_FAILED]',
      '  exit 5: access denied',
    ]);
  });

  it('lists the file set for a dry run', () => {
    const summary = summarizeRun({
      service: 'web',
      result: makeResult(),
      report: { copied: ['app.py'], unchanged: [], excluded: ['uploads/'] },
      dryRun: true,
    });
    expect(summary.lines.slice(0, 2)).toEqual(['    would copy app.py', '    excluded uploads/']);
  });

  it('lists copied files only when verbose', () => {
    const report = { copied: ['app.py'], unchanged: [], excluded: [] };
    expect(summarizeRun({ service: 'web', result: makeResult(), report }).lines).toHaveLength(2);
    expect(summarizeRun({ service: 'web', result: makeResult(), report, verbose: true }).lines[0])
      .toBe('    copied app.py');
  });
});

describe('leftStopped', () => {
  it('is true only between a completed stop and a missing start', () => {
    expect(leftStopped(makeResult({ completed_steps: ['stop'] }))).toBe(true);
    expect(leftStopped(makeResult({ completed_steps: ['stop', 'sync'] }))).toBe(true);
    expect(leftStopped(makeResult())).toBe(false);
    expect(leftStopped(makeResult({ completed_steps: [] }))).toBe(false);
  });
});

// ── withErrorHandler ──

describe('withErrorHandler', () => {
  it('exits 3 for a missing exclusion file', async () => {
    const exit = mockExit();
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});
    const action = withErrorHandler(async () => {
      throw new DeployError(ErrorCode.EXCLUSIONS_NOT_FOUND, 'exclusion file not found: /srv/exclude.txt', 'Check exclude_file');
    });

    await expect(action()).rejects.toThrow('exit 3');
    expect(exit).toHaveBeenCalledWith(3);
    expect(errors.mock.calls).toEqual([
      ['✗ exclusion file not found: /srv/exclude.txt'],
      ['  Check exclude_file'],
    ]);
  });

  it('exits 1 for other deploy errors and plain errors', async () => {
    const exit = mockExit();
    vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(withErrorHandler(async () => {
      throw new DeployError(ErrorCode.STATE_NOT_FOUND, 'no run');
    })()).rejects.toThrow('exit 1');
    await expect(withErrorHandler(async () => {
      throw new Error('boom');
    })()).rejects.toThrow('exit 1');

    expect(exit.mock.calls).toEqual([[1], [1]]);
  });
});

// ── Program ──

describe('createProgram', () => {
  function writeProject() {
    const dir = ctx.createTempDir();
    mkdirSync(join(dir, 'release', 'uploads'), { recursive: true });
    writeFileSync(join(dir, 'release', 'app.py'), 'print("v2")');
    writeFileSync(join(dir, 'release', 'uploads', 'a.png'), 'png');
    writeFileSync(join(dir, 'deploy.yaml'), 'service: web\nsource: release\ndestination: live\nexclude:\n  - uploads/\n');
    return dir;
  }

  it('runs the deploy when no command is given', async () => {
    const dir = writeProject();
    const lines: string[] = [];
    vi.spyOn(console, 'log').mockImplementation((line?: unknown) => {
      lines.push(String(line));
    });

    await createProgram().parseAsync(['--config', join(dir, 'deploy.yaml'), '--dry-run'], { from: 'user' });

    expect(process.exitCode).toBe(0);
    expect(lines[0]).toBe('Deploy: web (nssm) [dry run]');
    expect(lines).toContain('[1/3] stopping service web...');
    expect(lines).toContain('    would copy app.py');
    expect(lines).toContain('    excluded uploads/');
    expect(existsSync(join(dir, 'live'))).toBe(false);
    expect(existsSync(lastRunPath(dir))).toBe(false);
  });

  it('exits 3 for a missing config', async () => {
    const dir = ctx.createTempDir();
    const exit = mockExit();
    const errors = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(
      createProgram().parseAsync(['--config', join(dir, 'missing.yaml')], { from: 'user' }),
    ).rejects.toThrow('exit 3');

    expect(exit).toHaveBeenCalledWith(3);
    expect(errors).toHaveBeenCalledWith(`✗ deploy config not found: ${join(dir, 'missing.yaml')}`);
  });

  it('exits 1 from status when nothing was recorded', async () => {
    const dir = writeProject();
    mockExit();
    vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(
      createProgram().parseAsync(['status', '--config', join(dir, 'deploy.yaml')], { from: 'user' }),
    ).rejects.toThrow('exit 1');
  });
});

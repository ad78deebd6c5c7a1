import { createFileSyncer, type FileSyncer, type SyncReport } from '../collaborators/file-sync.js';
import { createServiceController, type ServiceController } from '../collaborators/service.js';
import { loadExclusionList, type ExclusionList } from '../config/exclusions.js';
import type { DeployConfig } from '../config/types.js';
import { tryRecordEvent, type JournalOptions } from '../integration/journal.js';
import { debug } from '../lib/utils/debug.js';
import { isSuccess, notifyReporter, runSequence } from '../sequencer/sequencer.js';
import type { RunResult, SequenceReporter } from '../sequencer/types.js';
import { buildDeploySteps } from './steps.js';
import { lastRunPath, saveLastRun, type LastRun } from './state.js';

export interface RunDeployOptions {
  config: DeployConfig;
  services?: ServiceController;
  syncer?: FileSyncer;
  reporter?: SequenceReporter;
  /** Skip service control and report the file set without copying */
  dryRun?: boolean;
  /** Defaults to `config.journal`; null disables the journal */
  journalPath?: string | null;
  /** Defaults to `.deploy-sync/last-run.json` beside the config; null disables. Never written on a dry run */
  statePath?: string | null;
}

export interface DeployOutcome {
  result: RunResult;
  report: SyncReport | null;
  exclusions: ExclusionList;
  lastRun: LastRun;
}

/** Service controller that only reports what it would do */
const dryRunServices: ServiceController = {
  stop: () => ({ ok: true, detail: 'dry run' }),
  start: () => ({ ok: true, detail: 'dry run' }),
};

/** Fan hooks out to every reporter in order; one throwing does not skip the rest */
export function combineReporters(...reporters: (SequenceReporter | undefined)[]): SequenceReporter {
  const active = reporters.filter((r): r is SequenceReporter => r !== undefined);
  return {
    onStart: (step, ...rest) =>
      active.forEach((r) => notifyReporter('onStart', step, () => r.onStart?.(step, ...rest))),
    onSuccess: (step, ...rest) =>
      active.forEach((r) => notifyReporter('onSuccess', step, () => r.onSuccess?.(step, ...rest))),
    onFailure: (step, ...rest) =>
      active.forEach((r) => notifyReporter('onFailure', step, () => r.onFailure?.(step, ...rest))),
  };
}

function journalReporter(journal: JournalOptions, service: string): SequenceReporter {
  return {
    onSuccess(step, _index, _total, outcome) {
      tryRecordEvent(journal, {
        type: 'step:passed',
        service,
        step: step.name,
        detail: outcome.ok ? outcome.detail : undefined,
      });
    },
    onFailure(step, _index, _total, error, tolerated) {
      tryRecordEvent(journal, { type: 'step:failed', service, step: step.name, error, tolerated });
    },
  };
}

/**
 * One sync-and-restart run.
 *
 * The exclusion list is loaded before any step runs, so a bad
 * exclude_file throws without touching the service. A failed sync
 * leaves the service stopped.
 */
export function runDeploy(options: RunDeployOptions): DeployOutcome {
  const { config } = options;
  const dryRun = options.dryRun ?? false;

  const exclusions = loadExclusionList(config.exclude_file, config.exclude);
  debug('deploy', `${exclusions.size} exclusion patterns`);

  const services = dryRun
    ? dryRunServices
    : options.services ?? createServiceController({ manager: config.manager, commands: config.commands });
  const syncer = options.syncer ?? createFileSyncer({ dryRun });

  const journal: JournalOptions = {
    path: options.journalPath === undefined ? config.journal ?? null : options.journalPath,
  };

  const { steps, syncReport } = buildDeploySteps(config, exclusions, { services, syncer });
  const startedAt = new Date().toISOString();

  tryRecordEvent(journal, {
    type: 'deploy:start',
    service: config.service,
    step_count: steps.length,
    config_file: config.config_file,
  });

  const result = runSequence(steps, {
    reporter: combineReporters(journalReporter(journal, config.service), options.reporter),
  });

  if (isSuccess(result)) {
    tryRecordEvent(journal, {
      type: 'deploy:completed',
      service: config.service,
      duration_ms: result.duration_ms,
      steps_completed: result.completed_steps.length,
    });
  } else {
    tryRecordEvent(journal, {
      type: 'deploy:failed',
      service: config.service,
      duration_ms: result.duration_ms,
      failed_step: result.failed_step ?? 'unknown',
      error_code: result.error_code ?? 'STEP_FAILED',
    });
  }

  const lastRun: LastRun = {
    service: config.service,
    config_file: config.config_file,
    started_at: startedAt,
    completed_at: new Date().toISOString(),
    status: isSuccess(result) ? 'succeeded' : 'failed',
    dry_run: dryRun,
    completed_steps: result.completed_steps,
    failed_step: result.failed_step,
    error: result.error,
    error_code: result.error_code,
    tolerated: result.tolerated,
    duration_ms: result.duration_ms,
  };

  const statePath = options.statePath === undefined ? lastRunPath(config.base_dir) : options.statePath;
  if (statePath && !dryRun) {
    try {
      saveLastRun(lastRun, statePath);
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[deploy-sync] Failed to save last run to ${statePath}: ${message}`);
    }
  }

  return { result, report: syncReport(), exclusions, lastRun };
}

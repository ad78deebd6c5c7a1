import type { ServiceController } from '../collaborators/service.js';
import type { FileSyncer, SyncReport } from '../collaborators/file-sync.js';
import type { ExclusionList } from '../config/exclusions.js';
import type { DeployConfig } from '../config/types.js';
import { ErrorCode } from '../lib/errors.js';
import type { Step } from '../sequencer/types.js';

export const STEP_NAMES = ['stop', 'sync', 'start'] as const;

export interface DeployCollaborators {
  services: ServiceController;
  syncer: FileSyncer;
}

export interface DeploySteps {
  steps: Step[];
  /** Report of the sync step, once it has run */
  syncReport(): SyncReport | null;
}

/** stop → sync → start, in that order */
export function buildDeploySteps(
  config: DeployConfig,
  exclusions: ExclusionList,
  collaborators: DeployCollaborators,
): DeploySteps {
  const { services, syncer } = collaborators;
  let report: SyncReport | null = null;

  const steps: Step[] = [
    {
      name: 'stop',
      label: `stopping service ${config.service}`,
      errorCode: ErrorCode.SERVICE_STOP_FAILED,
      action: () => services.stop(config.service),
    },
    {
      name: 'sync',
      label: `syncing ${config.source} -> ${config.destination}`,
      errorCode: ErrorCode.SYNC_FAILED,
      action: () => {
        const outcome = syncer.sync(config.source, config.destination, exclusions, config.sync);
        report = outcome.report ?? null;
        return outcome.ok ? { ok: true, detail: outcome.detail } : { ok: false, error: outcome.error };
      },
    },
    {
      name: 'start',
      label: `starting service ${config.service}`,
      errorCode: ErrorCode.SERVICE_START_FAILED,
      action: () => services.start(config.service),
    },
  ];

  return { steps, syncReport: () => report };
}

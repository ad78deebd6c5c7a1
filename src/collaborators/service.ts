import type { ServiceCommands, ServiceManager } from '../config/types.js';
import type { StepOutcome } from '../sequencer/types.js';
import { describeFailure, spawnCommand, type CommandRunner } from './command.js';

export type ServiceAction = 'stop' | 'start';

/** Service control collaborator */
export interface ServiceController {
  stop(serviceName: string): StepOutcome;
  start(serviceName: string): StepOutcome;
}

export interface ServiceControllerOptions {
  manager: ServiceManager;
  commands?: ServiceCommands;
  runner?: CommandRunner;
}

const SERVICE_PLACEHOLDER = /\{service\}/g;

/** argv the manager takes for an action */
export function managerArgv(manager: ServiceManager, action: ServiceAction, serviceName: string): string[] {
  switch (manager) {
    case 'nssm':
      return ['nssm', action, serviceName];
    case 'sc':
      return ['sc', action, serviceName];
    case 'systemctl':
      return ['systemctl', action, serviceName];
  }
}

export function buildServiceArgv(
  options: Pick<ServiceControllerOptions, 'manager' | 'commands'>,
  action: ServiceAction,
  serviceName: string,
): string[] {
  const override = options.commands?.[action];
  if (override) {
    return override.map((arg) => arg.replace(SERVICE_PLACEHOLDER, serviceName));
  }
  return managerArgv(options.manager, action, serviceName);
}

export function createServiceController(options: ServiceControllerOptions): ServiceController {
  const runner = options.runner ?? spawnCommand;

  const invoke = (action: ServiceAction, serviceName: string): StepOutcome => {
    const argv = buildServiceArgv(options, action, serviceName);
    const result = runner(argv);
    if (result.status === 0 && !result.error) {
      return { ok: true };
    }
    return { ok: false, error: describeFailure(argv, result) };
  };

  return {
    stop: (serviceName) => invoke('stop', serviceName),
    start: (serviceName) => invoke('start', serviceName),
  };
}

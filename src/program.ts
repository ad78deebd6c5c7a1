import { Command } from 'commander';
import { createRunCommand } from './commands/run/index.js';
import { createStatusCommand } from './commands/status/index.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('deploy-sync')
    .description('Stop a service, sync files to its deployment path and start it again')
    .version('0.1.0');

  // No arguments: run with ./deploy.yaml
  program.addCommand(createRunCommand(), { isDefault: true });
  program.addCommand(createStatusCommand());

  return program;
}

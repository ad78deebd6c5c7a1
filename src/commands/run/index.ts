import { Command } from 'commander';
import chalk from 'chalk';
import { withErrorHandler } from '../../lib/command/with-error-handler.js';
import { createStepReporter } from '../../lib/ui/step-runner.js';
import { loadDeployConfig } from '../../config/parser.js';
import { DEFAULT_CONFIG_FILE } from '../../config/types.js';
import { runDeploy } from '../../deploy/deploy.js';
import { summarizeRun } from './summary.js';

interface RunOptions {
  config: string;
  dryRun?: boolean;
  json?: boolean;
  verbose?: boolean;
}

export function createRunCommand(): Command {
  return new Command('run')
    .description('Stop the service, sync files to the deployment path, start the service')
    .option('-c, --config <path>', 'Path to deploy config', DEFAULT_CONFIG_FILE)
    .option('--dry-run', 'Show what would be copied without stopping, copying or starting')
    .option('--json', 'Output result as JSON')
    .option('--verbose', 'List every copied file')
    .action(
      withErrorHandler(async (options: RunOptions) => {
        const config = loadDeployConfig(options.config);

        if (!options.json) {
          console.log(`Deploy: ${chalk.bold(config.service)} (${config.manager})${options.dryRun ? chalk.yellow(' [dry run]') : ''}`);
          console.log(chalk.dim(`  ${config.source} -> ${config.destination}`));
          console.log('');
        }

        const { result, report, exclusions } = runDeploy({
          config,
          dryRun: options.dryRun,
          reporter: options.json ? undefined : createStepReporter(),
        });

        const summary = summarizeRun({
          service: config.service,
          result,
          report,
          dryRun: options.dryRun,
          verbose: options.verbose,
        });

        if (options.json) {
          console.log(JSON.stringify({
            service: config.service,
            dry_run: options.dryRun ?? false,
            ...result,
            exclusions: exclusions.patterns,
            sync: report,
          }));
        } else {
          for (const line of summary.lines) console.log(line);
        }

        process.exitCode = summary.exitCode;
      }),
    );
}

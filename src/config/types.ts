import { z } from 'zod';

// ── Reusable primitives ──

const nonEmpty = z.string().min(1);

/** argv array; `{service}` is replaced with the service name */
const commandArgv = z.array(nonEmpty).min(1);

// ── Service manager ──

export const managerSchema = z.enum(['nssm', 'sc', 'systemctl']).default('nssm');

export const commandsSchema = z
  .object({
    stop: commandArgv.optional(),
    start: commandArgv.optional(),
  })
  .default({});

// ── Sync options ──

export const syncOptionsSchema = z
  .object({
    recursive: z.boolean().default(true),
    overwrite: z.enum(['all', 'newer']).default('all'),
    prompt: z.literal(false, {
      errorMap: () => ({ message: 'prompt must be false (deploy-sync never prompts)' }),
    }).default(false),
  })
  .default({});

// ── Deploy config ──

export const deployConfigSchema = z.object({
  service: nonEmpty,
  manager: managerSchema,
  commands: commandsSchema,
  source: nonEmpty,
  destination: nonEmpty,
  exclude_file: nonEmpty.optional(),
  exclude: z.array(nonEmpty).default([]),
  sync: syncOptionsSchema,
  journal: nonEmpty.optional(),
});

// ── Derived TypeScript types ──

export type ServiceManager = z.infer<typeof managerSchema>;
export type ServiceCommands = z.infer<typeof commandsSchema>;
export type SyncOptions = z.infer<typeof syncOptionsSchema>;
export type RawDeployConfig = z.infer<typeof deployConfigSchema>;

/** Validated config with every path made absolute */
export interface DeployConfig extends RawDeployConfig {
  /** Absolute path of the config file, or null when parsed from text */
  config_file: string | null;
  /** Directory relative paths were resolved against */
  base_dir: string;
}

// ── Defaults (centralized) ──

export const DEFAULT_CONFIG_FILE = 'deploy.yaml';
export const STATE_DIR = '.deploy-sync';

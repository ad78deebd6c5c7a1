import { spawnSync } from 'node:child_process';
import { debug } from '../lib/utils/debug.js';

export interface CommandResult {
  /** Exit code, null when the process never ran or was killed */
  status: number | null;
  stdout: string;
  stderr: string;
  /** Launch failure (ENOENT etc.) */
  error?: string;
}

/** Runs an argv to completion and reports how it ended */
export type CommandRunner = (argv: readonly string[]) => CommandResult;

// ── Secret masking ──

export function maskSecrets(text: string): string {
  return text
    .replace(/(?:sk-|pk-|token_)[a-zA-Z0-9]{20,}/g, '***')
    .replace(/(?:Bearer|Basic)\s+\S{20,}/g, 'Bearer ***')
    .replace(/(?:password|secret|key|token)=\S+/gi, (m) => m.split('=')[0] + '=***');
}

// ── Default runner ──

/** Blocking child process, no shell, no timeout */
export const spawnCommand: CommandRunner = (argv) => {
  const [command, ...args] = argv;
  if (!command) {
    return { status: null, stdout: '', stderr: '', error: 'empty command' };
  }

  debug('command', argv.join(' '));
  const proc = spawnSync(command, args, {
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    windowsHide: true,
  });

  return {
    status: proc.status,
    stdout: proc.stdout ?? '',
    stderr: proc.stderr ?? '',
    error: proc.error?.message,
  };
};

// ── Failure description ──

export function describeFailure(argv: readonly string[], result: CommandResult): string {
  if (result.error) {
    return `failed to launch ${argv[0] ?? '(empty)'}: ${result.error}`;
  }
  // Some service managers report errors on stdout only
  const output = result.stderr.trim() || result.stdout.trim();
  const masked = maskSecrets(output.slice(0, 500));
  return `exit ${result.status ?? '?'}: ${masked}`.trim();
}

import chalk from 'chalk';

const DEBUG_ENV = 'DEPLOY_SYNC_DEBUG';

/**
 * Whether `namespace` is enabled by DEPLOY_SYNC_DEBUG.
 *
 * The variable holds comma-separated namespaces: `*` enables all,
 * `sync` enables exactly `sync`, `deploy*` enables every namespace
 * starting with `deploy`. Read on every call.
 */
export function isDebugEnabled(namespace: string, setting = process.env[DEBUG_ENV] ?? ''): boolean {
  return setting
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean)
    .some((pattern) =>
      pattern.endsWith('*') ? namespace.startsWith(pattern.slice(0, -1)) : namespace === pattern,
    );
}

export function debug(namespace: string, ...args: unknown[]): void {
  if (!isDebugEnabled(namespace)) return;
  console.error(chalk.dim(`[DEBUG] [${namespace}]`), ...args);
}

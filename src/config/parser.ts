import { readFileSync } from 'node:fs';
import { dirname, isAbsolute, relative, resolve } from 'node:path';
import YAML from 'yaml';
import type { ZodError } from 'zod';
import { DeployError, ErrorCode } from '../lib/errors.js';
import { deployConfigSchema, type DeployConfig } from './types.js';

// ── Variable expansion ──

const VARIABLE_PATTERN = /\$\{\{\s*(env|secrets)\.\s*([a-zA-Z_]\w*)\s*\}\}/g;

export function expandVariables(
  text: string,
  env: NodeJS.ProcessEnv = process.env,
): string {
  return text.replace(VARIABLE_PATTERN, (match, source: string, name: string) => {
    if (source === 'env') return env[name] ?? match;
    // secrets.* markers stay as written
    return match;
  });
}

// ── Pre-validation (catch structural errors before Zod) ──

function preValidate(raw: unknown): string | null {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    return '✗ deploy.yaml must contain a YAML object\n  Example:\n    service: my-service\n    source: ./release\n    destination: /srv/my-service';
  }
  return null;
}

// ── Error formatting ──

export function formatConfigError(error: ZodError): string {
  const lines: string[] = [];

  for (const issue of error.issues) {
    const path = issue.path.join('.');

    if (issue.code === 'invalid_type' && issue.received === 'undefined') {
      lines.push(`✗ ${path} is required`);
      continue;
    }

    lines.push(path ? `✗ ${path}: ${issue.message}` : `✗ ${issue.message}`);
  }

  return lines.join('\n');
}

// ── Path checks ──

/** True when `inner` is `outer` or lives beneath it */
export function isSameOrInside(outer: string, inner: string): boolean {
  const rel = relative(outer, inner);
  return rel === '' || (!rel.startsWith('..') && !isAbsolute(rel));
}

// ── Public API ──

/**
 * Parse deploy.yaml text into a validated config.
 * Relative paths resolve against `baseDir`. Throws DeployError on failure.
 */
export function parseDeployConfig(
  content: string,
  baseDir: string,
  env: NodeJS.ProcessEnv = process.env,
  configFile: string | null = null,
): DeployConfig {
  let raw: unknown;
  try {
    raw = YAML.parse(content);
  } catch (err) {
    throw new DeployError(
      ErrorCode.CONFIG_PARSE_ERROR,
      `Invalid YAML: ${err instanceof Error ? err.message : String(err)}`,
      'Check deploy.yaml for syntax errors (indentation, colons, etc.)',
    );
  }

  const preError = preValidate(raw);
  if (preError) {
    throw new DeployError(ErrorCode.CONFIG_VALIDATION_ERROR, preError);
  }

  const result = deployConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new DeployError(
      ErrorCode.CONFIG_VALIDATION_ERROR,
      formatConfigError(result.error),
      'Fix the issues above and try again',
    );
  }

  const data = result.data;
  const base = resolve(baseDir);
  const toPath = (p: string) => resolve(base, expandVariables(p, env));

  const config: DeployConfig = {
    ...data,
    source: toPath(data.source),
    destination: toPath(data.destination),
    exclude_file: data.exclude_file === undefined ? undefined : toPath(data.exclude_file),
    journal: data.journal === undefined ? undefined : toPath(data.journal),
    config_file: configFile,
    base_dir: base,
  };

  if (isSameOrInside(config.source, config.destination) || isSameOrInside(config.destination, config.source)) {
    throw new DeployError(
      ErrorCode.SYNC_PATHS_OVERLAP,
      `source and destination overlap: ${config.source} ↔ ${config.destination}`,
      'Point destination at a directory outside the source tree',
    );
  }

  return config;
}

/** Load and parse a deploy.yaml file. Throws DeployError on failure. */
export function loadDeployConfig(filePath: string, env: NodeJS.ProcessEnv = process.env): DeployConfig {
  const fullPath = resolve(filePath);
  let content: string;
  try {
    content = readFileSync(fullPath, 'utf-8');
  } catch {
    throw new DeployError(
      ErrorCode.CONFIG_NOT_FOUND,
      `deploy config not found: ${fullPath}`,
      'Create deploy.yaml or pass --config <path>',
    );
  }

  return parseDeployConfig(content, dirname(fullPath), env, fullPath);
}

import { readFileSync } from 'node:fs';
import { DeployError, ErrorCode } from '../lib/errors.js';

function normalizePattern(raw: string): string {
  return raw.replace(/\\/g, '/').toLowerCase();
}

/**
 * Immutable set of path fragments that sync must skip.
 *
 * A candidate is `/` + the source-relative path with `/` separators,
 * plus a trailing `/` for directories. It is excluded when any pattern
 * is a case-insensitive substring of it, so `uploads/` covers the whole
 * uploads directory and `.env` covers `.env` files anywhere.
 */
export class ExclusionList {
  readonly patterns: readonly string[];
  private readonly lookup: ReadonlySet<string>;

  constructor(patterns: Iterable<string>) {
    const unique = new Set<string>();
    for (const p of patterns) {
      const normalized = normalizePattern(p.trim());
      if (normalized) unique.add(normalized);
    }
    this.lookup = unique;
    this.patterns = Object.freeze([...unique]);
  }

  static empty(): ExclusionList {
    return new ExclusionList([]);
  }

  get size(): number {
    return this.patterns.length;
  }

  has(pattern: string): boolean {
    return this.lookup.has(normalizePattern(pattern.trim()));
  }

  /** First pattern excluding `relPath`, or null */
  matchingPattern(relPath: string, isDirectory: boolean): string | null {
    const candidate = toCandidate(relPath, isDirectory);
    return this.patterns.find((p) => candidate.includes(p)) ?? null;
  }

  matches(relPath: string, isDirectory: boolean): boolean {
    return this.matchingPattern(relPath, isDirectory) !== null;
  }
}

function toCandidate(relPath: string, isDirectory: boolean): string {
  const trimmed = relPath.replace(/\\/g, '/').replace(/^\/+|\/+$/g, '');
  return `/${trimmed}${isDirectory ? '/' : ''}`.toLowerCase();
}

/** One pattern per line; blank lines and `#` comments are ignored */
export function parseExclusions(text: string): string[] {
  return text
    .split('\n')
    .map((line) => line.replace(/\s+$/, ''))
    .filter((line) => line.trim() !== '' && !line.trimStart().startsWith('#'));
}

/** Read the exclusion file once and merge any inline patterns */
export function loadExclusionList(filePath: string | undefined, extra: readonly string[] = []): ExclusionList {
  if (filePath === undefined) {
    return new ExclusionList(extra);
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    throw new DeployError(
      ErrorCode.EXCLUSIONS_NOT_FOUND,
      `exclusion file not found: ${filePath}`,
      'Fix exclude_file in deploy.yaml or remove it',
    );
  }

  return new ExclusionList([...parseExclusions(content), ...extra]);
}

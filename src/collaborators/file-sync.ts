import { copyFileSync, existsSync, mkdirSync, readdirSync, realpathSync, statSync, type Dirent } from 'node:fs';
import { join } from 'node:path';
import type { ExclusionList } from '../config/exclusions.js';
import type { SyncOptions } from '../config/types.js';
import { debug } from '../lib/utils/debug.js';
import type { StepOutcome } from '../sequencer/types.js';

// ── Types ──

export interface SyncReport {
  copied: string[];
  unchanged: string[];
  excluded: string[];
}

export type SyncOutcome = StepOutcome & { report?: SyncReport };

/** File-sync collaborator */
export interface FileSyncer {
  sync(sourceDir: string, destDir: string, exclusions: ExclusionList, options: SyncOptions): SyncOutcome;
}

/** Copy target the syncer hands every selected file to */
export interface FileCopier {
  ensureDir(absDir: string): void;
  copyFile(srcAbs: string, destAbs: string): void;
}

export interface FileSyncerOptions {
  copier?: FileCopier;
  /** Build the report without touching the destination */
  dryRun?: boolean;
}

// ── Default copier ──

export const fsCopier: FileCopier = {
  ensureDir(absDir) {
    mkdirSync(absDir, { recursive: true });
  },
  copyFile(srcAbs, destAbs) {
    copyFileSync(srcAbs, destAbs);
  },
};

// ── Overwrite policy ──

/** Whether `destAbs` should be replaced by `srcAbs` under the policy */
export function needsCopy(srcAbs: string, destAbs: string, overwrite: SyncOptions['overwrite']): boolean {
  if (overwrite === 'all') return true;
  if (!existsSync(destAbs)) return true;
  return statSync(srcAbs).mtimeMs > statSync(destAbs).mtimeMs;
}

// ── Walker ──

function joinRel(parent: string, name: string): string {
  return parent ? `${parent}/${name}` : name;
}

type EntryKind = 'file' | 'directory' | 'broken-link' | 'special';

/** Classify a directory entry, following symbolic links to their target */
function entryKind(entry: Dirent, absPath: string): EntryKind {
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  if (!entry.isSymbolicLink()) return 'special';
  if (!existsSync(absPath)) return 'broken-link';

  const target = statSync(absPath);
  if (target.isDirectory()) return 'directory';
  return target.isFile() ? 'file' : 'special';
}

export function createFileSyncer(options: FileSyncerOptions = {}): FileSyncer {
  const copier = options.copier ?? fsCopier;
  const dryRun = options.dryRun ?? false;

  return {
    sync(sourceDir, destDir, exclusions, syncOptions) {
      if (!existsSync(sourceDir) || !statSync(sourceDir).isDirectory()) {
        return { ok: false, error: `source directory not found: ${sourceDir}` };
      }

      const report: SyncReport = { copied: [], unchanged: [], excluded: [] };

      // `ancestors` holds the real paths of the directories above `rel`
      const visit = (rel: string, ancestors: ReadonlySet<string>): void => {
        const srcDir = join(sourceDir, rel);
        const realDir = realpathSync(srcDir);
        if (ancestors.has(realDir)) {
          throw new Error(`symbolic link cycle in source: ${rel}`);
        }
        const below = new Set(ancestors).add(realDir);

        if (!dryRun) copier.ensureDir(join(destDir, rel));

        const entries = readdirSync(srcDir, { withFileTypes: true })
          .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

        for (const entry of entries) {
          const childRel = joinRel(rel, entry.name);
          const srcAbs = join(sourceDir, childRel);
          const kind = entryKind(entry, srcAbs);
          const isDir = kind === 'directory';

          if (exclusions.matches(childRel, isDir)) {
            report.excluded.push(isDir ? `${childRel}/` : childRel);
            continue;
          }

          if (kind === 'broken-link') throw new Error(`broken symbolic link in source: ${childRel}`);
          if (kind === 'special') throw new Error(`not a file or directory: ${childRel}`);

          if (isDir) {
            if (syncOptions.recursive) visit(childRel, below);
            continue;
          }

          const destAbs = join(destDir, childRel);
          if (!needsCopy(srcAbs, destAbs, syncOptions.overwrite)) {
            report.unchanged.push(childRel);
            continue;
          }

          if (!dryRun) copier.copyFile(srcAbs, destAbs);
          report.copied.push(childRel);
        }
      };

      try {
        visit('', new Set());
      } catch (err: unknown) {
        return {
          ok: false,
          error: err instanceof Error ? err.message : String(err),
          report,
        };
      }

      debug('sync', `${report.copied.length} copied, ${report.unchanged.length} unchanged, ${report.excluded.length} excluded`);
      return {
        ok: true,
        detail: `${report.copied.length} copied, ${report.excluded.length} excluded`,
        report,
      };
    },
  };
}

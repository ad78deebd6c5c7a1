import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { testContext } from './helpers/test-context.js';
import { ExclusionList, parseExclusions, loadExclusionList } from '../src/config/exclusions.js';
import { expectDeployError } from './helpers/errors.js';

const ctx = testContext();
const fixturesDir = fileURLToPath(new URL('../fixtures', import.meta.url));

// ── parseExclusions ──

describe('parseExclusions', () => {
  it('reads one pattern per line', () => {
    expect(parseExclusions('uploads\\\nvenv\\\n')).toEqual(['uploads\\', 'venv\\']);
  });

  it('drops blank lines and comments', () => {
    expect(parseExclusions('# keep uploads\n\n  \nuploads/\n  # indented comment\n')).toEqual(['uploads/']);
  });

  it('strips CRLF line endings and trailing spaces', () => {
    expect(parseExclusions('uploads\\  \r\n.env\r\n')).toEqual(['uploads\\', '.env']);
  });
});

// ── ExclusionList ──

describe('ExclusionList', () => {
  it('normalizes backslashes and case', () => {
    const list = new ExclusionList(['Uploads\\']);
    expect(list.patterns).toEqual(['uploads/']);
    expect(list.has('UPLOADS/')).toBe(true);
  });

  it('collapses duplicates and blank entries', () => {
    const list = new ExclusionList(['venv/', 'venv\\', '  ', '']);
    expect(list.size).toBe(1);
  });

  it('exposes a frozen pattern list', () => {
    const list = new ExclusionList(['venv/']);
    expect(Object.isFrozen(list.patterns)).toBe(true);
  });

  it('matches directories by trailing separator', () => {
    const list = new ExclusionList(['uploads/']);
    expect(list.matches('uploads', true)).toBe(true);
    expect(list.matches('static/uploads', true)).toBe(true);
    expect(list.matches('uploads', false)).toBe(false);
    expect(list.matches('uploads.py', false)).toBe(false);
  });

  it('matches file name fragments anywhere', () => {
    const list = new ExclusionList(['.env']);
    expect(list.matches('.env', false)).toBe(true);
    expect(list.matches('config/.env', false)).toBe(true);
    expect(list.matches('app.py', false)).toBe(false);
  });

  it('anchors patterns with a leading separator to path segments', () => {
    const list = new ExclusionList(['/instance/']);
    expect(list.matches('instance', true)).toBe(true);
    expect(list.matches('app/instance', true)).toBe(true);
    expect(list.matches('myinstance', true)).toBe(false);
  });

  it('is case-insensitive', () => {
    const list = new ExclusionList(['__pycache__/']);
    expect(list.matches('pkg/__PYCACHE__', true)).toBe(true);
  });

  it('reports the matching pattern', () => {
    const list = new ExclusionList(['venv/', '.env']);
    expect(list.matchingPattern('venv', true)).toBe('venv/');
    expect(list.matchingPattern('app.py', false)).toBeNull();
  });

  it('empty list excludes nothing', () => {
    expect(ExclusionList.empty().matches('anything', false)).toBe(false);
  });
});

// ── loadExclusionList ──

describe('loadExclusionList', () => {
  it('loads the fixture file', () => {
    const list = loadExclusionList(join(fixturesDir, 'exclude.txt'));
    expect(list.patterns).toEqual(['uploads/', 'venv/', '.env', '__pycache__/']);
  });

  it('merges inline patterns', () => {
    const list = loadExclusionList(join(fixturesDir, 'exclude.txt'), ['.log']);
    expect(list.size).toBe(5);
    expect(list.has('.log')).toBe(true);
  });

  it('uses only inline patterns without a file', () => {
    const list = loadExclusionList(undefined, ['.log']);
    expect(list.patterns).toEqual(['.log']);
  });

  it('throws EXCLUSIONS_NOT_FOUND for a missing file', () => {
    const dir = ctx.createTempDir();
    const err = expectDeployError(() => loadExclusionList(join(dir, 'missing.txt')), 'EXCLUSIONS_NOT_FOUND');
    expect(err.message).toContain('missing.txt');
  });
});

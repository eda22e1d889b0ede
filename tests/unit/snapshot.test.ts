import { describe, it, expect, beforeAll } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { configureLogger } from '../../src/common/logger';
import { diagnostics } from '../../src/normalization';
import type { NormalizationContext } from '../../src/normalization';
import { checkSnapshotFile, compareSnapshot, formatMismatch } from '../../src/snapshot';

const context: NormalizationContext = {
  packageName: 'demo',
  sourceDirectory: '/tmp/proj',
  workspaceRoot: '/home/dev/ws',
};

const raw = 'error[E0308]: mismatched types\n --> /tmp/proj/src/main.rs:3:5\n\nerror: Could not compile `demo`.\n';
const older = 'error[E0308]: mismatched types\n --> $DIR/main.rs:3:5\n\nerror: Could not compile `$CRATE`.\n';
const preferred = 'error[E0308]: mismatched types\n --> $DIR/main.rs:3:5\n';

async function withTempDir(fn: (dir: string) => Promise<void>) {
  const dir = await mkdtemp(join(tmpdir(), 'diagnostic-normalizer-snapshot-'));
  try {
    await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

beforeAll(() => {
  configureLogger({ level: 'silent' });
});

describe('compareSnapshot', () => {
  it('accepts snapshots saved with CRLF line endings', () => {
    const result = compareSnapshot(diagnostics(raw, context), older.replace(/\n/g, '\r\n'));
    expect(result).toEqual({ matched: true, level: 'basic', preferred });
  });

  it('reports the preferred variation on mismatch', () => {
    const result = compareSnapshot(diagnostics(raw, context), 'stale\n');
    expect(result).toEqual({ matched: false, level: undefined, preferred });
  });
});

describe('formatMismatch', () => {
  it('renders expected and actual blocks', () => {
    const rule = '┈'.repeat(60);
    expect(formatMismatch('a\r\nb\n', 'c\n')).toBe(
      `EXPECTED:\n${rule}\na\nb\n${rule}\n\nACTUAL:\n${rule}\nc\n${rule}\n`,
    );
  });
});

describe('checkSnapshotFile', () => {
  it('reports a missing snapshot', async () => {
    await withTempDir(async (dir) => {
      const result = await checkSnapshotFile({ rawOutput: raw, context, snapshotPath: join(dir, 'main.stderr') });
      expect(result.outcome).toBe('missing');
      expect(result.preferred).toBe(preferred);
      expect(result.expected).toBeUndefined();
    });
  });

  it('matches a snapshot saved at an older level', async () => {
    await withTempDir(async (dir) => {
      const snapshotPath = join(dir, 'main.stderr');
      await writeFile(snapshotPath, older);
      const result = await checkSnapshotFile({ rawOutput: Buffer.from(raw), context, snapshotPath });
      expect(result.outcome).toBe('matched');
      expect(result.level).toBe('basic');
    });
  });

  it('reports a mismatch with the snapshot contents', async () => {
    await withTempDir(async (dir) => {
      const snapshotPath = join(dir, 'main.stderr');
      await writeFile(snapshotPath, 'stale\n');
      const result = await checkSnapshotFile({ rawOutput: raw, context, snapshotPath });
      expect(result.outcome).toBe('mismatch');
      expect(result.expected).toBe('stale\n');
    });
  });

  it('blesses missing and mismatched snapshots', async () => {
    await withTempDir(async (dir) => {
      const missingPath = join(dir, 'nested', 'new.stderr');
      const missing = await checkSnapshotFile({ rawOutput: raw, context, snapshotPath: missingPath, bless: true });
      expect(missing.outcome).toBe('blessed');
      expect(await readFile(missingPath, 'utf8')).toBe(preferred);

      const stalePath = join(dir, 'stale.stderr');
      await writeFile(stalePath, 'stale\n');
      const stale = await checkSnapshotFile({ rawOutput: raw, context, snapshotPath: stalePath, bless: true });
      expect(stale.outcome).toBe('blessed');
      expect(stale.expected).toBe('stale\n');
      expect(await readFile(stalePath, 'utf8')).toBe(preferred);
    });
  });

  it('leaves matching snapshots untouched when blessing', async () => {
    await withTempDir(async (dir) => {
      const snapshotPath = join(dir, 'main.stderr');
      await writeFile(snapshotPath, older);
      const result = await checkSnapshotFile({ rawOutput: raw, context, snapshotPath, bless: true });
      expect(result.outcome).toBe('matched');
      expect(await readFile(snapshotPath, 'utf8')).toBe(older);
    });
  });
});

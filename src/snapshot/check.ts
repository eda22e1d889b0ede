import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { getLogger } from '../common/logger';
import { diagnostics, NormalizationContext, NormalizationLevel, RawOutput } from '../normalization';
import { compareSnapshot } from './compare';

export type SnapshotOutcome = 'matched' | 'mismatch' | 'missing' | 'blessed';

export interface SnapshotCheckOptions {
  rawOutput: RawOutput;
  context: NormalizationContext;
  snapshotPath: string;
  /** Write the preferred variation when the snapshot is missing or does not match. */
  bless?: boolean;
}

export interface SnapshotCheckResult {
  outcome: SnapshotOutcome;
  snapshotPath: string;
  preferred: string;
  /** Snapshot contents as read from disk; absent when the file did not exist. */
  expected?: string;
  level?: NormalizationLevel;
}

async function readSnapshot(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, 'utf8');
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined;
    }
    throw error;
  }
}

export async function checkSnapshotFile(options: SnapshotCheckOptions): Promise<SnapshotCheckResult> {
  const log = getLogger('snapshot');
  const snapshotPath = resolve(options.snapshotPath);
  const variations = diagnostics(options.rawOutput, options.context);
  const preferred = variations.preferred();
  const expected = await readSnapshot(snapshotPath);

  if (expected !== undefined) {
    const comparison = compareSnapshot(variations, expected);
    if (comparison.matched) {
      log.debug(`Snapshot ${snapshotPath} matched`, { level: comparison.level });
      return { outcome: 'matched', snapshotPath, preferred, expected, level: comparison.level };
    }
  }

  if (options.bless) {
    await mkdir(dirname(snapshotPath), { recursive: true });
    await writeFile(snapshotPath, preferred);
    log.info(`Wrote snapshot ${snapshotPath}`);
    return { outcome: 'blessed', snapshotPath, preferred, expected };
  }

  if (expected === undefined) {
    log.debug(`Snapshot ${snapshotPath} does not exist`);
    return { outcome: 'missing', snapshotPath, preferred };
  }

  log.debug(`Snapshot ${snapshotPath} did not match any variation`);
  return { outcome: 'mismatch', snapshotPath, preferred, expected };
}

#!/usr/bin/env node
import { Command } from 'commander';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { loadConfig, NormalizerConfig } from '../config';
import { configureLogger, getLogger, Logger, parseLogFormat, parseLogLevel } from '../common/logger';
import {
  diagnostics,
  isNormalizationLevel,
  NORMALIZATION_LEVELS,
  NormalizationContext,
  NormalizationLevel,
} from '../normalization';
import { checkSnapshotFile, formatMismatch } from '../snapshot';

interface ContextOptions {
  config?: string;
  profile?: string;
  package?: string;
  sourceDir?: string;
  workspace?: string;
}

interface NormalizeOptions extends ContextOptions {
  level?: string;
  all?: boolean;
}

interface CheckOptions extends ContextOptions {
  bless?: boolean;
}

interface ResolvedSettings {
  context: NormalizationContext;
  bless: boolean;
}

function buildSampleConfig(): string {
  return `context:
  packageName: my-package
  sourceDirectory: ./tests/ui
  workspaceRoot: ./
snapshot:
  bless: false
profiles:
  ci:
    snapshot:
      bless: false
`;
}

function withContextOptions(command: Command): Command {
  return command
    .option('--config <path>', 'Config file path')
    .option('--profile <name>', 'Config profile')
    .option('--package <name>', 'Package name to redact as $CRATE')
    .option('--source-dir <path>', 'Source directory to redact as $DIR')
    .option('--workspace <path>', 'Workspace root to redact as $WORKSPACE');
}

async function resolveSettings(options: ContextOptions): Promise<ResolvedSettings> {
  let config: NormalizerConfig | undefined;
  if (options.config) {
    config = await loadConfig(options.config, options.profile);
  } else if (options.profile) {
    throw new Error('--profile requires --config');
  }

  const packageName = options.package ?? config?.context.packageName;
  const sourceDirectory = options.sourceDir ? resolve(options.sourceDir) : config?.context.sourceDirectory;
  const workspaceRoot = options.workspace ? resolve(options.workspace) : config?.context.workspaceRoot;

  if (packageName === undefined) {
    throw new Error('Missing package name: pass --package or set context.packageName in the config');
  }
  if (sourceDirectory === undefined) {
    throw new Error('Missing source directory: pass --source-dir or set context.sourceDirectory in the config');
  }
  if (workspaceRoot === undefined) {
    throw new Error('Missing workspace root: pass --workspace or set context.workspaceRoot in the config');
  }

  return {
    context: { packageName, sourceDirectory, workspaceRoot },
    bless: config?.snapshot?.bless ?? false,
  };
}

function parseLevel(value?: string): NormalizationLevel | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isNormalizationLevel(value)) {
    throw new Error(`Unsupported level "${value}". Use one of ${NORMALIZATION_LEVELS.join(',')}.`);
  }
  return value;
}

async function readRawOutput(path: string): Promise<Buffer> {
  if (path !== '-') {
    return readFile(resolve(path));
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

function fail(log: Logger, error: unknown): void {
  const message = error instanceof Error ? error.message : String(error);
  log.error(message);
  process.exitCode = 1;
}

export async function runCli(argv = process.argv): Promise<void> {
  const program = new Command();
  program.name('diagnostic-normalizer').description('Normalize compiler diagnostics for snapshot comparison');
  const rootLogger = getLogger('cli');

  program
    .option('--log-level <level>', 'Log level (silent|error|warn|info|debug)', process.env.DIAGNOSTIC_NORMALIZER_LOG_LEVEL)
    .option('--log-format <format>', 'Log format (text|json)', process.env.DIAGNOSTIC_NORMALIZER_LOG_FORMAT)
    .hook('preAction', () => {
      const opts = program.opts<{ logLevel?: string; logFormat?: string }>();
      const level = parseLogLevel(opts.logLevel);
      const format = parseLogFormat(opts.logFormat);
      configureLogger({ level, format, destination: process.stderr });
    });

  program
    .command('init')
    .description('Create sample configuration file')
    .option('--config <path>', 'Config path', '.diagnostic-normalizer.yaml')
    .action(async (options: { config: string }) => {
      const log = getLogger('cli:init');
      const target = resolve(options.config);
      await mkdir(dirname(target), { recursive: true });
      try {
        await writeFile(target, buildSampleConfig(), { flag: 'wx' });
      } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'EEXIST') {
          throw new Error(`Config file already exists at ${target}`);
        }
        throw error;
      }
      log.info(`Created config at ${target}`);
    });

  program
    .command('levels')
    .description('List normalization levels from least to most aggressive')
    .action(() => {
      process.stdout.write(`${NORMALIZATION_LEVELS.join('\n')}\n`);
    });

  withContextOptions(
    program
      .command('normalize')
      .description('Print the normalized form of a tool output file (- reads stdin)')
      .argument('<file>', 'Raw tool output'),
  )
    .option('--level <level>', 'Print the output of one level instead of the preferred one')
    .option('--all', 'Print every variation as JSON')
    .action(async (file: string, options: NormalizeOptions) => {
      const log = getLogger('cli:normalize');
      const level = parseLevel(options.level);
      const { context } = await resolveSettings(options);
      const variations = diagnostics(await readRawOutput(file), context);
      log.debug(`Normalized ${file}`, { variations: variations.size });

      if (options.all) {
        process.stdout.write(`${JSON.stringify(variations.entries(), null, 2)}\n`);
        return;
      }
      process.stdout.write(level ? variations.at(level) ?? '' : variations.preferred());
    });

  withContextOptions(
    program
      .command('check')
      .description('Compare a tool output file against a saved snapshot')
      .argument('<output>', 'Raw tool output (- reads stdin)')
      .argument('<snapshot>', 'Saved snapshot file'),
  )
    .option('--bless', 'Write the preferred variation when the snapshot is missing or differs')
    .action(async (output: string, snapshot: string, options: CheckOptions) => {
      const log = getLogger('cli:check');
      const settings = await resolveSettings(options);
      const result = await checkSnapshotFile({
        rawOutput: await readRawOutput(output),
        context: settings.context,
        snapshotPath: snapshot,
        bless: options.bless ?? settings.bless,
      });

      switch (result.outcome) {
        case 'matched':
          log.info(`Snapshot ${result.snapshotPath} matches`, { level: result.level });
          return;
        case 'blessed':
          log.info(`Snapshot ${result.snapshotPath} updated`);
          return;
        case 'missing':
          log.error(`Snapshot ${result.snapshotPath} does not exist`);
          process.stdout.write(result.preferred);
          process.exitCode = 1;
          return;
        case 'mismatch':
          log.error(`Snapshot ${result.snapshotPath} does not match`);
          process.stderr.write(formatMismatch(result.expected ?? '', result.preferred));
          process.exitCode = 1;
          return;
      }
    });

  try {
    await program.parseAsync(argv);
  } catch (error) {
    fail(rootLogger, error);
  }
}

if (require.main === module) {
  void runCli();
}

import { readFile } from 'node:fs/promises';
import { dirname, extname, resolve, isAbsolute } from 'node:path';
import * as yaml from 'js-yaml';
import * as toml from 'toml';
import { getLogger } from '../common/logger';
import { ContextConfig, NormalizerConfig, NormalizerProfile, SnapshotConfig } from './types';

const CONTEXT_FIELDS = ['packageName', 'sourceDirectory', 'workspaceRoot'] as const;

function parseContents(contents: string, ext: string, path: string): unknown {
  switch (ext) {
    case '.yaml':
    case '.yml':
      return yaml.load(contents);
    case '.toml':
      return toml.parse(contents);
    case '.json':
      return JSON.parse(contents);
    default:
      throw new Error(`Unsupported config format for ${path}`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readContext(value: unknown, where: string): Partial<ContextConfig> {
  if (!isRecord(value)) {
    throw new Error(`Config must define "${where}" section`);
  }
  const context: Partial<Record<(typeof CONTEXT_FIELDS)[number], string>> = {};
  for (const field of CONTEXT_FIELDS) {
    const fieldValue = value[field];
    if (fieldValue === undefined) {
      continue;
    }
    if (typeof fieldValue !== 'string') {
      throw new Error(`Config field "${where}.${field}" must be a string`);
    }
    context[field] = fieldValue;
  }
  return context;
}

function requireContext(value: unknown, where: string): ContextConfig {
  const context = readContext(value, where);
  const { packageName, sourceDirectory, workspaceRoot } = context;
  if (packageName === undefined || sourceDirectory === undefined || workspaceRoot === undefined) {
    const missing = CONTEXT_FIELDS.find((field) => context[field] === undefined);
    throw new Error(`Config field "${where}.${missing}" must be a string`);
  }
  return { packageName, sourceDirectory, workspaceRoot };
}

function readSnapshot(value: unknown, where: string): SnapshotConfig | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new Error(`Config section "${where}" must be a table`);
  }
  const { bless } = value;
  if (bless !== undefined && typeof bless !== 'boolean') {
    throw new Error(`Config field "${where}.bless" must be a boolean`);
  }
  return bless === undefined ? {} : { bless };
}

function readProfiles(value: unknown): Record<string, NormalizerProfile> | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (!isRecord(value)) {
    throw new Error('Config section "profiles" must be a table');
  }
  const profiles: Record<string, NormalizerProfile> = {};
  for (const [name, profile] of Object.entries(value)) {
    if (!isRecord(profile)) {
      throw new Error(`Profile ${name} must be a table`);
    }
    profiles[name] = {
      context: profile.context === undefined ? undefined : readContext(profile.context, `profiles.${name}.context`),
      snapshot: readSnapshot(profile.snapshot, `profiles.${name}.snapshot`),
    };
  }
  return profiles;
}

function validateConfig(parsed: unknown): NormalizerConfig {
  if (!isRecord(parsed)) {
    throw new Error('Config must define "context" section');
  }
  return {
    context: requireContext(parsed.context, 'context'),
    snapshot: readSnapshot(parsed.snapshot, 'snapshot'),
    profiles: readProfiles(parsed.profiles),
  };
}

export async function loadConfig(path: string, profile?: string): Promise<NormalizerConfig> {
  const absolute = resolve(path);
  const baseDir = dirname(absolute);
  const contents = await readFile(absolute, 'utf8');
  const parsed = validateConfig(parseContents(contents, extname(absolute).toLowerCase(), absolute));
  getLogger('config').debug(`Loaded config from ${absolute}`, { profile });

  if (profile) {
    const profileConfig = parsed.profiles?.[profile];
    if (!profileConfig) {
      throw new Error(`Profile ${profile} not found in config`);
    }
    return normalizeConfigPaths(mergeConfigs(parsed, profileConfig), baseDir);
  }

  return normalizeConfigPaths(parsed, baseDir);
}

function mergeConfigs(base: NormalizerConfig, overlay: NormalizerProfile): NormalizerConfig {
  return {
    ...base,
    context: {
      ...base.context,
      ...overlay.context,
    },
    snapshot: {
      ...base.snapshot,
      ...overlay.snapshot,
    },
  };
}

function resolvePath(path: string, baseDir: string): string {
  return isAbsolute(path) ? path : resolve(baseDir, path);
}

function normalizeConfigPaths(config: NormalizerConfig, baseDir: string): NormalizerConfig {
  return {
    ...config,
    context: {
      ...config.context,
      sourceDirectory: resolvePath(config.context.sourceDirectory, baseDir),
      workspaceRoot: resolvePath(config.context.workspaceRoot, baseDir),
    },
  };
}

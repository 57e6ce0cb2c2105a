// Config loader: reads the YAML config files in order and merges each over the defaults.
// Later files override earlier ones key by key; lists replace rather than append.
// A missing file is skipped; an unreadable or invalid one is logged and skipped, so a
// broken config degrades to "no mainline candidates" instead of failing the export.
import { readFileSync, existsSync } from 'node:fs';
import { join, resolve } from 'node:path';
import { homedir } from 'node:os';
import { parse as parseYaml } from 'yaml';
import { ZodError } from 'zod';
import type { PatchConfig } from '../types/config.js';
import { ConfigFileSchema, type ConfigFile } from './schema.js';
import { PatchError, PatchErrorCode, describeError } from '../shared/errors.js';
import { logger } from '../shared/logger.js';

export const DEFAULT_CONFIG: PatchConfig = {
  repositories: { search: ['.'], mainline: [] },
  mainlineTags: {},
  contact: { emails: [] },
  format: {
    numberWidth: 4,
    notInMainline: 'Not yet in mainline',
    queued: 'Queued in subsystem maintainer repo',
    maxNameLength: 64,
  },
};

export function defaultConfigPaths(cwd: string = process.cwd(), home: string = homedir()): string[] {
  return [
    '/etc/patch-export.yaml',
    join(home, '.config', 'patch-export', 'config.yaml'),
    join(cwd, 'patch-export.yaml'),
  ];
}

export interface ConfigResult {
  config: PatchConfig;
  /** Files that were read and applied, in order. */
  sources: string[];
}

export interface LoadConfigOptions {
  /** Read only this file; it must exist. */
  explicitPath?: string;
  cwd?: string;
  home?: string;
}

export function loadConfig(options: LoadConfigOptions = {}): ConfigResult {
  const cwd = options.cwd ?? process.cwd();

  if (options.explicitPath) {
    const path = resolve(cwd, options.explicitPath);
    if (!existsSync(path)) {
      throw new PatchError(PatchErrorCode.CONFIG_ERROR, `Config file not found: ${path}`, { path });
    }
    return { config: applyConfigFile(cloneConfig(DEFAULT_CONFIG), readConfigFile(path)), sources: [path] };
  }

  let config = cloneConfig(DEFAULT_CONFIG);
  const sources: string[] = [];
  for (const path of defaultConfigPaths(cwd, options.home)) {
    if (!existsSync(path)) continue;
    try {
      config = applyConfigFile(config, readConfigFile(path));
      sources.push(path);
    } catch (err) {
      logger.warn({ configPath: path, error: describeError(err) }, 'Ignoring unusable config file');
    }
  }
  logger.debug({ sources }, 'Configuration loaded');
  return { config, sources };
}

export function readConfigFile(path: string): ConfigFile {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new PatchError(PatchErrorCode.CONFIG_ERROR, `Cannot read config file: ${path}`, {
      path,
      cause: describeError(err),
    });
  }
  return parseConfigText(raw, path);
}

export function parseConfigText(raw: string, origin = '<inline>'): ConfigFile {
  try {
    return ConfigFileSchema.parse(parseYaml(raw) ?? {});
  } catch (err) {
    const issues =
      err instanceof ZodError
        ? err.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        : [describeError(err)];
    throw new PatchError(PatchErrorCode.CONFIG_ERROR, `Invalid config file ${origin}: ${issues.join('; ')}`, {
      path: origin,
      issues,
    });
  }
}

/** Merge one parsed file over an existing config; the input config is not mutated. */
export function applyConfigFile(base: PatchConfig, file: ConfigFile): PatchConfig {
  const config = cloneConfig(base);
  for (const [key, locations] of Object.entries(file.repositories ?? {})) {
    config.repositories[key] = [...locations];
  }
  Object.assign(config.mainlineTags, file.mainline_tags ?? {});
  if (file.contact?.name) config.contact.name = file.contact.name;
  if (file.contact?.email) config.contact.emails = [...file.contact.email];

  const format = file.format ?? {};
  if (format.number_width !== undefined) config.format.numberWidth = format.number_width;
  if (format.not_in_mainline !== undefined) config.format.notInMainline = format.not_in_mainline;
  if (format.queued !== undefined) config.format.queued = format.queued;
  if (format.max_name_length !== undefined) config.format.maxNameLength = format.max_name_length;
  return config;
}

export function repositoriesFor(config: PatchConfig | undefined, key: string): string[] {
  return config?.repositories[key] ?? [];
}

function cloneConfig(config: PatchConfig): PatchConfig {
  return {
    repositories: Object.fromEntries(Object.entries(config.repositories).map(([k, v]) => [k, [...v]])),
    mainlineTags: { ...config.mainlineTags },
    contact: { ...config.contact, emails: [...config.contact.emails] },
    format: { ...config.format },
  };
}

import { readFileSync } from 'node:fs';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export interface GitConfig {
  enabled: boolean;
  gitBinary: string;
  includeSubmodules: boolean;
  includeMesonSubprojects: boolean;
}

export interface ScannerConfig {
  exclude: string[];
  concurrency: number;
  windowLines: number;
  checksum: boolean;
}

export interface Config {
  scanner: ScannerConfig;
  git: GitConfig;
  header: {
    mode: 'replace' | 'append';
    mergeCopyrights: boolean;
  };
  report: {
    format: 'plain' | 'json' | 'bom';
  };
}

export const defaultConfig: Config = {
  scanner: {
    exclude: [],
    concurrency: 16,
    windowLines: 400,
    checksum: false,
  },
  git: {
    enabled: true,
    gitBinary: 'git',
    includeSubmodules: false,
    includeMesonSubprojects: false,
  },
  header: {
    mode: 'replace',
    mergeCopyrights: false,
  },
  report: {
    format: 'plain',
  },
};

const partialConfigSchema = z.object({
  scanner: z.object({
    exclude: z.array(z.string()),
    concurrency: z.number().int().positive(),
    windowLines: z.number().int().positive(),
    checksum: z.boolean(),
  }).partial().optional(),
  git: z.object({
    enabled: z.boolean(),
    gitBinary: z.string().min(1),
    includeSubmodules: z.boolean(),
    includeMesonSubprojects: z.boolean(),
  }).partial().optional(),
  header: z.object({
    mode: z.enum(['replace', 'append']),
    mergeCopyrights: z.boolean(),
  }).partial().optional(),
  report: z.object({
    format: z.enum(['plain', 'json', 'bom']),
  }).partial().optional(),
});

type PartialConfig = z.infer<typeof partialConfigSchema>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isMissingFile(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}

export function mergeConfig(parsed: PartialConfig): Config {
  return {
    scanner: { ...defaultConfig.scanner, ...(parsed.scanner || {}) },
    git: { ...defaultConfig.git, ...(parsed.git || {}) },
    header: { ...defaultConfig.header, ...(parsed.header || {}) },
    report: { ...defaultConfig.report, ...(parsed.report || {}) },
  };
}

function loadConfig(): Config {
  const configPath = process.env.SPDX_LINT_CONFIG ||
    resolve(__dirname, '../spdx-lint.config.json');

  let configContent: string;
  try {
    configContent = readFileSync(configPath, 'utf-8');
  } catch (error) {
    if (isMissingFile(error)) {
      return mergeConfig({});
    }
    console.error(`Failed to read config from ${configPath}:`, error);
    process.exit(1);
  }

  try {
    return mergeConfig(partialConfigSchema.parse(JSON.parse(configContent)));
  } catch (error) {
    console.error(`Failed to load config from ${configPath}:`, error);
    process.exit(1);
  }
}

export const config = loadConfig();

import fs from 'node:fs';
import path from 'node:path';

import yaml from 'yaml';
import { z } from 'zod';

import { DEFAULT_COLUMN_DELIMITERS } from './columnFormatter.js';
import { ConfigError } from './errors.js';
import { DEFAULT_COMMANDS, DEFAULT_HELP_KEY, type CommandDescriptor } from './registry.js';

const NonEmptyTrimmedStringSchema = z.string().trim().min(1);

const SingleCharacterSchema = z
  .string()
  .refine((value) => [...value].length === 1, { message: 'must be a single character' });

const CommandDescriptorSchema = z.object({
  key: SingleCharacterSchema,
  program: NonEmptyTrimmedStringSchema,
  lineFlag: NonEmptyTrimmedStringSchema,
  extraArgs: z.array(z.string()).optional().default([]),
  singleFileOnly: z.boolean().optional().default(false),
});

const NlinesConfigSchema = z.object({
  defaultLineCount: z.number().int().min(1).optional(),
  helpKey: SingleCharacterSchema.optional(),
  commands: z.array(CommandDescriptorSchema).optional(),
  columnDelimiters: z.record(z.string(), z.string().min(1)).optional(),
});

export interface NlinesConfig {
  defaultLineCount: number;
  helpKey: string;
  commands: CommandDescriptor[];
  /**
   * File extension (without dot) to `column --separator` value.
   */
  columnDelimiters: Record<string, string>;
  debug: boolean;
}

export const DEFAULT_LINE_COUNT = 10;

const DEFAULT_CONFIG_FILENAMES = ['nlines.config.json', 'nlines.config.yaml', 'nlines.config.yml'];

export function findConfigFile(cwd: string): string | undefined {
  for (const filename of DEFAULT_CONFIG_FILENAMES) {
    const fullPath = path.join(cwd, filename);
    if (fs.existsSync(fullPath)) {
      return fullPath;
    }
  }
  return undefined;
}

function readConfigFile(configPath: string): unknown {
  let raw: string;
  try {
    raw = fs.readFileSync(configPath, 'utf8');
  } catch (err) {
    const anyErr = err as NodeJS.ErrnoException;
    if (anyErr && anyErr.code === 'ENOENT') {
      throw new ConfigError(`Configuration file not found at ${configPath}`);
    }
    throw new ConfigError(`Failed to read configuration file at ${configPath}: ${anyErr}`);
  }

  try {
    return configPath.endsWith('.json') ? (JSON.parse(raw) as unknown) : (yaml.parse(raw) as unknown);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Configuration file at ${configPath} could not be parsed: ${message}`);
  }
}

function parseDefaultLineCount(value: string): number {
  const parsed = Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ConfigError('NLINES_DEFAULT_LINES must be a positive integer when set');
  }
  return parsed;
}

function isTruthy(value: string | undefined): boolean {
  return value !== undefined && (value.toLowerCase() === 'true' || value === '1');
}

export function loadConfig(
  options: { cwd?: string; configPath?: string; env?: NodeJS.ProcessEnv } = {},
): NlinesConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const configPath = options.configPath
    ? path.resolve(cwd, options.configPath)
    : findConfigFile(cwd);

  // An empty YAML document parses to null.
  const content = configPath ? readConfigFile(configPath) ?? {} : {};
  const result = NlinesConfigSchema.safeParse(content);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration in ${configPath ?? '(defaults)'}: ${issues}`);
  }
  const parsed = result.data;

  const envLines = env['NLINES_DEFAULT_LINES'];
  const defaultLineCount =
    envLines !== undefined && envLines.trim().length > 0
      ? parseDefaultLineCount(envLines)
      : parsed.defaultLineCount ?? DEFAULT_LINE_COUNT;

  const commands =
    parsed.commands && parsed.commands.length > 0
      ? parsed.commands
      : DEFAULT_COMMANDS.map((descriptor) => ({
          ...descriptor,
          extraArgs: [...descriptor.extraArgs],
        }));

  return {
    defaultLineCount,
    helpKey: parsed.helpKey ?? DEFAULT_HELP_KEY,
    commands,
    columnDelimiters: { ...DEFAULT_COLUMN_DELIMITERS, ...(parsed.columnDelimiters ?? {}) },
    debug: isTruthy(env['NLINES_DEBUG']),
  };
}

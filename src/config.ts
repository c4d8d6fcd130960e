// Config loader: reads ~/.config/repo-workbench/config.yaml (or $WORKBENCH_CONFIG), fills
// unset keys from the schema defaults, then applies environment overrides.
// A missing file is not an error; a file that fails validation is.
import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { join } from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { WorkbenchError, WorkbenchErrorCode, errorMessage } from './shared/errors.js';
import { logger } from './shared/logger.js';

export const DEFAULT_CONFIG_PATH = join(homedir(), '.config', 'repo-workbench', 'config.yaml');

const CommandSchema = z.array(z.string().min(1)).min(1).nullable();
const ExecutionModeSchema = z.enum(['in-process', 'subprocess']);

export const ConfigSchema = z.object({
  repository: z.object({
    root: z.string().nullable().default(null),
    extensions: z.array(z.string().regex(/^\./, 'extensions start with a dot')).min(1).default(['.js', '.cjs']),
    ignore_dirs: z.array(z.string()).default(['node_modules', '.git']),
  }).default({}),
  execution: z.object({
    mode: ExecutionModeSchema.default('in-process'),
    timeout_ms: z.number().int().positive().default(30_000),
    node_path: z.string().nullable().default(null),
  }).default({}),
  editor: z.object({
    command: CommandSchema.default(null),
    timeout_ms: z.number().int().positive().default(600_000),
  }).default({}),
  renderer: z.object({
    command: CommandSchema.default(null),
    timeout_ms: z.number().int().positive().default(60_000),
  }).default({}),
});

export type WorkbenchConfig = z.infer<typeof ConfigSchema>;

export interface ConfigResult {
  config: WorkbenchConfig;
  configPath: string;
  fromFile: boolean;
}

export function loadConfig(
  explicitPath?: string,
  env: NodeJS.ProcessEnv = process.env,
): ConfigResult {
  const configPath = explicitPath ?? env['WORKBENCH_CONFIG'] ?? DEFAULT_CONFIG_PATH;
  const fromFile = existsSync(configPath);

  let raw: unknown = {};
  if (fromFile) {
    try {
      raw = parseYaml(readFileSync(configPath, 'utf-8')) ?? {};
    } catch (err) {
      throw new WorkbenchError(WorkbenchErrorCode.INVALID_CONFIG, `Failed to read config: ${errorMessage(err)}`, { configPath });
    }
  } else {
    logger.debug({ configPath }, 'No config file found, using defaults');
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new WorkbenchError(WorkbenchErrorCode.INVALID_CONFIG, `Invalid config in ${configPath}`, {
      issues: parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; '),
    });
  }

  return { config: applyEnvOverrides(parsed.data, env), configPath, fromFile };
}

function applyEnvOverrides(config: WorkbenchConfig, env: NodeJS.ProcessEnv): WorkbenchConfig {
  const root = env['WORKBENCH_REPO_ROOT'];
  const mode = env['WORKBENCH_EXECUTION_MODE'];
  let result = config;
  if (root) {
    result = { ...result, repository: { ...result.repository, root } };
  }
  if (mode) {
    const parsedMode = ExecutionModeSchema.safeParse(mode);
    if (!parsedMode.success) {
      throw new WorkbenchError(WorkbenchErrorCode.INVALID_CONFIG, `Invalid WORKBENCH_EXECUTION_MODE: ${mode}`);
    }
    result = { ...result, execution: { ...result.execution, mode: parsedMode.data } };
  }
  return result;
}

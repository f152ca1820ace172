import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import {
  DEFAULT_JOB_STEP_MS,
  DEFAULT_MAX_CONCURRENT_JOBS,
  DEFAULT_PAGE_SIZE,
  LOG_LEVEL_NAMES,
  MAX_PAGE_SIZE,
  ValidationError,
  createLogger,
  errorMessage,
  isLogLevel,
} from '@taskdeck/core';

const log = createLogger('Config');

export const CONFIG_FILE_NAME = 'taskdeck.config.json';

const ConfigSchema = z.object({
  appName: z.string().min(1),
  version: z.string().min(1),
  /** Forces debug logging */
  debug: z.boolean(),
  logLevel: z.enum(LOG_LEVEL_NAMES),
  maxConcurrentJobs: z.number().int().min(1),
  jobStepMs: z.number().int().min(0),
  defaultPageSize: z.number().int().min(1).max(MAX_PAGE_SIZE),
});

export type TaskdeckConfig = z.infer<typeof ConfigSchema>;

const FileConfigSchema = ConfigSchema.partial();

export const DEFAULT_CONFIG: TaskdeckConfig = {
  appName: 'Taskdeck',
  version: '1.0.0',
  debug: false,
  logLevel: 'info',
  maxConcurrentJobs: DEFAULT_MAX_CONCURRENT_JOBS,
  jobStepMs: DEFAULT_JOB_STEP_MS,
  defaultPageSize: DEFAULT_PAGE_SIZE,
};

export interface LoadConfigOptions {
  /** Directory searched for taskdeck.config.json (default: process.cwd()) */
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

function readFileConfig(path: string): Partial<TaskdeckConfig> {
  if (!existsSync(path)) return {};
  try {
    const parsed = FileConfigSchema.safeParse(JSON.parse(readFileSync(path, 'utf-8')));
    if (!parsed.success) {
      log.warn(`Ignoring invalid config file ${path}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`);
      return {};
    }
    log.info(`Loaded config from ${path}`);
    return parsed.data;
  } catch (err) {
    log.warn(`Failed to read config file ${path}, using defaults: ${errorMessage(err)}`);
    return {};
  }
}

function parseIntVar(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw === '') return undefined;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new ValidationError(name, `${name} must be an integer, got "${raw}"`);
  }
  return value;
}

function readEnvConfig(env: NodeJS.ProcessEnv): Partial<TaskdeckConfig> {
  const overrides: Partial<TaskdeckConfig> = {};

  const level = env.TASKDECK_LOG_LEVEL;
  if (level !== undefined && level !== '') {
    if (!isLogLevel(level)) {
      throw new ValidationError('TASKDECK_LOG_LEVEL', `Unknown log level "${level}"`);
    }
    overrides.logLevel = level;
  }

  const maxJobs = parseIntVar(env, 'TASKDECK_MAX_CONCURRENT_JOBS');
  if (maxJobs !== undefined) overrides.maxConcurrentJobs = maxJobs;

  const stepMs = parseIntVar(env, 'TASKDECK_JOB_STEP_MS');
  if (stepMs !== undefined) overrides.jobStepMs = stepMs;

  const debug = env.TASKDECK_DEBUG;
  if (debug !== undefined && debug !== '') {
    overrides.debug = debug === '1' || debug.toLowerCase() === 'true';
  }

  return overrides;
}

/** Priority: environment > config file > defaults */
export function loadConfig(options: LoadConfigOptions = {}): TaskdeckConfig {
  const cwd = options.cwd ?? process.cwd();
  const env = options.env ?? process.env;

  const merged = {
    ...DEFAULT_CONFIG,
    ...readFileConfig(join(cwd, CONFIG_FILE_NAME)),
    ...readEnvConfig(env),
  };

  const result = ConfigSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue ? issue.path.join('.') : 'config';
    throw new ValidationError(field, `Invalid configuration: ${field}: ${issue?.message ?? 'unknown issue'}`);
  }

  const config = result.data;
  return config.debug ? { ...config, logLevel: 'debug' } : config;
}

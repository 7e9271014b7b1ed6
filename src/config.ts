import { parse as parseEnvFile } from 'dotenv';
import { existsSync, readFileSync } from 'fs';
import { homedir } from 'os';
import { dirname, isAbsolute, join, normalize } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';
import { parseCacheTtl } from './context/duration.js';
import { findBranchNameProblem } from './workspaces/branchValidation.js';

export interface TreehopConfig {
  // Directory layout
  readonly projectsDirectory: string;
  readonly worktreesDirectory: string;

  // Branch new worktrees start from when none is given
  readonly defaultSourceBranch: string;

  readonly logLevel: LogLevel;

  readonly contextDetection: {
    /** Raw TTL string, e.g. "5s" */
    readonly cacheTtl: string;
    readonly cacheTtlMs: number;
    /** Validate discovered projects through git rather than a `.git` check */
    readonly enableGitValidation: boolean;
  };

  readonly git: {
    readonly cliTimeoutMs: number;
  };

  readonly hooks: {
    /** Limit for each post-create command */
    readonly timeoutMs: number;
  };

  readonly navigation: {
    /** 0 means unlimited */
    readonly maxSuggestions: number;
  };

  readonly validation: {
    readonly protectedBranches: readonly string[];
  };

  /** Config file that was read, if any */
  readonly configPath: string | null;
}

/** Values accepted by {@link createConfig}; everything else takes its default */
export interface ConfigValues {
  projectsDirectory?: string;
  worktreesDirectory?: string;
  defaultSourceBranch?: string;
  logLevel?: string;
  cacheTtl?: string;
  enableGitValidation?: boolean;
  cliTimeoutMs?: number;
  hookTimeoutMs?: number;
  maxSuggestions?: number;
  protectedBranches?: string[];
  configPath?: string | null;
}

/** Flag values from the command line, the highest-priority layer */
export interface ConfigOverrides {
  projectsDirectory?: string;
  worktreesDirectory?: string;
  logLevel?: string;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  /** Explicit config file; skips the XDG lookup */
  configPath?: string;
  homeDir?: string;
}

const DEFAULT_PROTECTED_BRANCHES = ['main', 'master', 'develop'];

const configFileSchema = z
  .object({
    projects_dir: z.string().min(1).optional(),
    worktrees_dir: z.string().min(1).optional(),
    default_source_branch: z.string().min(1).optional(),
    log_level: z.string().optional(),
    context_detection: z
      .object({
        cache_ttl: z.string().optional(),
        enable_git_validation: z.boolean().optional(),
      })
      .strict()
      .optional(),
    git: z
      .object({
        cli_timeout_ms: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    hooks: z
      .object({
        timeout_ms: z.number().int().positive().optional(),
      })
      .strict()
      .optional(),
    navigation: z
      .object({
        max_suggestions: z.number().int().nonnegative().optional(),
      })
      .strict()
      .optional(),
    validation: z
      .object({
        protected_branches: z.array(z.string().min(1)).optional(),
      })
      .strict()
      .optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

function getEnv(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key];
  return value === undefined || value === '' ? undefined : value;
}

function getEnvNumber(env: NodeJS.ProcessEnv, key: string, min = 0): number | undefined {
  const value = getEnv(env, key);
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError('', `Invalid number for ${key}: ${value}`);
  }
  if (parsed < min) {
    throw new ConfigError('', `Invalid number for ${key}: ${value} (must be at least ${min})`);
  }
  return parsed;
}

function getEnvBoolean(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
  const value = getEnv(env, key);
  if (value === undefined) {
    return undefined;
  }
  const lower = value.toLowerCase();
  if (lower === 'true' || lower === '1' || lower === 'yes') {
    return true;
  }
  if (lower === 'false' || lower === '0' || lower === 'no') {
    return false;
  }
  throw new ConfigError('', `Invalid boolean for ${key}: ${value} (use true/false)`);
}

function getEnvList(env: NodeJS.ProcessEnv, key: string): string[] | undefined {
  const value = getEnv(env, key);
  if (value === undefined) {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function expandHome(path: string, home: string): string {
  if (path === '~') {
    return home;
  }
  if (path.startsWith('~/')) {
    return join(home, path.slice(2));
  }
  return path;
}

/**
 * Config file location: $TREEHOP_CONFIG, then $XDG_CONFIG_HOME/treehop,
 * then ~/.config/treehop
 */
export function resolveConfigPath(env: NodeJS.ProcessEnv, home: string): string {
  const explicit = getEnv(env, 'TREEHOP_CONFIG');
  if (explicit) {
    return expandHome(explicit, home);
  }
  const xdg = getEnv(env, 'XDG_CONFIG_HOME');
  if (xdg) {
    return join(xdg, 'treehop', 'config.json');
  }
  return join(home, '.config', 'treehop', 'config.json');
}

function readConfigFile(path: string): ConfigFile {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(path, 'cannot read config file', { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(path, 'config file is not valid JSON', { cause: err });
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(path, details);
  }
  return parsed.data;
}

function fileValues(file: ConfigFile): ConfigValues {
  return {
    projectsDirectory: file.projects_dir,
    worktreesDirectory: file.worktrees_dir,
    defaultSourceBranch: file.default_source_branch,
    logLevel: file.log_level,
    cacheTtl: file.context_detection?.cache_ttl,
    enableGitValidation: file.context_detection?.enable_git_validation,
    cliTimeoutMs: file.git?.cli_timeout_ms,
    hookTimeoutMs: file.hooks?.timeout_ms,
    maxSuggestions: file.navigation?.max_suggestions,
    protectedBranches: file.validation?.protected_branches,
  };
}

function envValues(env: NodeJS.ProcessEnv): ConfigValues {
  return {
    projectsDirectory: getEnv(env, 'TREEHOP_PROJECTS_DIR'),
    worktreesDirectory: getEnv(env, 'TREEHOP_WORKTREES_DIR'),
    defaultSourceBranch: getEnv(env, 'TREEHOP_DEFAULT_SOURCE_BRANCH'),
    logLevel: getEnv(env, 'TREEHOP_LOG_LEVEL'),
    cacheTtl: getEnv(env, 'TREEHOP_CACHE_TTL'),
    enableGitValidation: getEnvBoolean(env, 'TREEHOP_GIT_VALIDATION'),
    cliTimeoutMs: getEnvNumber(env, 'TREEHOP_GIT_TIMEOUT_MS', 1),
    hookTimeoutMs: getEnvNumber(env, 'TREEHOP_HOOK_TIMEOUT_MS', 1),
    maxSuggestions: getEnvNumber(env, 'TREEHOP_MAX_SUGGESTIONS'),
    protectedBranches: getEnvList(env, 'TREEHOP_PROTECTED_BRANCHES'),
  };
}

/** Last defined value wins */
function pick<K extends keyof ConfigValues>(layers: ConfigValues[], key: K): ConfigValues[K] {
  let result: ConfigValues[K] = undefined;
  for (const layer of layers) {
    const value = layer[key];
    if (value !== undefined) {
      result = value;
    }
  }
  return result;
}

function mergeValues(...layers: ConfigValues[]): ConfigValues {
  return {
    projectsDirectory: pick(layers, 'projectsDirectory'),
    worktreesDirectory: pick(layers, 'worktreesDirectory'),
    defaultSourceBranch: pick(layers, 'defaultSourceBranch'),
    logLevel: pick(layers, 'logLevel'),
    cacheTtl: pick(layers, 'cacheTtl'),
    enableGitValidation: pick(layers, 'enableGitValidation'),
    cliTimeoutMs: pick(layers, 'cliTimeoutMs'),
    hookTimeoutMs: pick(layers, 'hookTimeoutMs'),
    maxSuggestions: pick(layers, 'maxSuggestions'),
    protectedBranches: pick(layers, 'protectedBranches'),
    configPath: pick(layers, 'configPath'),
  };
}

/**
 * Validate values, fill defaults and freeze the result
 * @throws ConfigError on any invalid value
 */
export function createConfig(values: ConfigValues, home: string = homedir()): TreehopConfig {
  const configPath = values.configPath ?? null;
  const projectsDirectory = normalize(expandHome(values.projectsDirectory ?? join(home, 'Projects'), home));
  const worktreesDirectory = normalize(expandHome(values.worktreesDirectory ?? join(home, 'Worktrees'), home));

  if (!isAbsolute(projectsDirectory)) {
    throw new ConfigError(configPath ?? '', `projects directory must be an absolute path: ${projectsDirectory}`);
  }
  if (!isAbsolute(worktreesDirectory)) {
    throw new ConfigError(configPath ?? '', `worktrees directory must be an absolute path: ${worktreesDirectory}`);
  }

  const defaultSourceBranch = values.defaultSourceBranch ?? 'main';
  const branchProblem = findBranchNameProblem(defaultSourceBranch);
  if (branchProblem) {
    throw new ConfigError(configPath ?? '', `invalid default source branch '${defaultSourceBranch}': ${branchProblem}`);
  }

  const logLevel = values.logLevel ?? 'warn';
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(configPath ?? '', `unknown log level: ${logLevel}`);
  }

  const cacheTtl = values.cacheTtl ?? '5s';

  return Object.freeze({
    projectsDirectory,
    worktreesDirectory,
    defaultSourceBranch,
    logLevel,
    contextDetection: Object.freeze({
      cacheTtl,
      cacheTtlMs: parseCacheTtl(cacheTtl),
      enableGitValidation: values.enableGitValidation ?? true,
    }),
    git: Object.freeze({
      cliTimeoutMs: values.cliTimeoutMs ?? 30_000,
    }),
    hooks: Object.freeze({
      timeoutMs: values.hookTimeoutMs ?? 30_000,
    }),
    navigation: Object.freeze({
      maxSuggestions: values.maxSuggestions ?? 0,
    }),
    validation: Object.freeze({
      protectedBranches: Object.freeze([...(values.protectedBranches ?? DEFAULT_PROTECTED_BRANCHES)]),
    }),
    configPath,
  });
}

/**
 * Load configuration: defaults, then the JSON config file, then a `.env`
 * beside it, then the environment, then command-line overrides.
 */
export function loadConfig(options: LoadConfigOptions = {}): TreehopConfig {
  const home = options.homeDir ?? homedir();
  const env: NodeJS.ProcessEnv = { ...(options.env ?? process.env) };
  const configPath = options.configPath ?? resolveConfigPath(env, home);

  // .env entries fill gaps only; the real environment wins
  const envFile = join(dirname(configPath), '.env');
  if (existsSync(envFile)) {
    const fromFile = parseEnvFile(readFileSync(envFile, 'utf-8'));
    for (const [key, value] of Object.entries(fromFile)) {
      if (env[key] === undefined) {
        env[key] = value;
      }
    }
  }

  const fileExists = existsSync(configPath);
  const fromFile = fileExists ? fileValues(readConfigFile(configPath)) : {};

  const merged = mergeValues(
    fromFile,
    envValues(env),
    {
      projectsDirectory: options.overrides?.projectsDirectory,
      worktreesDirectory: options.overrides?.worktreesDirectory,
      logLevel: options.overrides?.logLevel,
    },
    { configPath: fileExists ? configPath : null }
  );

  return createConfig(merged, home);
}

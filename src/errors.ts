/**
 * Error taxonomy for treehop.
 *
 * Every error raised on purpose carries a stable `code` and an optional list
 * of suggestions that the CLI renders under the message.
 */

export type TreehopErrorCode =
  | 'CONTEXT_DETECTION_FAILED'
  | 'RESOLUTION_FAILED'
  | 'INVALID_CONFIG'
  | 'VALIDATION_FAILED'
  | 'CONFLICT'
  | 'NOT_FOUND'
  | 'GIT_COMMAND_FAILED'
  | 'GIT_REPOSITORY_ERROR'
  | 'GIT_WORKTREE_ERROR';

export interface TreehopErrorOptions {
  suggestions?: string[];
  cause?: unknown;
}

export class TreehopError extends Error {
  public readonly code: TreehopErrorCode;
  public readonly suggestions: readonly string[];

  constructor(code: TreehopErrorCode, message: string, options: TreehopErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'TreehopError';
    this.code = code;
    this.suggestions = options.suggestions ?? [];
  }
}

/**
 * The path handed to the detector is missing, empty or unreadable
 */
export class ContextDetectionError extends TreehopError {
  constructor(
    public readonly path: string,
    public readonly reason: string,
    options: TreehopErrorOptions = {}
  ) {
    super('CONTEXT_DETECTION_FAILED', `context detection failed for ${path || '<empty>'}: ${reason}`, options);
    this.name = 'ContextDetectionError';
  }
}

/**
 * An identifier could not be turned into a safe path
 */
export class ResolutionError extends TreehopError {
  constructor(
    public readonly identifier: string,
    public readonly contextPath: string,
    public readonly reason: string,
    options: TreehopErrorOptions = {}
  ) {
    super('RESOLUTION_FAILED', `cannot resolve '${identifier}': ${reason}`, options);
    this.name = 'ResolutionError';
  }
}

export class ConfigError extends TreehopError {
  constructor(
    public readonly configPath: string,
    public readonly reason: string,
    options: TreehopErrorOptions = {}
  ) {
    super('INVALID_CONFIG', configPath ? `invalid configuration (${configPath}): ${reason}` : `invalid configuration: ${reason}`, options);
    this.name = 'ConfigError';
  }
}

export class ValidationError extends TreehopError {
  constructor(
    public readonly field: string,
    public readonly value: string,
    public readonly reason: string,
    options: TreehopErrorOptions = {}
  ) {
    super('VALIDATION_FAILED', `invalid ${field}${value ? ` '${value}'` : ''}: ${reason}`, options);
    this.name = 'ValidationError';
  }
}

export class ConflictError extends TreehopError {
  constructor(
    public readonly resource: string,
    message: string,
    options: TreehopErrorOptions = {}
  ) {
    super('CONFLICT', message, options);
    this.name = 'ConflictError';
  }
}

export class NotFoundError extends TreehopError {
  constructor(
    public readonly resource: string,
    public readonly identifier: string,
    message: string,
    options: TreehopErrorOptions = {}
  ) {
    super('NOT_FOUND', message, options);
    this.name = 'NotFoundError';
  }
}

export interface GitCommandDetails {
  command: string;
  args: string[];
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export class GitCommandError extends TreehopError {
  public readonly command: string;
  public readonly args: string[];
  public readonly exitCode: number | null;
  public readonly stdout: string;
  public readonly stderr: string;
  public readonly reason: string;

  constructor(details: GitCommandDetails, reason: string, options: TreehopErrorOptions = {}) {
    const exit = details.exitCode === null ? 'no exit code' : `exit code ${details.exitCode}`;
    let message = `git command failed: ${details.command} ${details.args.join(' ')} (${exit}): ${reason}`;
    if (details.stderr.trim() !== '') {
      message += `\nstderr: ${details.stderr.trim()}`;
    }
    super('GIT_COMMAND_FAILED', message, options);
    this.name = 'GitCommandError';
    this.command = details.command;
    this.args = details.args;
    this.exitCode = details.exitCode;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
    this.reason = reason;
  }
}

export class GitRepositoryError extends TreehopError {
  constructor(
    public readonly repoPath: string,
    public readonly reason: string,
    options: TreehopErrorOptions = {}
  ) {
    super('GIT_REPOSITORY_ERROR', `git repository operation failed for ${repoPath}: ${reason}`, options);
    this.name = 'GitRepositoryError';
  }
}

export class GitWorktreeError extends TreehopError {
  constructor(
    public readonly worktreePath: string,
    public readonly branchName: string | null,
    public readonly reason: string,
    options: TreehopErrorOptions = {}
  ) {
    const base = branchName
      ? `git worktree operation failed for ${worktreePath} (branch: ${branchName}): ${reason}`
      : `git worktree operation failed for ${worktreePath}: ${reason}`;
    const cause = options.cause instanceof Error ? `\ncaused by: ${options.cause.message}` : '';
    super('GIT_WORKTREE_ERROR', base + cause, options);
    this.name = 'GitWorktreeError';
  }
}

export function isTreehopError(err: unknown): err is TreehopError {
  return err instanceof TreehopError;
}

/**
 * Render an error for the terminal: the message, then one bullet per suggestion
 */
export function formatError(err: unknown): string {
  if (isTreehopError(err)) {
    const lines = [`Error: ${err.message}`];
    for (const suggestion of err.suggestions) {
      lines.push(`  • ${suggestion}`);
    }
    return lines.join('\n');
  }
  if (err instanceof Error) {
    return `Error: ${err.message}`;
  }
  return `Error: ${String(err)}`;
}

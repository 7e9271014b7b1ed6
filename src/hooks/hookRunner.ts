import { readFile } from 'fs/promises';
import { join } from 'path';
import { z } from 'zod';
import { GitCommandError } from '../errors.js';
import type { CommandExecutor } from '../git/types.js';
import type { Logger } from '../logger.js';
import type { HookFailure, HookResult, HookRunRequest, HookType } from './types.js';

/** Hooks file kept in the root of each project */
export const PROJECT_HOOKS_FILE = '.treehop.json';

const projectHooksSchema = z.object({
  hooks: z
    .object({
      'post-create': z
        .object({
          commands: z.array(z.string()),
        })
        .strict()
        .optional(),
    })
    .strict()
    .optional(),
});

type ProjectHooks = z.infer<typeof projectHooksSchema>;

export interface HookRunnerOptions {
  executor: CommandExecutor;
  /** Limit for each command */
  timeoutMs: number;
  logger?: Logger;
  shell?: string;
}

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

function joinOutput(...parts: string[]): string {
  return parts
    .map((part) => part.trim())
    .filter((part) => part !== '')
    .join('\n');
}

function notExecuted(hookType: HookType): HookResult {
  return { hookType, executed: false, success: true, failures: [] };
}

/**
 * Runs a project's hook commands through `sh -c` in the new worktree.
 *
 * A missing or unreadable hooks file means there is nothing to run. Failing
 * commands are collected in the result; later commands still run.
 */
export class HookRunner {
  private readonly executor: CommandExecutor;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;
  private readonly shell: string;

  constructor(options: HookRunnerOptions) {
    this.executor = options.executor;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
    this.shell = options.shell ?? 'sh';
  }

  async run(request: HookRunRequest): Promise<HookResult> {
    const hooks = await this.readHooks(join(request.projectPath, PROJECT_HOOKS_FILE));
    const commands = (hooks?.hooks?.[request.hookType]?.commands ?? []).filter((command) => command.trim() !== '');
    if (commands.length === 0) {
      return notExecuted(request.hookType);
    }

    const env = {
      TREEHOP_WORKTREE_PATH: request.worktreePath,
      TREEHOP_PROJECT_NAME: request.projectName,
      TREEHOP_BRANCH_NAME: request.branchName,
      TREEHOP_SOURCE_BRANCH: request.sourceBranch,
      TREEHOP_MAIN_REPO_PATH: request.projectPath,
    };

    const failures: HookFailure[] = [];
    for (const command of commands) {
      const failure = await this.runCommand(command, request.worktreePath, env);
      if (failure) {
        this.logger?.warn({ hookType: request.hookType, ...failure }, 'hook command failed');
        failures.push(failure);
      }
    }

    this.logger?.info(
      { hookType: request.hookType, commands: commands.length, failures: failures.length },
      'hook finished'
    );
    return { hookType: request.hookType, executed: true, success: failures.length === 0, failures };
  }

  private async runCommand(command: string, cwd: string, env: Record<string, string>): Promise<HookFailure | null> {
    try {
      const result = await this.executor.execute({
        cwd,
        command: this.shell,
        args: ['-c', command],
        timeoutMs: this.timeoutMs,
        env,
      });
      if (result.exitCode === 0) {
        return null;
      }
      return { command, exitCode: result.exitCode, output: joinOutput(result.stdout, result.stderr) };
    } catch (err) {
      const output =
        err instanceof GitCommandError
          ? joinOutput(err.reason, err.stdout, err.stderr)
          : err instanceof Error
            ? err.message
            : String(err);
      return { command, exitCode: null, output };
    }
  }

  private async readHooks(path: string): Promise<ProjectHooks | null> {
    let raw: string;
    try {
      raw = await readFile(path, 'utf-8');
    } catch (err) {
      if (!isMissing(err)) {
        this.logger?.warn({ err, path }, 'cannot read project hooks');
      }
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger?.warn({ err, path }, 'project hooks file is not valid JSON');
      return null;
    }

    const parsed = projectHooksSchema.safeParse(json);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
      this.logger?.warn({ path, issues }, 'invalid project hooks file');
      return null;
    }
    return parsed.data;
  }
}

import { stat } from 'fs/promises';
import { GitCommandError, GitRepositoryError, GitWorktreeError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { BranchInfo, CommandExecutor, CommandResult, GitClient, WorktreeInfo } from './types.js';

export interface CliGitClientOptions {
  executor: CommandExecutor;
  timeoutMs: number;
  logger?: Logger;
}

const BRANCH_FORMAT = '%(refname)%09%(objectname)';

/**
 * Parse the output of `git worktree list --porcelain`
 */
export function parseWorktreeList(output: string): WorktreeInfo[] {
  const worktrees: WorktreeInfo[] = [];
  const entries = output
    .replace(/\r\n/g, '\n')
    .split('\n\n')
    .filter((entry) => entry.trim());
  let mainSeen = false;

  for (const entry of entries) {
    let path = '';
    let commit = '';
    let branch: string | null = null;
    let isBare = false;
    let isDetached = false;
    let isLocked = false;
    let isPrunable = false;

    for (const line of entry.split('\n')) {
      if (line.startsWith('worktree ')) {
        path = line.slice('worktree '.length);
      } else if (line.startsWith('HEAD ')) {
        commit = line.slice('HEAD '.length);
      } else if (line.startsWith('branch ')) {
        branch = line.slice('branch '.length).replace(/^refs\/heads\//, '');
      } else if (line === 'bare') {
        isBare = true;
      } else if (line === 'detached') {
        isDetached = true;
      } else if (line === 'locked' || line.startsWith('locked ')) {
        isLocked = true;
      } else if (line === 'prunable' || line.startsWith('prunable ')) {
        isPrunable = true;
      }
    }

    if (!path) continue;

    const isMain = !mainSeen && !isBare;
    if (isMain) {
      mainSeen = true;
    }

    worktrees.push({
      path,
      branch: isDetached ? null : branch,
      commit,
      isBare,
      isDetached,
      isLocked,
      isPrunable,
      isMain,
    });
  }

  return worktrees;
}

/**
 * Parse `git for-each-ref` output in {@link BRANCH_FORMAT}. Remote branches
 * that shadow a local branch of the same name are dropped.
 */
export function parseBranchList(output: string): BranchInfo[] {
  const local: BranchInfo[] = [];
  const remote: BranchInfo[] = [];

  for (const line of output.replace(/\r\n/g, '\n').split('\n')) {
    if (!line.trim()) continue;
    const [ref, commit = ''] = line.split('\t');

    if (ref.startsWith('refs/heads/')) {
      local.push({ name: ref.slice('refs/heads/'.length), remote: null, commit });
    } else if (ref.startsWith('refs/remotes/')) {
      const rest = ref.slice('refs/remotes/'.length);
      const slash = rest.indexOf('/');
      if (slash <= 0) continue;
      const name = rest.slice(slash + 1);
      if (!name || name === 'HEAD') continue;
      remote.push({ name, remote: rest.slice(0, slash), commit });
    }
  }

  const seen = new Set(local.map((branch) => branch.name));
  const branches = [...local];
  for (const branch of remote) {
    if (seen.has(branch.name)) continue;
    seen.add(branch.name);
    branches.push(branch);
  }
  return branches;
}

/**
 * GitClient backed by the git command line
 */
export class CliGitClient implements GitClient {
  private readonly executor: CommandExecutor;
  private readonly timeoutMs: number;
  private readonly logger?: Logger;

  constructor(options: CliGitClientOptions) {
    this.executor = options.executor;
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  private run(cwd: string, args: string[]): Promise<CommandResult> {
    return this.executor.execute({ cwd, command: 'git', args, timeoutMs: this.timeoutMs });
  }

  private async runOrThrow(cwd: string, args: string[]): Promise<string> {
    const result = await this.run(cwd, args);
    if (result.exitCode !== 0) {
      throw new GitCommandError(
        { command: 'git', args, exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr },
        'command exited with an error'
      );
    }
    return result.stdout;
  }

  async listWorktrees(repoPath: string): Promise<WorktreeInfo[]> {
    const output = await this.runOrThrow(repoPath, ['worktree', 'list', '--porcelain']);
    return parseWorktreeList(output);
  }

  async listBranches(repoPath: string): Promise<BranchInfo[]> {
    const output = await this.runOrThrow(repoPath, [
      'for-each-ref',
      `--format=${BRANCH_FORMAT}`,
      'refs/heads',
      'refs/remotes',
    ]);
    return parseBranchList(output);
  }

  async validateRepository(path: string): Promise<void> {
    try {
      const info = await stat(path);
      if (!info.isDirectory()) {
        throw new GitRepositoryError(path, 'not a directory');
      }
    } catch (err) {
      if (err instanceof GitRepositoryError) throw err;
      throw new GitRepositoryError(path, 'path does not exist', { cause: err });
    }

    let result: CommandResult;
    try {
      result = await this.run(path, ['rev-parse', '--git-dir']);
    } catch (err) {
      throw new GitRepositoryError(path, 'cannot run git', { cause: err });
    }
    if (result.exitCode !== 0) {
      throw new GitRepositoryError(path, 'not a git repository', {
        cause: new GitCommandError(
          {
            command: 'git',
            args: ['rev-parse', '--git-dir'],
            exitCode: result.exitCode,
            stdout: result.stdout,
            stderr: result.stderr,
          },
          'command exited with an error'
        ),
      });
    }
  }

  async branchExists(repoPath: string, branch: string): Promise<boolean> {
    const args = ['show-ref', '--verify', '--quiet', `refs/heads/${branch}`];
    const result = await this.run(repoPath, args);
    if (result.exitCode === 0) return true;
    if (result.exitCode === 1) return false;
    throw new GitCommandError(
      { command: 'git', args, exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr },
      'cannot check branch'
    );
  }

  private async findRemoteBranch(repoPath: string, branch: string): Promise<BranchInfo | undefined> {
    const branches = await this.listBranches(repoPath);
    return branches.find((candidate) => candidate.name === branch && candidate.remote !== null);
  }

  async createWorktree(repoPath: string, branch: string, sourceBranch: string, worktreePath: string): Promise<void> {
    let args: string[];
    if (await this.branchExists(repoPath, branch)) {
      args = ['worktree', 'add', worktreePath, branch];
    } else {
      const remote = await this.findRemoteBranch(repoPath, branch);
      if (remote?.remote) {
        args = ['worktree', 'add', '--track', '-b', branch, worktreePath, `${remote.remote}/${branch}`];
      } else {
        args = ['worktree', 'add', '-b', branch, worktreePath];
        if (sourceBranch) {
          args.push(sourceBranch);
        }
      }
    }

    this.logger?.debug({ repoPath, branch, worktreePath, args }, 'creating worktree');
    try {
      await this.runOrThrow(repoPath, args);
    } catch (err) {
      throw new GitWorktreeError(worktreePath, branch, 'git worktree add failed', { cause: err });
    }

    try {
      await stat(worktreePath);
    } catch (err) {
      throw new GitWorktreeError(worktreePath, branch, 'worktree directory was not created', { cause: err });
    }
  }

  async deleteWorktree(repoPath: string, worktreePath: string, force: boolean): Promise<void> {
    const args = ['worktree', 'remove'];
    if (force) {
      args.push('--force');
    }
    args.push(worktreePath);

    const result = await this.run(repoPath, args);
    if (result.exitCode === 0) return;

    if (/not a working tree|does not exist/i.test(result.stderr)) {
      this.logger?.debug({ worktreePath }, 'worktree already gone');
      return;
    }
    throw new GitWorktreeError(worktreePath, null, 'git worktree remove failed', {
      cause: new GitCommandError(
        { command: 'git', args, exitCode: result.exitCode, stdout: result.stdout, stderr: result.stderr },
        'command exited with an error'
      ),
    });
  }

  async pruneWorktrees(repoPath: string): Promise<void> {
    await this.runOrThrow(repoPath, ['worktree', 'prune']);
  }

  async isBranchMerged(repoPath: string, branch: string): Promise<boolean> {
    const output = await this.runOrThrow(repoPath, ['branch', '--merged']);
    return output
      .split('\n')
      .map((line) => line.replace(/^[*+]?\s*/, '').trim())
      .includes(branch);
  }

  async hasUncommittedChanges(worktreePath: string): Promise<boolean> {
    const output = await this.runOrThrow(worktreePath, ['status', '--porcelain']);
    return output.trim() !== '';
  }

  async deleteBranch(repoPath: string, branch: string, force: boolean): Promise<void> {
    await this.runOrThrow(repoPath, ['branch', force ? '-D' : '-d', branch]);
  }
}

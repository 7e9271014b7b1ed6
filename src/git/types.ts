/**
 * Git capability types: what treehop needs from git, independent of how it
 * talks to git
 */

export interface WorktreeInfo {
  path: string;
  /** Short branch name; null for a detached HEAD or a bare entry */
  branch: string | null;
  commit: string;
  isBare: boolean;
  isDetached: boolean;
  isLocked: boolean;
  isPrunable: boolean;
  /** The repository's own checkout (first non-bare entry) */
  isMain: boolean;
}

export interface BranchInfo {
  name: string;
  /** Remote name for a branch only known remotely, e.g. "origin" */
  remote: string | null;
  commit: string;
}

export interface GitClient {
  listWorktrees(repoPath: string): Promise<WorktreeInfo[]>;
  listBranches(repoPath: string): Promise<BranchInfo[]>;
  /** @throws GitRepositoryError when `path` is not a usable repository */
  validateRepository(path: string): Promise<void>;
  branchExists(repoPath: string, branch: string): Promise<boolean>;
  createWorktree(repoPath: string, branch: string, sourceBranch: string, worktreePath: string): Promise<void>;
  /** Removing a worktree git no longer knows about is a no-op */
  deleteWorktree(repoPath: string, worktreePath: string, force: boolean): Promise<void>;
  pruneWorktrees(repoPath: string): Promise<void>;
  isBranchMerged(repoPath: string, branch: string): Promise<boolean>;
  hasUncommittedChanges(worktreePath: string): Promise<boolean>;
  deleteBranch(repoPath: string, branch: string, force: boolean): Promise<void>;
}

export interface CommandRequest {
  cwd: string;
  command: string;
  args: string[];
  timeoutMs: number;
  /** Added to the inherited environment */
  env?: Record<string, string>;
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandExecutor {
  /**
   * Run a command to completion. A non-zero exit resolves normally; only a
   * spawn failure or a timeout rejects.
   */
  execute(request: CommandRequest): Promise<CommandResult>;
}

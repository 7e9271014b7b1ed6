/**
 * Project hooks run around worktree operations
 */

export type HookType = 'post-create';

export interface HookFailure {
  command: string;
  /** null when the command timed out or could not start */
  exitCode: number | null;
  /** Trimmed stdout then stderr, or why the command never finished */
  output: string;
}

export interface HookResult {
  hookType: HookType;
  /** false when the project defines no commands for this hook */
  executed: boolean;
  success: boolean;
  failures: HookFailure[];
}

export interface HookRunRequest {
  hookType: HookType;
  /** Main checkout; its hooks file is read */
  projectPath: string;
  /** Commands run here */
  worktreePath: string;
  projectName: string;
  branchName: string;
  sourceBranch: string;
}

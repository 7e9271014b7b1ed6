/**
 * Workspace types for git worktree management
 */

import type { Context } from '../context/types.js';
import type { HookResult } from '../hooks/types.js';

export interface CreateWorktreeRequest {
  context: Context;
  /** Defaults to the context's project */
  projectName?: string;
  branchName: string;
  /** Defaults to the configured default source branch */
  sourceBranch?: string;
}

export interface CreatedWorktree {
  projectName: string;
  branchName: string;
  path: string;
  /** Post-create hook outcome; a failed hook leaves the worktree in place */
  hookResult: HookResult;
}

export interface DeleteWorktreeRequest {
  context: Context;
  /** Identifier resolved against the context: a branch or project/branch */
  target: string;
  force: boolean;
  keepBranch: boolean;
}

export interface DeletedWorktree {
  path: string;
  projectName: string;
  branchName: string;
  branchDeleted: boolean;
  /** Project root to move to when the caller was inside the removed worktree */
  navigateTo: string | null;
}

export interface ListWorktreesRequest {
  context: Context;
  projectName?: string;
  all: boolean;
}

export interface WorktreeSummary {
  projectName: string;
  branchName: string | null;
  path: string;
  commit: string;
  isLocked: boolean;
  isPrunable: boolean;
}

export interface PruneRequest {
  context: Context;
  /** A single worktree as project/branch (or branch within the context project) */
  target?: string;
  all: boolean;
  dryRun: boolean;
  force: boolean;
  deleteBranches: boolean;
}

export type PruneSkipReason = 'current' | 'protected' | 'unmerged' | 'dirty' | 'detached' | 'dry-run';

export interface PrunedWorktree {
  projectName: string;
  branchName: string;
  path: string;
  branchDeleted: boolean;
}

export interface SkippedWorktree {
  projectName: string;
  branchName: string | null;
  path: string;
  reason: PruneSkipReason;
}

export interface PruneResult {
  deleted: PrunedWorktree[];
  skipped: SkippedWorktree[];
}

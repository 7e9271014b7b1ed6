/**
 * Context and resolution types shared by the detector, the resolver and the CLI
 */

export type ContextType = 'project' | 'worktree' | 'outside-git';

/** Where the user currently is, relative to projects and worktrees */
export interface Context {
  readonly type: ContextType;
  /** Absolute path: repository root for projects, the input path otherwise */
  readonly path: string;
  readonly projectName?: string;
  readonly branchName?: string;
  readonly explanation: string;
}

export type PathType = 'project' | 'worktree' | 'invalid';

export interface ResolutionResult {
  /** Empty when `type` is 'invalid' */
  readonly resolvedPath: string;
  readonly type: PathType;
  readonly projectName?: string;
  readonly branchName?: string;
  readonly explanation: string;
}

export interface ResolutionSuggestion {
  readonly text: string;
  readonly description: string;
  readonly type: PathType;
  readonly projectName?: string;
  readonly branchName?: string;
}

export interface SuggestionOptions {
  /** Only offer worktrees whose directory is still on disk; drops 'main' */
  existingOnly: boolean;
}

export const DEFAULT_SUGGESTION_OPTIONS: SuggestionOptions = Object.freeze({ existingOnly: false });

export function isGitContext(context: Context): boolean {
  return context.type === 'project' || context.type === 'worktree';
}

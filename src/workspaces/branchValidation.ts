export const MAX_BRANCH_NAME_LENGTH = 250;

const INVALID_SEQUENCES = [' ', '\t', '\n', '\r', '~', '^', ':', '?', '*', '[', '\\', '..', '//'];

/**
 * Check a branch name against the subset of git ref rules treehop relies on.
 * @returns a description of the first problem, or null when the name is usable
 */
export function findBranchNameProblem(name: string): string | null {
  if (name === '') {
    return 'branch name cannot be empty';
  }
  if (name.length > MAX_BRANCH_NAME_LENGTH) {
    return `branch name too long (maximum ${MAX_BRANCH_NAME_LENGTH} characters)`;
  }
  for (const sequence of INVALID_SEQUENCES) {
    if (name.includes(sequence)) {
      return `branch name contains invalid sequence '${JSON.stringify(sequence).slice(1, -1)}'`;
    }
  }
  if (name.startsWith('-')) {
    return 'branch name cannot start with a hyphen';
  }
  if (name.endsWith('.lock')) {
    return "branch name cannot end with '.lock'";
  }
  if (name.endsWith('/') || name.endsWith('.')) {
    return "branch name cannot end with '/' or '.'";
  }
  return null;
}

/**
 * Worktree directories are named after their branch, one level deep, so a
 * worktree branch must also be a single path segment.
 */
export function findWorktreeBranchProblem(name: string): string | null {
  const problem = findBranchNameProblem(name);
  if (problem) {
    return problem;
  }
  if (name.includes('/')) {
    return "worktree branch names cannot contain '/' (use '-' instead)";
  }
  return null;
}

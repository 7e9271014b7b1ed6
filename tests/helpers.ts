import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from 'fs';
import { mkdir, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { createConfig, type ConfigValues, type TreehopConfig } from '../src/config.js';
import { GitRepositoryError } from '../src/errors.js';
import type {
  BranchInfo,
  CommandExecutor,
  CommandRequest,
  CommandResult,
  GitClient,
  WorktreeInfo,
} from '../src/git/types.js';

/** Realpath'd temporary directory, so symlinked tmp roots compare equal */
export function makeTempDir(prefix = 'treehop-test-'): string {
  return realpathSync(mkdtempSync(join(tmpdir(), prefix)));
}

export function removeDir(path: string): void {
  rmSync(path, { recursive: true, force: true });
}

export interface Workspace {
  root: string;
  projectsDir: string;
  worktreesDir: string;
  config: TreehopConfig;
}

export function makeWorkspace(values: ConfigValues = {}): Workspace {
  const root = makeTempDir();
  const projectsDir = join(root, 'Projects');
  const worktreesDir = join(root, 'Worktrees');
  mkdirSync(projectsDir);
  mkdirSync(worktreesDir);
  const config = createConfig(
    { projectsDirectory: projectsDir, worktreesDirectory: worktreesDir, ...values },
    root
  );
  return { root, projectsDir, worktreesDir, config };
}

/** A project checkout: a directory with a `.git` directory */
export function makeProject(projectsDir: string, name: string): string {
  const path = join(projectsDir, name);
  mkdirSync(join(path, '.git'), { recursive: true });
  return path;
}

/** A linked worktree: a directory whose `.git` file points at the project */
export function makeWorktreeDir(worktreesDir: string, project: string, branch: string): string {
  const path = join(worktreesDir, project, branch);
  mkdirSync(path, { recursive: true });
  writeFileSync(join(path, '.git'), `gitdir: /repos/${project}/.git/worktrees/${branch}\n`);
  return path;
}

interface FakeRepo {
  worktrees: WorktreeInfo[];
  branches: BranchInfo[];
  merged: Set<string>;
}

export type GitMethod = keyof GitClient;

export function worktreeInfo(path: string, branch: string | null, extra: Partial<WorktreeInfo> = {}): WorktreeInfo {
  return {
    path,
    branch,
    commit: '0000000000000000000000000000000000000000',
    isBare: false,
    isDetached: branch === null,
    isLocked: false,
    isPrunable: false,
    isMain: false,
    ...extra,
  };
}

/**
 * In-memory git: repositories are registered by path, worktree mutations
 * also create and remove directories so the detector can see them.
 */
export class FakeGitClient implements GitClient {
  readonly repos = new Map<string, FakeRepo>();
  readonly dirty = new Set<string>();
  readonly calls: Array<{ method: GitMethod; args: unknown[] }> = [];
  readonly failures = new Map<GitMethod, Error>();

  addRepo(path: string, mainBranch = 'main'): FakeRepo {
    const repo: FakeRepo = {
      worktrees: [worktreeInfo(path, mainBranch, { isMain: true })],
      branches: [{ name: mainBranch, remote: null, commit: 'a1' }],
      merged: new Set([mainBranch]),
    };
    this.repos.set(path, repo);
    return repo;
  }

  addWorktree(repoPath: string, path: string, branch: string, extra: Partial<WorktreeInfo> = {}): void {
    const repo = this.repo(repoPath);
    repo.worktrees.push(worktreeInfo(path, branch, extra));
    if (!repo.branches.some((candidate) => candidate.name === branch)) {
      repo.branches.push({ name: branch, remote: null, commit: 'b1' });
    }
  }

  addBranch(repoPath: string, name: string, remote: string | null = null): void {
    this.repo(repoPath).branches.push({ name, remote, commit: 'c1' });
  }

  markMerged(repoPath: string, branch: string): void {
    this.repo(repoPath).merged.add(branch);
  }

  failOn(method: GitMethod, error: Error = new Error(`${method} failed`)): void {
    this.failures.set(method, error);
  }

  callsTo(method: GitMethod): unknown[][] {
    return this.calls.filter((call) => call.method === method).map((call) => call.args);
  }

  private record(method: GitMethod, ...args: unknown[]): void {
    this.calls.push({ method, args });
    const failure = this.failures.get(method);
    if (failure) {
      throw failure;
    }
  }

  private repo(path: string): FakeRepo {
    const repo = this.repos.get(path);
    if (!repo) {
      throw new GitRepositoryError(path, 'not a git repository');
    }
    return repo;
  }

  /** Worktree paths resolve to their owning repository, as git does */
  private owningRepo(path: string): FakeRepo {
    for (const repo of this.repos.values()) {
      if (repo.worktrees.some((worktree) => worktree.path === path)) {
        return repo;
      }
    }
    return this.repo(path);
  }

  async listWorktrees(repoPath: string): Promise<WorktreeInfo[]> {
    this.record('listWorktrees', repoPath);
    return this.owningRepo(repoPath).worktrees.map((worktree) => ({ ...worktree }));
  }

  async listBranches(repoPath: string): Promise<BranchInfo[]> {
    this.record('listBranches', repoPath);
    return this.owningRepo(repoPath).branches.map((branch) => ({ ...branch }));
  }

  async validateRepository(path: string): Promise<void> {
    this.record('validateRepository', path);
    this.repo(path);
  }

  async branchExists(repoPath: string, branch: string): Promise<boolean> {
    this.record('branchExists', repoPath, branch);
    return this.repo(repoPath).branches.some((candidate) => candidate.name === branch && candidate.remote === null);
  }

  async createWorktree(repoPath: string, branch: string, sourceBranch: string, worktreePath: string): Promise<void> {
    this.record('createWorktree', repoPath, branch, sourceBranch, worktreePath);
    await mkdir(worktreePath, { recursive: true });
    await writeFile(join(worktreePath, '.git'), `gitdir: ${repoPath}/.git/worktrees/${branch}\n`);
    this.addWorktree(repoPath, worktreePath, branch);
  }

  async deleteWorktree(repoPath: string, worktreePath: string, force: boolean): Promise<void> {
    this.record('deleteWorktree', repoPath, worktreePath, force);
    const repo = this.repo(repoPath);
    repo.worktrees = repo.worktrees.filter((worktree) => worktree.path !== worktreePath);
    await rm(worktreePath, { recursive: true, force: true });
  }

  async pruneWorktrees(repoPath: string): Promise<void> {
    this.record('pruneWorktrees', repoPath);
  }

  async isBranchMerged(repoPath: string, branch: string): Promise<boolean> {
    this.record('isBranchMerged', repoPath, branch);
    return this.repo(repoPath).merged.has(branch);
  }

  async hasUncommittedChanges(worktreePath: string): Promise<boolean> {
    this.record('hasUncommittedChanges', worktreePath);
    return this.dirty.has(worktreePath);
  }

  async deleteBranch(repoPath: string, branch: string, force: boolean): Promise<void> {
    this.record('deleteBranch', repoPath, branch, force);
    const repo = this.repo(repoPath);
    repo.branches = repo.branches.filter((candidate) => candidate.name !== branch);
  }
}

/**
 * Executor for hook commands: answers by the `sh -c` script, exit 0 when
 * nothing is scripted
 */
export class RecordingExecutor implements CommandExecutor {
  readonly requests: CommandRequest[] = [];
  private readonly script = new Map<string, Partial<CommandResult> | Error>();

  on(command: string, outcome: Partial<CommandResult> | Error): this {
    this.script.set(command, outcome);
    return this;
  }

  get scripts(): string[] {
    return this.requests.map((request) => request.args[request.args.length - 1]);
  }

  async execute(request: CommandRequest): Promise<CommandResult> {
    this.requests.push(request);
    const outcome = this.script.get(request.args[request.args.length - 1]);
    if (outcome instanceof Error) {
      throw outcome;
    }
    return { exitCode: 0, stdout: '', stderr: '', ...outcome };
  }
}

export function writeProjectHooks(projectPath: string, contents: unknown): void {
  writeFileSync(join(projectPath, '.treehop.json'), typeof contents === 'string' ? contents : JSON.stringify(contents));
}

import type { Dirent } from 'fs';
import { readdir, access } from 'fs/promises';
import { join } from 'path';
import { NotFoundError } from '../errors.js';
import type { GitClient } from '../git/types.js';
import type { DiscoveredProject, DiscoveryOptions } from '../types/discovery.js';

function isMissing(err: unknown): boolean {
  return err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'ENOTDIR');
}

/**
 * Discover projects: direct child directories of the projects directory that
 * are git repositories. Dot-directories and symlinks are skipped.
 */
export async function discoverProjects(
  projectsDir: string,
  git: GitClient,
  options: DiscoveryOptions
): Promise<DiscoveredProject[]> {
  let entries: Dirent[];
  try {
    entries = await readdir(projectsDir, { withFileTypes: true });
  } catch (err) {
    if (isMissing(err)) {
      return [];
    }
    throw err;
  }

  const candidates = entries
    .filter((entry) => entry.isDirectory() && !entry.isSymbolicLink())
    .filter((entry) => !entry.name.startsWith('.'))
    .map((entry) => ({ name: entry.name, path: join(projectsDir, entry.name) }));

  const checked = await Promise.all(
    candidates.map(async (candidate) => {
      try {
        if (options.validate) {
          await git.validateRepository(candidate.path);
        } else {
          await access(join(candidate.path, '.git'));
        }
        return candidate;
      } catch {
        // Not a repository
        return null;
      }
    })
  );

  return checked
    .filter((project): project is DiscoveredProject => project !== null)
    .sort((a, b) => a.name.localeCompare(b.name));
}

/**
 * Find one project by name
 * @throws NotFoundError when no discovered project has that name
 */
export async function findProject(
  projectsDir: string,
  name: string,
  git: GitClient,
  options: DiscoveryOptions
): Promise<DiscoveredProject> {
  const projects = await discoverProjects(projectsDir, git, options);
  const project = projects.find((candidate) => candidate.name === name);
  if (!project) {
    throw new NotFoundError('project', name, `project '${name}' not found in ${projectsDir}`, {
      suggestions: ['Run `treehop list --all` to see available projects'],
    });
  }
  return project;
}

/**
 * Discovery types for project scanning
 */

export interface DiscoveredProject {
  name: string;
  path: string;
}

export interface DiscoveryOptions {
  /** Check each candidate with the git client instead of looking for `.git` */
  validate: boolean;
}

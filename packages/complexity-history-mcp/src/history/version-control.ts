/**
 * Version-control collaborator
 * The four git operations the history walker needs
 */

import { simpleGit, type SimpleGit } from 'simple-git';
import { NotAGitRepositoryError } from '../errors.js';

const END_OF_DAY = '23:59:59';

export interface VersionControl {
  /** Commit currently checked out */
  currentHead(): Promise<string>;
  branchExists(branch: string): Promise<boolean>;
  /** Latest commit on branch committed on or before date (yyyy-MM-dd, local time), or null */
  commitAtOrBefore(branch: string, date: string): Promise<string | null>;
  checkout(commit: string): Promise<void>;
}

/**
 * VersionControl backed by the git CLI through simple-git
 */
export class SimpleGitVersionControl implements VersionControl {
  private readonly git: SimpleGit;

  constructor(private readonly repoPath: string) {
    this.git = simpleGit(repoPath);
  }

  async assertRepository(): Promise<void> {
    try {
      await this.git.revparse(['--git-dir']);
    } catch {
      throw new NotAGitRepositoryError(this.repoPath);
    }
  }

  /**
   * Branch name when HEAD is attached, so a later checkout re-attaches it;
   * the commit id when HEAD is detached
   */
  async currentHead(): Promise<string> {
    const branch = (await this.git.revparse(['--abbrev-ref', 'HEAD'])).trim();
    if (branch && branch !== 'HEAD') return branch;
    const head = await this.git.revparse(['HEAD']);
    return head.trim();
  }

  async branchExists(branch: string): Promise<boolean> {
    try {
      const resolved = await this.git.raw(['rev-parse', '--verify', branch]);
      return resolved.trim().length > 0;
    } catch {
      return false;
    }
  }

  /**
   * A bare date would make git fill in the current time of day, so the
   * cutoff is the end of that day in local time, the zone sample dates
   * are computed in
   */
  async commitAtOrBefore(branch: string, date: string): Promise<string | null> {
    const output = await this.git.raw(['rev-list', '-1', `--before=${date} ${END_OF_DAY}`, branch]);
    const commit = output.trim();
    return commit.length > 0 ? commit : null;
  }

  async checkout(commit: string): Promise<void> {
    await this.git.raw(['checkout', '-q', commit]);
  }
}

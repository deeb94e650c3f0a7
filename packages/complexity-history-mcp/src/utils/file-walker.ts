/**
 * Directory traversal with excluded-subtree pruning
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ParseIssue } from '../types.js';
import { describeError } from './result.js';

export interface WalkOutcome {
  files: string[];
  issues: ParseIssue[];
}

/**
 * True when a directory path, relative to the walk root, contains any
 * excluded token as a plain substring
 */
export function isExcludedPath(relativeDir: string, excludedTokens: readonly string[]): boolean {
  return excludedTokens.some(token => relativeDir.includes(token));
}

/**
 * Recursively list regular files under rootDir.
 *
 * Subtrees whose relative path hits an excluded token are skipped whole.
 * Symbolic links to files are listed, links to directories are not
 * followed, and a dangling link is reported. An unreadable directory is
 * recorded as an issue and the walk continues with its siblings.
 */
export function walkFiles(rootDir: string, excludedTokens: readonly string[]): WalkOutcome {
  const files: string[] = [];
  const issues: ParseIssue[] = [];

  function pointsToFile(link: string): boolean {
    try {
      return fs.statSync(link).isFile();
    } catch (error) {
      issues.push({ file: link, stage: 'walk', message: describeError(error) });
      return false;
    }
  }

  function scan(dir: string): void {
    let entries: fs.Dirent[];
    try {
      entries = fs.readdirSync(dir, { withFileTypes: true });
    } catch (error) {
      issues.push({ file: dir, stage: 'walk', message: describeError(error) });
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        const relativeDir = path.relative(rootDir, fullPath);
        if (isExcludedPath(relativeDir, excludedTokens)) continue;
        scan(fullPath);
      } else if (entry.isFile()) {
        files.push(fullPath);
      } else if (entry.isSymbolicLink() && pointsToFile(fullPath)) {
        files.push(fullPath);
      }
    }
  }

  scan(rootDir);
  return { files, issues };
}

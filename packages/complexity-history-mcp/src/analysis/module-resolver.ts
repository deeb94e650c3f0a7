/**
 * Module resolver
 * Decides which sub-paths of a snapshot are analyzed independently
 */

import * as fs from 'fs';
import * as path from 'path';
import type { ParseIssue } from '../types.js';
import { collectPomModules, parsePom } from '../parsers/maven-pom.js';
import { attempt } from '../utils/result.js';

const MULTI_MODULE_DESCRIPTOR = 'pom.xml';

export interface ModuleResolution {
  modules: string[];
  /** Set when a descriptor existed but could not be read */
  issue?: ParseIssue;
}

/**
 * Declared Maven submodules as repoRoot/<name>, or [repoRoot] when there
 * is no descriptor, it declares nothing, or it is malformed
 */
export function resolveModules(repoRoot: string): ModuleResolution {
  const descriptor = path.join(repoRoot, MULTI_MODULE_DESCRIPTOR);
  if (!fs.existsSync(descriptor)) {
    return { modules: [repoRoot] };
  }

  const declared = attempt(descriptor, 'descriptor', () =>
    collectPomModules(parsePom(fs.readFileSync(descriptor, 'utf-8')))
  );

  if (!declared.ok) {
    return { modules: [repoRoot], issue: declared.error };
  }
  if (declared.value.length === 0) {
    return { modules: [repoRoot] };
  }

  return { modules: declared.value.map(name => path.join(repoRoot, name)) };
}

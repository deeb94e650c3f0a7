/**
 * Analysis of one checked-out tree: resolve modules, extract each, aggregate
 */

import type { ParseIssue, SnapshotSummary } from '../types.js';
import type { AnalyzerConfig } from '../config.js';
import { resolveModules } from './module-resolver.js';
import { extractModule } from './extractor.js';
import { aggregateSnapshot } from './aggregator.js';

export interface TreeAnalysis {
  modules: string[];
  summary: SnapshotSummary;
  issues: ParseIssue[];
}

export function analyzeTree(repoRoot: string, config: AnalyzerConfig): TreeAnalysis {
  const resolution = resolveModules(repoRoot);
  const extractions = resolution.modules.map(modulePath => extractModule(modulePath, config));

  const issues = extractions.flatMap(extraction => extraction.issues);
  if (resolution.issue) issues.unshift(resolution.issue);

  return {
    modules: resolution.modules,
    summary: aggregateSnapshot(extractions),
    issues,
  };
}

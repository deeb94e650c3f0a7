/**
 * Complexity Snapshot Tool
 * Analyze the working tree as it is, without touching history
 */

import * as path from 'path';
import { z } from 'zod';
import { format } from 'date-fns';
import type { ParseIssue, SnapshotRecord } from '../types.js';
import { loadConfig, withExtraExclusions, type AnalyzerConfig } from '../config.js';
import { analyzeTree } from '../analysis/snapshot-analysis.js';
import { summaryToRecord } from '../analysis/aggregator.js';
import { SAMPLE_DATE_FORMAT } from '../history/sampling.js';
import { withRepositoryLock } from '../history/repository-lock.js';

/**
 * Input schema for analyze_complexity_snapshot tool
 */
export const analyzeComplexitySnapshotSchema = z.object({
  path: z.string().optional().describe('Directory to analyze (defaults to current directory)'),
  excludeDirs: z.array(z.string().min(1)).default([]).describe('Extra directory tokens to skip'),
});

export type AnalyzeComplexitySnapshotInput = z.input<typeof analyzeComplexitySnapshotSchema>;

export interface ComplexitySnapshotResult {
  modules: string[];
  record: SnapshotRecord;
  issues: ParseIssue[];
}

export async function analyzeComplexitySnapshot(
  input: AnalyzeComplexitySnapshotInput,
  config: AnalyzerConfig = loadConfig()
): Promise<ComplexitySnapshotResult> {
  const { path: target = process.cwd(), excludeDirs } = analyzeComplexitySnapshotSchema.parse(input);
  const root = path.resolve(target);

  // Waits for any history run to put the tree back first
  const analysis = await withRepositoryLock(root, async () =>
    analyzeTree(root, withExtraExclusions(config, excludeDirs))
  );
  const today = format(new Date(), SAMPLE_DATE_FORMAT);

  return {
    modules: analysis.modules.map(modulePath => path.relative(root, modulePath) || '.'),
    record: summaryToRecord(path.basename(root), today, analysis.summary),
    issues: analysis.issues,
  };
}

/**
 * Snapshot Plan Tool
 * Show which commits a history run would analyze, read-only
 */

import * as path from 'path';
import { z } from 'zod';
import type { SnapshotPlan } from '../types.js';
import { loadConfig } from '../config.js';
import { HistoryWalker } from '../history/history-walker.js';
import { SimpleGitVersionControl } from '../history/version-control.js';

/**
 * Input schema for plan_history_snapshots tool
 */
export const planHistorySnapshotsSchema = z.object({
  path: z.string().optional().describe('Repository path (defaults to current directory)'),
  frequency: z.enum(['weekly', 'monthly']).default('monthly').describe('Sampling frequency'),
  periods: z.number().int().min(0).max(520).default(24).describe('Number of periods to look back'),
});

export type PlanHistorySnapshotsInput = z.input<typeof planHistorySnapshotsSchema>;

export async function planHistorySnapshots(input: PlanHistorySnapshotsInput): Promise<SnapshotPlan> {
  const { path: repoPath = process.cwd(), frequency, periods } = planHistorySnapshotsSchema.parse(input);

  const git = new SimpleGitVersionControl(path.resolve(repoPath));
  await git.assertRepository();

  const walker = new HistoryWalker(git, { branchCandidates: loadConfig().branchCandidates });
  return walker.planSnapshots(frequency, periods);
}

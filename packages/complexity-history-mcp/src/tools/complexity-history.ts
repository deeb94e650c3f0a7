/**
 * Complexity History Tool
 * Walk sampled history, analyze each snapshot and write the CSV report
 */

import * as path from 'path';
import { z } from 'zod';
import type { ComplexityHistoryResult, SnapshotReport } from '../types.js';
import { loadConfig, withExtraExclusions, type AnalyzerConfig } from '../config.js';
import { analyzeTree } from '../analysis/snapshot-analysis.js';
import { formatSnapshotSummary, summaryToRecord } from '../analysis/aggregator.js';
import { HistoryWalker } from '../history/history-walker.js';
import { SimpleGitVersionControl, type VersionControl } from '../history/version-control.js';
import { CsvReportSink } from '../report/csv-report.js';
import { withRepositoryLock } from '../history/repository-lock.js';

/**
 * Input schema for analyze_complexity_history tool
 */
export const analyzeComplexityHistorySchema = z.object({
  path: z.string().optional().describe('Repository path (defaults to current directory)'),
  output: z.string().describe('Path of the CSV report to write'),
  frequency: z.enum(['weekly', 'monthly']).default('monthly').describe('Sampling frequency'),
  periods: z.number().int().min(0).max(520).default(24).describe('Number of periods to look back'),
  excludeDirs: z.array(z.string().min(1)).default([]).describe('Extra directory tokens to skip'),
});

export type AnalyzeComplexityHistoryInput = z.input<typeof analyzeComplexityHistorySchema>;

export interface ComplexityHistoryDeps {
  vcs?: VersionControl;
  config?: AnalyzerConfig;
  now?: () => Date;
  log?: (message: string) => void;
}

/**
 * Run the full history analysis.
 *
 * Runs on the same repository are queued. The report is opened before
 * anything is checked out; the working tree is back at its original head
 * when this resolves or rejects.
 */
export async function analyzeComplexityHistory(
  input: AnalyzeComplexityHistoryInput,
  deps: ComplexityHistoryDeps = {}
): Promise<ComplexityHistoryResult> {
  const { path: repoPath = process.cwd(), output, frequency, periods, excludeDirs } =
    analyzeComplexityHistorySchema.parse(input);

  const repository = path.resolve(repoPath);
  const outputPath = path.resolve(output);
  const service = path.basename(repository);
  const log = deps.log ?? ((message: string) => console.error(message));
  const config = withExtraExclusions(deps.config ?? loadConfig(), excludeDirs);

  return withRepositoryLock(repository, async () => {
    let vcs = deps.vcs;
    if (!vcs) {
      const git = new SimpleGitVersionControl(repository);
      await git.assertRepository();
      vcs = git;
    }

    const sink = CsvReportSink.open(outputPath);
    const walker = new HistoryWalker(vcs, {
      branchCandidates: config.branchCandidates,
      now: deps.now,
      log,
    });

    const plan = await walker.planSnapshots(frequency, periods);
    log(`Analyzing ${plan.snapshots.length} of ${plan.sampleDates.length} sampled dates in ${repository}`);

    const walk = await walker.walk(plan.snapshots, async (snapshot): Promise<SnapshotReport> => {
      const analysis = analyzeTree(repository, config);
      sink.write(summaryToRecord(service, snapshot.date, analysis.summary));

      log(formatSnapshotSummary(snapshot.date, analysis.summary));
      if (analysis.issues.length > 0) {
        log(`  Skipped ${analysis.issues.length} unreadable file(s) or manifest(s)`);
      }

      return {
        date: snapshot.date,
        commit: snapshot.commit,
        modules: analysis.modules.map(modulePath => path.relative(repository, modulePath) || '.'),
        endpointCount: analysis.summary.endpointCount,
        dependencyCount: analysis.summary.dependencyCount,
        callCount: analysis.summary.callCount,
        issueCount: analysis.issues.length,
      };
    });

    log('Analysis complete.');

    return {
      repository,
      service,
      branch: plan.branch,
      frequency,
      periods,
      output: outputPath,
      snapshots: walk.results.map(result => result.value),
      failures: walk.failures,
    };
  });
}

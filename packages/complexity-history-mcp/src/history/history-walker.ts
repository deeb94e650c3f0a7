/**
 * History Walker
 *
 * Turns a sampling policy into (date, commit) snapshots and drives the
 * shared working tree through them one at a time. The original head is
 * captured before the first checkout and restored in a finally block, so
 * the tree ends where it started whatever happens in between.
 */

import type {
  SamplingFrequency,
  Snapshot,
  SnapshotFailure,
  SnapshotPlan,
  WalkResult,
} from '../types.js';
import type { VersionControl } from './version-control.js';
import { computeSampleDates } from './sampling.js';
import { RunAbortedError } from '../errors.js';
import { PRIMARY_BRANCH_CANDIDATES } from '../catalog/patterns.js';
import { describeError } from '../utils/result.js';

export type WalkerState = 'init' | 'empty' | 'walking' | 'restored';

export interface HistoryWalkerOptions {
  branchCandidates?: readonly string[];
  /** Clock used for the sampling anchor */
  now?: () => Date;
  log?: (message: string) => void;
}

export class HistoryWalker {
  private readonly branchCandidates: readonly string[];
  private readonly now: () => Date;
  private readonly log: (message: string) => void;
  private walkerState: WalkerState = 'init';

  constructor(
    private readonly vcs: VersionControl,
    options: HistoryWalkerOptions = {}
  ) {
    this.branchCandidates = options.branchCandidates ?? PRIMARY_BRANCH_CANDIDATES;
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? (message => console.error(message));
  }

  get state(): WalkerState {
    return this.walkerState;
  }

  /**
   * First candidate branch that exists, or null
   */
  async discoverPrimaryBranch(): Promise<string | null> {
    for (const branch of this.branchCandidates) {
      if (await this.vcs.branchExists(branch)) {
        return branch;
      }
    }
    return null;
  }

  /**
   * Resolve each sample date to the latest commit at or before it.
   * Dates with no commit are skipped; repeated commits are kept because
   * every row stands for a calendar period.
   */
  async planSnapshots(frequency: SamplingFrequency, periods: number): Promise<SnapshotPlan> {
    const sampleDates = computeSampleDates(frequency, periods, this.now());
    const branch = await this.discoverPrimaryBranch();

    if (branch === null) {
      this.log(`No primary branch found (tried ${this.branchCandidates.join(', ')}); nothing to analyze`);
      this.walkerState = 'empty';
      return { branch, sampleDates, snapshots: [] };
    }

    const snapshots: Snapshot[] = [];
    for (const date of sampleDates) {
      let commit: string | null;
      try {
        commit = await this.vcs.commitAtOrBefore(branch, date);
      } catch (error) {
        this.log(`Could not resolve a commit for ${date}: ${describeError(error)}`);
        continue;
      }
      if (commit !== null) {
        snapshots.push(Object.freeze({ date, commit }));
      }
    }

    if (snapshots.length === 0) this.walkerState = 'empty';
    return { branch, sampleDates, snapshots };
  }

  /**
   * Check out each snapshot in order and hand it to `visit`.
   *
   * A checkout or visit failure is recorded and the walk moves on; a
   * RunAbortedError from `visit` stops it. Either way the original head
   * is checked out exactly once at the end.
   */
  async walk<T>(snapshots: readonly Snapshot[], visit: (snapshot: Snapshot) => Promise<T>): Promise<WalkResult<T>> {
    let originalHead: string;
    try {
      originalHead = await this.vcs.currentHead();
    } catch (error) {
      throw new RunAbortedError(
        `Cannot determine the current head: ${describeError(error)}`,
        'original-head',
        { cause: error }
      );
    }

    const results: WalkResult<T>['results'] = [];
    const failures: SnapshotFailure[] = [];

    if (snapshots.length === 0) {
      // Nothing gets checked out, so the tree is already where it started
      this.walkerState = 'restored';
      return { originalHead, results, failures };
    }

    this.walkerState = 'walking';
    let interruption: unknown;
    try {
      for (const snapshot of snapshots) {
        try {
          await this.vcs.checkout(snapshot.commit);
          results.push({ snapshot, value: await visit(snapshot) });
        } catch (error) {
          if (error instanceof RunAbortedError) {
            interruption = error;
            throw error;
          }
          const message = describeError(error);
          this.log(`Snapshot ${snapshot.date} (${snapshot.commit}) failed: ${message}`);
          failures.push({ snapshot, message });
        }
      }
    } finally {
      await this.restore(originalHead, interruption);
    }

    return { originalHead, results, failures };
  }

  /**
   * A restore failure replaces any error already unwinding the walk, so
   * that error is carried in the message
   */
  private async restore(originalHead: string, interruption?: unknown): Promise<void> {
    try {
      await this.vcs.checkout(originalHead);
    } catch (error) {
      const interrupted = interruption === undefined ? '' : ` (walk was stopping: ${describeError(interruption)})`;
      throw new RunAbortedError(
        `Failed to restore the working tree to ${originalHead}: ${describeError(error)}${interrupted}`,
        'restore',
        { cause: error }
      );
    }
    this.walkerState = 'restored';
  }
}

import { describe, it, expect, vi } from 'vitest';
import { HistoryWalker } from '../history/history-walker.js';
import { RunAbortedError } from '../errors.js';
import type { Snapshot } from '../types.js';
import { FakeVersionControl, type FakeCommit } from './helpers/fake-vcs.js';

const now = () => new Date(2024, 0, 10, 12);
const quiet = () => undefined;

const history: FakeCommit[] = [
  { id: 'A', date: '2023-12-20' },
  { id: 'B', date: '2023-12-28' },
  { id: 'C', date: '2024-01-05' },
];

function walkerFor(vcs: FakeVersionControl, branchCandidates?: string[]): HistoryWalker {
  return new HistoryWalker(vcs, { now, log: quiet, branchCandidates });
}

describe('HistoryWalker.discoverPrimaryBranch', () => {
  it('returns the first candidate that exists', async () => {
    const vcs = new FakeVersionControl(history, { branches: ['master', 'develop'] });

    await expect(walkerFor(vcs).discoverPrimaryBranch()).resolves.toBe('master');
  });

  it('returns null when no candidate exists', async () => {
    const vcs = new FakeVersionControl(history, { branches: ['feature/x'] });

    await expect(walkerFor(vcs).discoverPrimaryBranch()).resolves.toBeNull();
  });

  it('honors configured candidates', async () => {
    const vcs = new FakeVersionControl(history, { branches: ['main', 'trunk'] });

    await expect(walkerFor(vcs, ['trunk', 'main']).discoverPrimaryBranch()).resolves.toBe('trunk');
  });
});

describe('HistoryWalker.planSnapshots', () => {
  it('pairs each sample date with the latest commit at or before it', async () => {
    const walker = walkerFor(new FakeVersionControl(history));

    const plan = await walker.planSnapshots('weekly', 2);

    expect(plan.branch).toBe('main');
    expect(plan.sampleDates).toEqual(['2023-12-25', '2024-01-01', '2024-01-08']);
    expect(plan.snapshots).toEqual([
      { date: '2023-12-25', commit: 'A' },
      { date: '2024-01-01', commit: 'B' },
      { date: '2024-01-08', commit: 'C' },
    ]);
    expect(walker.state).toBe('init');
  });

  it('skips dates before the first commit and keeps repeated commits', async () => {
    const vcs = new FakeVersionControl([{ id: 'B', date: '2023-12-28' }]);

    const plan = await walkerFor(vcs).planSnapshots('weekly', 2);

    expect(plan.snapshots).toEqual([
      { date: '2024-01-01', commit: 'B' },
      { date: '2024-01-08', commit: 'B' },
    ]);
  });

  it('plans a single snapshot for zero periods', async () => {
    const plan = await walkerFor(new FakeVersionControl(history)).planSnapshots('weekly', 0);

    expect(plan.snapshots).toEqual([{ date: '2024-01-08', commit: 'C' }]);
  });

  it('skips a date whose lookup fails and logs it', async () => {
    const log = vi.fn();
    const vcs = new FakeVersionControl(history, { failLookupOn: ['2024-01-01'] });
    const walker = new HistoryWalker(vcs, { now, log });

    const plan = await walker.planSnapshots('weekly', 2);

    expect(plan.snapshots.map(s => s.date)).toEqual(['2023-12-25', '2024-01-08']);
    expect(log).toHaveBeenCalledWith('Could not resolve a commit for 2024-01-01: fatal: bad revision for 2024-01-01');
  });

  it('is empty without a primary branch', async () => {
    const vcs = new FakeVersionControl(history, { branches: [] });
    const walker = walkerFor(vcs);

    const plan = await walker.planSnapshots('monthly', 3);

    expect(plan.branch).toBeNull();
    expect(plan.sampleDates).toHaveLength(4);
    expect(plan.snapshots).toEqual([]);
    expect(walker.state).toBe('empty');
  });

  it('is empty when every date predates the history', async () => {
    const vcs = new FakeVersionControl([{ id: 'Z', date: '2030-01-01' }]);
    const walker = walkerFor(vcs);

    const plan = await walker.planSnapshots('weekly', 1);

    expect(plan.snapshots).toEqual([]);
    expect(walker.state).toBe('empty');
  });

  it('returns frozen snapshots', async () => {
    const plan = await walkerFor(new FakeVersionControl(history)).planSnapshots('weekly', 0);

    expect(Object.isFrozen(plan.snapshots[0])).toBe(true);
  });
});

describe('HistoryWalker.walk', () => {
  const snapshots: Snapshot[] = [
    { date: '2023-12-25', commit: 'A' },
    { date: '2024-01-01', commit: 'B' },
    { date: '2024-01-08', commit: 'C' },
  ];

  it('visits each snapshot with its commit checked out, then restores the head', async () => {
    const vcs = new FakeVersionControl(history);
    const walker = walkerFor(vcs);
    const seen: string[] = [];

    const result = await walker.walk(snapshots, async snapshot => {
      seen.push(vcs.head);
      return snapshot.date;
    });

    expect(seen).toEqual(['A', 'B', 'C']);
    expect(result.originalHead).toBe('main');
    expect(result.results.map(r => r.value)).toEqual(['2023-12-25', '2024-01-01', '2024-01-08']);
    expect(result.failures).toEqual([]);
    expect(vcs.checkouts).toEqual(['A', 'B', 'C', 'main']);
    expect(vcs.head).toBe('main');
    expect(walker.state).toBe('restored');
  });

  it('restores a detached head to the same commit', async () => {
    const vcs = new FakeVersionControl(history, { head: 'B' });

    await walkerFor(vcs).walk(snapshots.slice(0, 1), async () => undefined);

    expect(vcs.checkouts).toEqual(['A', 'B']);
  });

  it('records a failing visit and carries on', async () => {
    const vcs = new FakeVersionControl(history);

    const result = await walkerFor(vcs).walk(snapshots, async snapshot => {
      if (snapshot.commit === 'B') throw new Error('disk hiccup');
      return snapshot.commit;
    });

    expect(result.results.map(r => r.value)).toEqual(['A', 'C']);
    expect(result.failures).toEqual([{ snapshot: snapshots[1], message: 'disk hiccup' }]);
    expect(vcs.checkouts).toEqual(['A', 'B', 'C', 'main']);
  });

  it('records a failing checkout without visiting it', async () => {
    const vcs = new FakeVersionControl(history, { failCheckoutOf: ['B'] });
    const visit = vi.fn(async (snapshot: Snapshot) => snapshot.commit);

    const result = await walkerFor(vcs).walk(snapshots, visit);

    expect(visit).toHaveBeenCalledTimes(2);
    expect(result.failures.map(f => f.snapshot.commit)).toEqual(['B']);
    expect(vcs.head).toBe('main');
  });

  it('stops on an aborting error and still restores the head', async () => {
    const vcs = new FakeVersionControl(history);
    const walker = walkerFor(vcs);

    const run = walker.walk(snapshots, async () => {
      throw new RunAbortedError('report gone', 'report-sink');
    });

    await expect(run).rejects.toMatchObject({ name: 'RunAbortedError', stage: 'report-sink' });
    expect(vcs.checkouts).toEqual(['A', 'main']);
    expect(vcs.head).toBe('main');
    expect(walker.state).toBe('restored');
  });

  it('aborts before any checkout when the head cannot be read', async () => {
    const vcs = new FakeVersionControl(history, { failCurrentHead: true });

    await expect(walkerFor(vcs).walk(snapshots, async () => undefined)).rejects.toMatchObject({
      stage: 'original-head',
    });
    expect(vcs.checkouts).toEqual([]);
  });

  it('aborts when the head cannot be restored', async () => {
    const vcs = new FakeVersionControl(history, { failCheckoutOf: ['main'] });
    const walker = walkerFor(vcs);

    await expect(walker.walk(snapshots, async () => undefined)).rejects.toMatchObject({ stage: 'restore' });
    expect(vcs.checkouts).toEqual(['A', 'B', 'C', 'main']);
    expect(walker.state).toBe('walking');
  });

  it('keeps the stopping error in the message when the restore also fails', async () => {
    const vcs = new FakeVersionControl(history, { failCheckoutOf: ['main'] });

    const run = walkerFor(vcs).walk(snapshots, async () => {
      throw new RunAbortedError('report gone', 'report-sink');
    });

    await expect(run).rejects.toMatchObject({ stage: 'restore' });
    await expect(run).rejects.toThrow(
      "Failed to restore the working tree to main: error: pathspec 'main' did not match (walk was stopping: report gone)"
    );
  });

  it('checks nothing out for an empty plan', async () => {
    const vcs = new FakeVersionControl(history);
    const walker = walkerFor(vcs);

    const result = await walker.walk([], async () => undefined);

    expect(result).toEqual({ originalHead: 'main', results: [], failures: [] });
    expect(vcs.checkouts).toEqual([]);
    expect(walker.state).toBe('restored');
  });
});

import * as fs from 'fs';
import * as path from 'path';
import type { VersionControl } from '../../history/version-control.js';

export interface FakeCommit {
  id: string;
  /** yyyy-MM-dd */
  date: string;
  files?: Record<string, string>;
}

export interface FakeVersionControlOptions {
  branches?: string[];
  head?: string;
  /** When set, checkouts rewrite this directory with the commit's files */
  workTree?: string;
  failCheckoutOf?: string[];
  failCurrentHead?: boolean;
  failLookupOn?: string[];
  /** Simulated latency of each checkout */
  checkoutDelayMs?: number;
}

/**
 * In-memory stand-in for a git repository with a linear history
 */
export class FakeVersionControl implements VersionControl {
  head: string;
  readonly checkouts: string[] = [];
  private readonly branches: string[];

  constructor(
    private readonly commits: FakeCommit[],
    private readonly options: FakeVersionControlOptions = {}
  ) {
    this.branches = options.branches ?? ['main'];
    this.head = options.head ?? 'main';
    this.materialize(this.head);
  }

  async currentHead(): Promise<string> {
    if (this.options.failCurrentHead) {
      throw new Error('fatal: ambiguous argument HEAD');
    }
    return this.head;
  }

  async branchExists(branch: string): Promise<boolean> {
    return this.branches.includes(branch);
  }

  async commitAtOrBefore(_branch: string, date: string): Promise<string | null> {
    if (this.options.failLookupOn?.includes(date)) {
      throw new Error(`fatal: bad revision for ${date}`);
    }
    const eligible = this.commits.filter(commit => commit.date <= date);
    return eligible.length > 0 ? eligible[eligible.length - 1].id : null;
  }

  async checkout(commit: string): Promise<void> {
    if (this.options.checkoutDelayMs) {
      await new Promise(resolve => setTimeout(resolve, this.options.checkoutDelayMs));
    }
    this.checkouts.push(commit);
    if (this.options.failCheckoutOf?.includes(commit)) {
      throw new Error(`error: pathspec '${commit}' did not match`);
    }
    this.head = commit;
    this.materialize(commit);
  }

  private materialize(ref: string): void {
    const workTree = this.options.workTree;
    if (!workTree) return;

    const commit = this.commits.find(c => c.id === ref) ?? this.commits[this.commits.length - 1];

    fs.rmSync(workTree, { recursive: true, force: true });
    fs.mkdirSync(workTree, { recursive: true });
    if (!commit) return;

    for (const [file, content] of Object.entries(commit.files ?? {})) {
      const target = path.join(workTree, file);
      fs.mkdirSync(path.dirname(target), { recursive: true });
      fs.writeFileSync(target, content);
    }
  }
}

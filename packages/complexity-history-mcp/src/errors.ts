/**
 * Run-level error types
 */

export type AbortStage = 'original-head' | 'report-sink' | 'restore';

/**
 * A failure that ends the whole run. Raised when the original head cannot
 * be captured, the report cannot be written, or the working tree cannot
 * be restored.
 */
export class RunAbortedError extends Error {
  constructor(
    message: string,
    public readonly stage: AbortStage,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'RunAbortedError';
  }
}

/**
 * Raised when the target path is not inside a git work tree
 */
export class NotAGitRepositoryError extends Error {
  constructor(public readonly repoPath: string) {
    super(`Not a git repository: ${repoPath}`);
    this.name = 'NotAGitRepositoryError';
  }
}

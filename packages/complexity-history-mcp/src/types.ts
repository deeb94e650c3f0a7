/**
 * Complexity History MCP - Type Definitions
 */

/**
 * HTTP method tag attached to an inferred endpoint.
 * ANY covers route declarations that do not bind a single verb.
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE' | 'ANY';

/**
 * An inferred, externally reachable API route
 */
export interface Endpoint {
  method: HttpMethod;
  /** Normalized path: exactly one leading slash, no trailing slash */
  path: string;
}

/**
 * Source families the pattern catalog knows about
 */
export type Dialect = 'java' | 'javascript' | 'python' | 'go' | 'php' | 'shell' | 'any';

/**
 * What an outbound call rule recognizes
 */
export type CallKind = 'http-client' | 'rpc-stub' | 'process-tool' | 'url' | 'api-path';

export interface EndpointRule {
  method: HttpMethod;
  dialect: Dialect;
  /** At most one capturing group, holding the route path */
  pattern: RegExp;
}

export interface CallRule {
  kind: CallKind;
  dialect: Dialect;
  pattern: RegExp;
}

/**
 * Manifest formats the extractor can read dependencies from
 */
export type ManifestKind =
  | 'pom.xml'
  | 'package.json'
  | 'composer.json'
  | 'requirements.txt'
  | 'setup.py'
  | 'build.gradle'
  | 'go.mod';

/**
 * A contained per-item failure: the item contributed nothing
 */
export interface ParseIssue {
  file: string;
  stage: 'read' | 'walk' | 'manifest' | 'descriptor';
  message: string;
}

/**
 * Per-item outcome; an Err is treated as "contributes an empty set"
 */
export type Result<T, E = ParseIssue> =
  | { ok: true; value: T }
  | { ok: false; error: E };

/**
 * Extraction output for one module path
 */
export interface ModuleExtraction {
  modulePath: string;
  /** Keyed by the endpoint's display form, "METHOD /path" */
  endpoints: ReadonlyMap<string, Endpoint>;
  calls: ReadonlySet<string>;
  dependencies: ReadonlySet<string>;
  issues: readonly ParseIssue[];
}

/**
 * Aggregated view of one snapshot; counts are derived from the sets
 */
export interface SnapshotSummary {
  readonly endpoints: ReadonlyMap<string, Endpoint>;
  readonly calls: ReadonlySet<string>;
  readonly dependencies: ReadonlySet<string>;
  readonly endpointCount: number;
  readonly callCount: number;
  readonly dependencyCount: number;
}

/**
 * One row of the complexity report
 */
export interface SnapshotRecord {
  service: string;
  date: string;
  endpointCount: number;
  dependencyCount: number;
  callCount: number;
  dependencies: string[];
  endpoints: string[];
  calls: string[];
}

export type SamplingFrequency = 'weekly' | 'monthly';

/**
 * One sampled point in history
 */
export interface Snapshot {
  readonly date: string; // yyyy-MM-dd, the logical sample date
  readonly commit: string;
}

/**
 * Resolved sampling plan for a repository
 */
export interface SnapshotPlan {
  /** null when no primary branch candidate exists */
  branch: string | null;
  sampleDates: string[];
  snapshots: Snapshot[];
}

export interface SnapshotFailure {
  snapshot: Snapshot;
  message: string;
}

export interface WalkResult<T> {
  originalHead: string;
  results: Array<{ snapshot: Snapshot; value: T }>;
  failures: SnapshotFailure[];
}

/**
 * Per-snapshot entry of a full history run
 */
export interface SnapshotReport {
  date: string;
  commit: string;
  modules: string[];
  endpointCount: number;
  dependencyCount: number;
  callCount: number;
  issueCount: number;
}

export interface ComplexityHistoryResult {
  repository: string;
  service: string;
  branch: string | null;
  frequency: SamplingFrequency;
  periods: number;
  output: string;
  snapshots: SnapshotReport[];
  failures: SnapshotFailure[];
}

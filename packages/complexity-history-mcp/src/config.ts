/**
 * Analyzer configuration
 * Catalog defaults, overridable from the environment and per tool call
 */

import { z } from 'zod';
import {
  CALL_SOURCE_EXTENSIONS,
  ENDPOINT_SOURCE_EXTENSIONS,
  EXCLUDED_DIR_TOKENS,
  PRIMARY_BRANCH_CANDIDATES,
  UNWANTED_MAVEN_SCOPES,
} from './catalog/patterns.js';

const tokenList = z.array(z.string().min(1));

export const analyzerConfigSchema = z.object({
  excludedDirTokens: tokenList.default([...EXCLUDED_DIR_TOKENS]),
  endpointExtensions: tokenList.default([...ENDPOINT_SOURCE_EXTENSIONS]),
  callExtensions: tokenList.default([...CALL_SOURCE_EXTENSIONS]),
  unwantedScopes: tokenList.default([...UNWANTED_MAVEN_SCOPES]),
  branchCandidates: tokenList.min(1).default([...PRIMARY_BRANCH_CANDIDATES]),
});

export type AnalyzerConfig = z.infer<typeof analyzerConfigSchema>;

/**
 * Split a comma-separated environment value, ignoring blanks
 */
function splitList(value: string | undefined): string[] | undefined {
  if (value === undefined) return undefined;
  const items = value.split(',').map(item => item.trim()).filter(item => item.length > 0);
  return items.length > 0 ? items : undefined;
}

/**
 * Build the configuration from defaults and environment overrides.
 *
 * COMPLEXITY_EXCLUDE_DIRS replaces the excluded directory tokens;
 * COMPLEXITY_BRANCH_CANDIDATES replaces the order in which primary branches are tried.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AnalyzerConfig {
  return analyzerConfigSchema.parse({
    excludedDirTokens: splitList(env.COMPLEXITY_EXCLUDE_DIRS),
    branchCandidates: splitList(env.COMPLEXITY_BRANCH_CANDIDATES),
  });
}

/**
 * Append extra excluded tokens for a single run
 */
export function withExtraExclusions(config: AnalyzerConfig, extra: readonly string[]): AnalyzerConfig {
  if (extra.length === 0) return config;
  return {
    ...config,
    excludedDirTokens: [...new Set([...config.excludedDirTokens, ...extra])],
  };
}

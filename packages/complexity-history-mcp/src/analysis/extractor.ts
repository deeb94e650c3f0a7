/**
 * Module extractor
 * Walks one module path and collects endpoints, calls and dependencies
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Endpoint, ModuleExtraction, ParseIssue } from '../types.js';
import { loadConfig, type AnalyzerConfig } from '../config.js';
import { isManifestFile } from '../catalog/patterns.js';
import { formatEndpoint, matchCalls, matchEndpoints } from '../parsers/source-matcher.js';
import { parseManifest } from '../parsers/manifest-parser.js';
import { walkFiles } from '../utils/file-walker.js';
import { attempt, valueOr } from '../utils/result.js';

/**
 * Extract the three complexity signals from a module.
 *
 * Never throws: unreadable files, undecodable bytes and broken manifests
 * contribute nothing and are reported in `issues`.
 */
export function extractModule(modulePath: string, config: AnalyzerConfig = loadConfig()): ModuleExtraction {
  const endpoints = new Map<string, Endpoint>();
  const calls = new Set<string>();
  const dependencies = new Set<string>();

  const walk = walkFiles(modulePath, config.excludedDirTokens);
  const issues: ParseIssue[] = [...walk.issues];

  for (const file of walk.files) {
    const extension = path.extname(file);
    const fileName = path.basename(file);
    const scanEndpoints = config.endpointExtensions.includes(extension);
    const scanCalls = config.callExtensions.includes(extension);

    if (!scanEndpoints && !scanCalls && !isManifestFile(fileName)) continue;

    // Invalid UTF-8 sequences decode to U+FFFD rather than failing
    const content = valueOr(
      attempt(file, 'read', () => fs.readFileSync(file, 'utf-8')),
      null,
      issues
    );
    if (content === null) continue;

    if (scanEndpoints) {
      for (const endpoint of matchEndpoints(content)) {
        endpoints.set(formatEndpoint(endpoint), endpoint);
      }
    }

    if (scanCalls) {
      for (const call of matchCalls(content)) {
        calls.add(call);
      }
    }

    if (isManifestFile(fileName)) {
      const coordinates = valueOr(
        attempt(file, 'manifest', () => parseManifest(fileName, content, config.unwantedScopes)),
        [],
        issues
      );
      for (const coordinate of coordinates) {
        dependencies.add(coordinate);
      }
    }
  }

  return { modulePath, endpoints, calls, dependencies, issues };
}

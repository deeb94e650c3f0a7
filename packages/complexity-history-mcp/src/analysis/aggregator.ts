/**
 * Snapshot aggregation
 */

import type { Endpoint, ModuleExtraction, SnapshotRecord, SnapshotSummary } from '../types.js';

function sortedValues(values: Iterable<string>): string[] {
  return Array.from(values).sort();
}

/**
 * Union the per-module sets. Counts are taken from the unions, so a
 * dependency declared by two modules is counted once.
 */
export function aggregateSnapshot(extractions: readonly ModuleExtraction[]): SnapshotSummary {
  const endpoints = new Map<string, Endpoint>();
  const calls = new Set<string>();
  const dependencies = new Set<string>();

  for (const extraction of extractions) {
    extraction.endpoints.forEach((endpoint, key) => endpoints.set(key, endpoint));
    extraction.calls.forEach(call => calls.add(call));
    extraction.dependencies.forEach(dependency => dependencies.add(dependency));
  }

  return Object.freeze({
    endpoints,
    calls,
    dependencies,
    endpointCount: endpoints.size,
    callCount: calls.size,
    dependencyCount: dependencies.size,
  });
}

/**
 * Flatten a summary into a report row with sorted lists
 */
export function summaryToRecord(service: string, date: string, summary: SnapshotSummary): SnapshotRecord {
  return {
    service,
    date,
    endpointCount: summary.endpointCount,
    dependencyCount: summary.dependencyCount,
    callCount: summary.callCount,
    dependencies: sortedValues(summary.dependencies),
    endpoints: sortedValues(summary.endpoints.keys()),
    calls: sortedValues(summary.calls),
  };
}

/**
 * Human-readable snapshot summary, one item per line
 */
export function formatSnapshotSummary(date: string, summary: SnapshotSummary): string {
  const lines = [`Snapshot at ${date}:`, `  Endpoints: ${summary.endpointCount}`];
  for (const endpoint of sortedValues(summary.endpoints.keys())) {
    lines.push(`    - ${endpoint}`);
  }

  lines.push(`  Inter-Service Communications: ${summary.callCount}`);
  for (const call of sortedValues(summary.calls)) {
    lines.push(`    - ${call}`);
  }

  lines.push(`  Dependencies: ${summary.dependencyCount}`);
  for (const dependency of sortedValues(summary.dependencies)) {
    lines.push(`    - ${dependency}`);
  }

  return lines.join('\n');
}

/**
 * CSV report sink
 * One header line, then one row per analyzed snapshot
 */

import * as fs from 'fs';
import type { SnapshotRecord } from '../types.js';
import { RunAbortedError } from '../errors.js';
import { describeError } from '../utils/result.js';

export const REPORT_HEADER = [
  'Service',
  'Date',
  'Endpoints',
  'Dependencies',
  'InterServiceCommunications',
  'DependencyList',
  'EndpointList',
  'InterServiceCommunicationsList',
] as const;

const LIST_SEPARATOR = ';';

/**
 * Quote a field only when it needs it
 */
export function escapeCsvField(value: string): string {
  return /[",\r\n]/.test(value) ? quoteCsvField(value) : value;
}

export function quoteCsvField(value: string): string {
  return `"${value.replace(/"/g, '""')}"`;
}

/**
 * List fields are always quote-wrapped so embedded separators survive
 */
export function formatCsvRow(record: SnapshotRecord): string {
  return [
    escapeCsvField(record.service),
    escapeCsvField(record.date),
    String(record.endpointCount),
    String(record.dependencyCount),
    String(record.callCount),
    quoteCsvField(record.dependencies.join(LIST_SEPARATOR)),
    quoteCsvField(record.endpoints.join(LIST_SEPARATOR)),
    quoteCsvField(record.calls.join(LIST_SEPARATOR)),
  ].join(',');
}

export class CsvReportSink {
  private rows = 0;

  private constructor(public readonly outputPath: string) {}

  /**
   * Create (or truncate) the report and write its header.
   * Called before any checkout so an unwritable path aborts early.
   */
  static open(outputPath: string): CsvReportSink {
    try {
      fs.writeFileSync(outputPath, REPORT_HEADER.join(',') + '\n', 'utf-8');
    } catch (error) {
      throw new RunAbortedError(
        `Cannot write report to ${outputPath}: ${describeError(error)}`,
        'report-sink',
        { cause: error }
      );
    }
    return new CsvReportSink(outputPath);
  }

  write(record: SnapshotRecord): void {
    try {
      fs.appendFileSync(this.outputPath, formatCsvRow(record) + '\n', 'utf-8');
    } catch (error) {
      throw new RunAbortedError(
        `Cannot append to report ${this.outputPath}: ${describeError(error)}`,
        'report-sink',
        { cause: error }
      );
    }
    this.rows++;
  }

  get rowCount(): number {
    return this.rows;
  }
}

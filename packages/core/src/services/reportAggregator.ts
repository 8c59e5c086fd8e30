/**
 * Report Aggregator Service
 *
 * Folds per-file results into a RunReport and renders it as report lines.
 * Both steps are pure, so the same inputs always render the same lines.
 */

import type { FileResult } from '@/services/chartScanner';
import type { ChartRoot } from '@/types';

export type RunReport = {
  readonly roots: readonly ChartRoot[];
  readonly files: readonly FileResult[];
  /** Files enumerated, readable or not */
  readonly filesDiscovered: number;
  readonly filesScanned: number;
  readonly filesFailed: number;
  /** Every extracted reference, duplicates included */
  readonly totalOccurrences: number;
  /** Distinct references summed over files */
  readonly totalReferences: number;
  readonly foundCount: number;
  readonly missingCount: number;
  /** No missing reference and at least one file scanned */
  readonly success: boolean;
};

export type ReportHeader = {
  valuesFile: string;
  chartPath?: string;
  bomFile?: string;
  /** Prefix shown before each path (default: ".Values") */
  displayPrefix?: string;
};

export type ReportLine = {
  level: 'info' | 'warn';
  text: string;
};

const SEPARATOR = '='.repeat(80);
const FILE_SEPARATOR = '-'.repeat(40);

/**
 * Aggregates per-file results
 *
 * Unreadable files are counted in `filesFailed` and nowhere else.
 */
export function aggregateResults(
  roots: readonly ChartRoot[],
  files: readonly FileResult[]
): RunReport {
  let filesScanned = 0;
  let totalOccurrences = 0;
  let foundCount = 0;
  let missingCount = 0;

  for (const file of files) {
    if (file.status === 'error') {
      continue;
    }
    filesScanned++;
    totalOccurrences += file.occurrences;
    for (const reference of file.references) {
      if (reference.found) {
        foundCount++;
      } else {
        missingCount++;
      }
    }
  }

  return Object.freeze({
    roots: [...roots],
    files: [...files],
    filesDiscovered: files.length,
    filesScanned,
    filesFailed: files.length - filesScanned,
    totalOccurrences,
    totalReferences: foundCount + missingCount,
    foundCount,
    missingCount,
    success: missingCount === 0 && filesScanned > 0,
  });
}

function describeRoot(root: ChartRoot): string {
  return root.name ? `${root.name} (${root.path})` : root.path;
}

function renderFile(file: FileResult, prefix: string): string[] {
  const lines = [`File: ${file.relativePath}`, FILE_SEPARATOR];

  if (file.status === 'error') {
    lines.push(`  ! unreadable: ${file.error}`);
    return lines;
  }

  for (const reference of file.references) {
    lines.push(
      reference.found
        ? `  ✓ ${prefix}.${reference.path}`
        : `  ✗ ${prefix}.${reference.path} (missing)`
    );
  }
  return lines;
}

/**
 * Renders a report: header, per-file breakdown in scan order, summary
 */
export function renderReport(report: RunReport, header: ReportHeader): ReportLine[] {
  const prefix = header.displayPrefix ?? '.Values';
  const lines: ReportLine[] = [];
  const info = (text: string) => lines.push({ level: 'info', text });
  const warn = (text: string) => lines.push({ level: 'warn', text });

  info(SEPARATOR);
  info('HELM VARIABLE REFERENCE CHECKER REPORT');
  info(SEPARATOR);
  if (header.chartPath !== undefined) {
    info(`Helm Charts Path: ${header.chartPath}`);
  }
  if (header.bomFile !== undefined) {
    info(`BOM File: ${header.bomFile} (${report.roots.length} chart(s))`);
  }
  info(`Values File: ${header.valuesFile}`);
  info(SEPARATOR);
  info(`Found ${report.filesDiscovered} template file(s) to process`);

  for (const root of report.roots) {
    const files = report.files.filter(
      file => file.root === root.path && (file.status === 'error' || file.references.length > 0)
    );
    info(`Chart: ${describeRoot(root)}`);
    for (const file of files) {
      renderFile(file, prefix).forEach(info);
    }
  }

  info(SEPARATOR);
  info(`Total references processed: ${report.totalOccurrences}`);
  info(`SUMMARY: ${report.foundCount}/${report.totalReferences} variables found in values file`);
  if (report.filesFailed > 0) {
    warn(`${report.filesFailed} file(s) could not be read`);
  }
  if (report.filesScanned === 0) {
    warn('No template files were scanned');
  } else if (report.missingCount > 0) {
    warn(`${report.missingCount} variable(s) are missing from ${header.valuesFile}`);
  } else {
    info('All variables are present in the values file!');
  }
  info(SEPARATOR);

  return lines;
}

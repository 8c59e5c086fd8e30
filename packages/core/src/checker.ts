/**
 * Runs one check: load values, collect chart roots, scan, aggregate, report.
 */

import * as path from 'node:path';
import { isConfigurationError } from '@/errors';
import { expandBom, loadBomFile } from '@/features/bomManifest';
import { ChartScanner } from '@/services/chartScanner';
import { aggregateResults, renderReport, type RunReport } from '@/services/reportAggregator';
import { loadValuesFile } from '@/services/valuesLoader';
import { type ChartRoot, type CheckerSettings, resolveSettings } from '@/types';
import type { Logger } from '@/utils/logger';

export const ExitCode = {
  Success: 0,
  ValidationFailed: 1,
  ConfigurationError: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

type ChartSource = { chartPath: string; bomFile?: undefined } | { bomFile: string; chartPath?: undefined };

export type CheckOptions = ChartSource & {
  valuesFile: string;
  settings?: Partial<CheckerSettings>;
  /** Base for relative paths (default: process.cwd()) */
  cwd?: string;
};

export type CheckOutcome = {
  exitCode: ExitCode;
  /** Absent when the run stopped on a configuration error */
  report?: RunReport;
};

async function collectRoots(options: CheckOptions, cwd: string, logger: Logger): Promise<ChartRoot[]> {
  if (options.bomFile === undefined) {
    return [{ path: path.resolve(cwd, options.chartPath), origin: 'argument' }];
  }

  const bomFile = path.resolve(cwd, options.bomFile);
  const manifest = await loadBomFile(bomFile);
  const { roots } = expandBom(manifest, {
    baseDir: path.dirname(bomFile),
    source: options.bomFile,
    logger,
  });
  logger.debug(`BOM lists ${roots.length} chart(s)`);
  return roots;
}

/**
 * Validates every .Values reference of the given chart(s)
 *
 * Configuration errors are logged and mapped to exit code 2; any other
 * error propagates.
 */
export async function runCheck(options: CheckOptions, logger: Logger): Promise<CheckOutcome> {
  const cwd = options.cwd ?? process.cwd();
  const settings = resolveSettings(options.settings);

  try {
    const values = await loadValuesFile(path.resolve(cwd, options.valuesFile), logger);
    logger.debug(`Successfully loaded values file: ${options.valuesFile}`);

    const scanner = new ChartScanner(values, settings, logger);
    const roots = await collectRoots(options, cwd, logger);
    const results = await scanner.scan(roots);
    const described = await Promise.all(roots.map(root => scanner.describeRoot(root)));

    const report = aggregateResults(described, results);
    const lines = renderReport(report, {
      valuesFile: options.valuesFile,
      chartPath: options.chartPath,
      bomFile: options.bomFile,
      displayPrefix: settings.valuesPrefixes[0],
    });
    for (const line of lines) {
      if (line.level === 'warn') {
        logger.warn(line.text);
      } else {
        logger.info(line.text);
      }
    }

    return {
      exitCode: report.success ? ExitCode.Success : ExitCode.ValidationFailed,
      report,
    };
  } catch (error) {
    if (isConfigurationError(error)) {
      logger.error(error.message);
      return { exitCode: ExitCode.ConfigurationError };
    }
    throw error;
  }
}

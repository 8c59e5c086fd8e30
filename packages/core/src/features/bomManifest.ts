/**
 * BOM Manifest Module
 *
 * Expands a bill-of-materials manifest into chart roots:
 *
 * ```yaml
 * spec:
 *   workloadList:
 *     - name: api
 *       type: helm
 *       helm:
 *         chartPath: ./charts/api
 * ```
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as yaml from 'js-yaml';
import { ConfigurationError, errorMessage } from '@/errors';
import type { ChartRoot } from '@/types';
import type { Logger } from '@/utils/logger';

const HELM_WORKLOAD_TYPE = 'helm';

export type BomExpansion = {
  roots: ChartRoot[];
  /** One message per skipped workload entry */
  warnings: string[];
};

export type ExpandOptions = {
  /** Directory that relative chart paths are resolved against */
  baseDir: string;
  /** Used in messages */
  source?: string;
  /** Receives each warning as it is found */
  logger?: Logger;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeEntry(entry: Record<string, unknown>, index: number): string {
  return typeof entry.name === 'string' && entry.name.length > 0
    ? `workload "${entry.name}" (#${index + 1})`
    : `workload #${index + 1}`;
}

function readWorkloadList(manifest: unknown, source: string): unknown[] {
  const spec = isRecord(manifest) ? manifest.spec : undefined;
  const workloadList = isRecord(spec) ? spec.workloadList : undefined;

  if (!Array.isArray(workloadList)) {
    throw new ConfigurationError(`BOM ${source} has no spec.workloadList list`);
  }
  return workloadList;
}

/**
 * Extracts the chart roots a manifest refers to
 *
 * Malformed or non-helm entries are skipped with a warning.
 *
 * @param manifest - Parsed manifest document
 * @throws ConfigurationError when the manifest has no workload list or no usable entry
 */
export function expandBom(manifest: unknown, options: ExpandOptions): BomExpansion {
  const source = options.source ?? 'manifest';
  const workloadList = readWorkloadList(manifest, source);

  const roots: ChartRoot[] = [];
  const warnings: string[] = [];
  const seen = new Set<string>();
  const skip = (message: string) => {
    warnings.push(message);
    options.logger?.warn(message);
  };

  workloadList.forEach((entry, index) => {
    if (!isRecord(entry)) {
      skip(`Skipping workload #${index + 1}: entry is not a mapping`);
      return;
    }

    const label = describeEntry(entry, index);
    const type = entry.type;
    const helm = entry.helm;

    if (type === undefined) {
      if (!isRecord(helm)) {
        skip(`Skipping ${label}: no type and no helm block`);
        return;
      }
    } else if (typeof type !== 'string' || type.toLowerCase() !== HELM_WORKLOAD_TYPE) {
      skip(`Skipping ${label}: type "${String(type)}" is not a helm workload`);
      return;
    }

    const chartPath = isRecord(helm) ? helm.chartPath : undefined;
    if (typeof chartPath !== 'string' || chartPath.trim().length === 0) {
      skip(`Skipping ${label}: missing helm.chartPath`);
      return;
    }

    const resolved = path.resolve(options.baseDir, chartPath.trim());
    if (seen.has(resolved)) {
      skip(`Skipping ${label}: chart path ${resolved} is already listed`);
      return;
    }
    seen.add(resolved);

    roots.push({
      path: resolved,
      name: typeof entry.name === 'string' && entry.name.length > 0 ? entry.name : undefined,
      origin: 'bom',
    });
  });

  if (roots.length === 0) {
    throw new ConfigurationError(`BOM ${source} does not list any helm chart to validate`);
  }

  return { roots, warnings };
}

/**
 * Reads and parses a manifest file
 *
 * @throws ConfigurationError when the file is missing or is not valid YAML
 */
export async function loadBomFile(bomFile: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(bomFile, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read BOM file ${bomFile}: ${errorMessage(error)}`);
  }

  try {
    return yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(`Error parsing BOM file ${bomFile}: ${errorMessage(error)}`);
  }
}

/**
 * Chart Scanner Service
 *
 * Enumerates template files under each chart root, extracts their .Values
 * references and resolves each distinct one against the values document.
 */

import * as path from 'node:path';
import { ConfigurationError, errorMessage } from '@/errors';
import { readChartName } from '@/features/helmChartDetection';
import { resolvePath } from '@/features/pathResolver';
import type { ValuesDocument } from '@/features/valuesDocument';
import {
  extractValuesReferences,
  isHelmTemplateText,
  tallyReferences,
} from '@/features/valuesReferenceFeatures';
import type { ChartRoot, CheckerSettings } from '@/types';
import { directoryExists, fileExists, findFilesByExtension, readTextFile } from '@/utils/fileSystem';
import type { Logger } from '@/utils/logger';

/**
 * A distinct reference of one file and whether it resolved
 */
export type ReferenceCheck = {
  path: string;
  /** Times the reference appears in the file */
  occurrences: number;
  found: boolean;
};

type FileLocation = {
  /** Chart root the file was found under */
  root: string;
  /** Absolute file path */
  filePath: string;
  /** Path relative to the chart root, with forward slashes */
  relativePath: string;
};

export type ScannedFile = FileLocation & {
  status: 'scanned';
  /** Every extracted reference, duplicates included */
  occurrences: number;
  /** Distinct references in first-seen order */
  references: ReferenceCheck[];
};

export type UnreadableFile = FileLocation & {
  status: 'error';
  error: string;
};

export type FileResult = ScannedFile | UnreadableFile;

/**
 * Checks the templates of one or more chart roots
 */
export class ChartScanner {
  private values: ValuesDocument;
  private settings: CheckerSettings;
  private logger: Logger;

  constructor(values: ValuesDocument, settings: CheckerSettings, logger: Logger) {
    this.values = values;
    this.settings = settings;
    this.logger = logger;
  }

  /**
   * Scans every root, in order
   *
   * All roots are checked for existence before any file is read.
   *
   * @throws ConfigurationError when a root is missing or is not a directory
   */
  async scan(roots: readonly ChartRoot[]): Promise<FileResult[]> {
    for (const root of roots) {
      await this.assertRootExists(root);
    }

    const results: FileResult[] = [];
    for (const root of roots) {
      results.push(...(await this.scanRoot(root)));
    }
    return results;
  }

  /**
   * Scans the template files of a single chart root
   */
  async scanRoot(root: ChartRoot): Promise<FileResult[]> {
    await this.assertRootExists(root);

    const files = await findFilesByExtension(
      root.path,
      this.settings.extensions,
      this.settings.ignore
    );
    this.logger.debug(`${root.path}: ${files.length} template file(s)`);

    const results: FileResult[] = [];
    for (const filePath of files) {
      results.push(await this.scanFile(root.path, filePath));
    }
    return results;
  }

  /**
   * Reads one file and checks its references
   *
   * A read or decode failure is returned as an `error` result.
   */
  async scanFile(rootDir: string, filePath: string): Promise<FileResult> {
    const location: FileLocation = {
      root: rootDir,
      filePath,
      relativePath: path.relative(rootDir, filePath).split(path.sep).join('/'),
    };

    let content: string;
    try {
      content = await readTextFile(filePath);
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn(`Error reading file ${location.relativePath}: ${message}`);
      return { ...location, status: 'error', error: message };
    }

    if (!isHelmTemplateText(content)) {
      this.logger.debug(`${location.relativePath}: no template actions`);
    }

    return { ...location, status: 'scanned', ...this.checkText(content) };
  }

  /**
   * Extracts and resolves the references of one template text
   */
  checkText(content: string): Pick<ScannedFile, 'occurrences' | 'references'> {
    const extracted = extractValuesReferences(content, this.settings.valuesPrefixes);
    const references = tallyReferences(extracted).map(tally => ({
      path: tally.path,
      occurrences: tally.occurrences,
      found: resolvePath(this.values, tally.segments),
    }));

    return { occurrences: extracted.length, references };
  }

  /**
   * Fills in the display name of a root from its Chart.yaml
   */
  async describeRoot(root: ChartRoot): Promise<ChartRoot> {
    if (root.name) {
      return root;
    }

    try {
      const name = await readChartName(root.path);
      return name ? { ...root, name } : root;
    } catch (error) {
      this.logger.debug(`Cannot read Chart.yaml in ${root.path}: ${errorMessage(error)}`);
      return root;
    }
  }

  private async assertRootExists(root: ChartRoot): Promise<void> {
    if (await directoryExists(root.path)) {
      return;
    }
    throw new ConfigurationError(
      (await fileExists(root.path))
        ? `Helm charts path is not a directory: ${root.path}`
        : `Helm charts directory does not exist: ${root.path}`
    );
  }
}

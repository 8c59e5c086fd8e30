/**
 * Values Loader Service
 *
 * Loads the values file once, before any scanning starts. Every failure
 * here is fatal for the run.
 */

import * as fs from 'node:fs/promises';
import { ConfigurationError, errorMessage } from '@/errors';
import { describeNodeKind, parseValuesDocument, type ValuesDocument } from '@/features/valuesDocument';
import { fileExists, pathExists } from '@/utils/fileSystem';
import type { Logger } from '@/utils/logger';

/**
 * Loads and parses a values YAML file
 *
 * @param valuesFile - Path to the values file (e.g., values-dev.yaml)
 * @param logger - Receives a debug line describing the document
 * @throws ConfigurationError when the file is missing, unreadable, not YAML,
 *   or its root is not a mapping
 */
export async function loadValuesFile(valuesFile: string, logger?: Logger): Promise<ValuesDocument> {
  if (!(await fileExists(valuesFile))) {
    throw new ConfigurationError(
      (await pathExists(valuesFile))
        ? `Values path is not a file: ${valuesFile}`
        : `Values file does not exist: ${valuesFile}`
    );
  }

  let content: string;
  try {
    content = await fs.readFile(valuesFile, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Error reading values file ${valuesFile}: ${errorMessage(error)}`);
  }

  let document: ValuesDocument | undefined;
  try {
    document = parseValuesDocument(content);
  } catch (error) {
    throw new ConfigurationError(`Error parsing YAML file ${valuesFile}: ${errorMessage(error)}`);
  }

  if (!document) {
    throw new ConfigurationError(`Values file ${valuesFile} must contain a mapping at the top level`);
  }

  logger?.debug(`Values document: ${describeNodeKind(document)}`);
  return document;
}

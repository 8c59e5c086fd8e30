/**
 * Path Resolver Module
 *
 * Walks a ValuesNode tree along a dot-notation path.
 * Only key existence is checked; `null` and empty values still resolve.
 */

import type { ValuesNode } from '@/features/valuesDocument';

/** List-index syntax such as `hosts[0]`, which is not supported */
const INDEX_SEGMENT = /\[[^\]]*\]/;

/**
 * Splits a dot-notation path into its segments
 *
 * @example
 * splitPath('PG.R1.DBName')
 * // => ['PG', 'R1', 'DBName']
 */
export function splitPath(dottedPath: string): string[] {
  return dottedPath === '' ? [] : dottedPath.split('.');
}

function step(node: ValuesNode, segment: string): ValuesNode | undefined {
  if (segment.length === 0 || INDEX_SEGMENT.test(segment)) {
    return undefined;
  }

  switch (node.kind) {
    case 'mapping':
      return node.entries.get(segment);
    case 'sequence':
    case 'scalar':
    case 'null':
      return undefined;
    default: {
      const unreachable: never = node;
      return unreachable;
    }
  }
}

/**
 * Checks whether a path exists in a values document
 *
 * @param document - Root node of the values document
 * @param path - Dot-notation path or its segments
 * @returns true if every segment names a key of a mapping
 *
 * @example
 * resolvePath(doc, 'image.repository');
 * resolvePath(doc, ['PG', 'R1', 'DBName']);
 */
export function resolvePath(document: ValuesNode, path: string | readonly string[]): boolean {
  const segments = typeof path === 'string' ? splitPath(path) : path;
  if (segments.length === 0) {
    return false;
  }

  let current: ValuesNode = document;
  for (const segment of segments) {
    const next = step(current, segment);
    if (next === undefined) {
      return false;
    }
    current = next;
  }

  return true;
}

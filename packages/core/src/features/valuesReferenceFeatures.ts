/**
 * Values Reference Features Module
 *
 * Extracts .Values references from Helm template text:
 * - {{ .Values.xxx }}
 * - {{ .Values.foo.bar }}
 * - {{ .Values.xxx | quote }}
 * - {{- .Values.xxx -}}
 *
 * Actions that do not start with a values prefix are not references
 * ({{ if .Values.enabled }}, {{ include "x" . }}, {{ .Release.Name }}).
 */

import { defaultSettings } from '@/types';

/**
 * Represents a .Values reference in a Helm template
 */
export type VariableReference = {
  /** Dot-notation path without the prefix (e.g., "image.repository") */
  path: string;
  /** Path segments (e.g., ["image", "repository"]) */
  segments: readonly string[];
};

/**
 * A distinct reference with the number of times it appears
 */
export type ReferenceTally = VariableReference & {
  occurrences: number;
};

// matchAll() clones the pattern, so sharing it carries no lastIndex state.
// The body never crosses another "{{", so a stray opener cannot swallow the next action.
const ACTION_PATTERN = /\{\{((?:(?!\{\{)[\s\S])*?)\}\}/g;

/** Identifier (any script), optionally followed by list-index syntax */
const SEGMENT_PATTERN = /^[\p{L}\p{N}_-]+(?:\[[^\]\s]*\])*$/u;

function stripTrimMarkers(body: string): string {
  return body.replace(/^-(?=\s)/, '').replace(/(?<=\s)-$/, '');
}

function parseAction(body: string, prefixes: readonly string[]): VariableReference | undefined {
  const expression = stripTrimMarkers(body).trim();

  const pipeIndex = expression.indexOf('|');
  const head = (pipeIndex === -1 ? expression : expression.slice(0, pipeIndex)).trim();
  if (head.length === 0 || /\s/.test(head)) {
    return undefined;
  }

  for (const prefix of prefixes) {
    if (head === prefix) {
      // bare ".Values" has no path
      return undefined;
    }
    if (!head.startsWith(`${prefix}.`)) {
      continue;
    }

    const segments = head.slice(prefix.length + 1).split('.');
    if (segments.some(segment => !SEGMENT_PATTERN.test(segment))) {
      return undefined;
    }
    return { path: segments.join('.'), segments };
  }

  return undefined;
}

/**
 * Extracts every .Values reference from template text
 *
 * Duplicates are kept, in order of appearance.
 *
 * @param text - Template content
 * @param prefixes - Recognized root-namespace prefixes
 * @returns Array of VariableReference objects
 *
 * @example
 * extractValuesReferences('{{ .Values.AppName | quote }}')
 * // => [{ path: 'AppName', segments: ['AppName'] }]
 */
export function extractValuesReferences(
  text: string,
  prefixes: readonly string[] = defaultSettings.valuesPrefixes
): VariableReference[] {
  // longest prefix first, so "$.Values" wins over "$"
  const ordered = [...prefixes].sort((a, b) => b.length - a.length);
  const references: VariableReference[] = [];

  for (const match of text.matchAll(ACTION_PATTERN)) {
    const reference = parseAction(match[1] ?? '', ordered);
    if (reference) {
      references.push(reference);
    }
  }

  return references;
}

/**
 * Collapses duplicate references, keeping first-seen order
 */
export function tallyReferences(references: readonly VariableReference[]): ReferenceTally[] {
  const byPath = new Map<string, ReferenceTally>();

  for (const reference of references) {
    const existing = byPath.get(reference.path);
    if (existing) {
      existing.occurrences++;
    } else {
      byPath.set(reference.path, { ...reference, occurrences: 1 });
    }
  }

  return Array.from(byPath.values());
}

/**
 * Checks if text contains any template action
 *
 * @param text - File content
 * @returns true if at least one {{ }} block is present
 */
export function isHelmTemplateText(text: string): boolean {
  return /\{\{[\s\S]*?\}\}/.test(text);
}

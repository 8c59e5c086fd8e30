/**
 * Values Document Module
 *
 * Converts the loosely typed output of the YAML loader into a closed
 * ValuesNode tree:
 * - mapping: string keys to child nodes
 * - sequence: ordered child nodes
 * - scalar: strings, numbers, booleans, timestamps
 * - null: explicit null or an empty value
 */

import * as yaml from 'js-yaml';

export type ScalarValue = string | number | boolean | bigint | Date;

export type MappingNode = {
  kind: 'mapping';
  entries: ReadonlyMap<string, ValuesNode>;
};

export type ValuesNode =
  | MappingNode
  | { kind: 'sequence'; items: readonly ValuesNode[] }
  | { kind: 'scalar'; value: ScalarValue }
  | { kind: 'null' };

/**
 * A parsed values file. The root is always a mapping.
 */
export type ValuesDocument = MappingNode;

export function emptyValuesDocument(): ValuesDocument {
  return { kind: 'mapping', entries: new Map() };
}

/**
 * Builds a ValuesNode from a value produced by js-yaml
 */
export function toValuesNode(value: unknown): ValuesNode {
  if (value === null || value === undefined) {
    return { kind: 'null' };
  }

  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value.map(toValuesNode) };
  }

  if (value instanceof Date) {
    return { kind: 'scalar', value };
  }

  // !!binary
  if (ArrayBuffer.isView(value)) {
    return { kind: 'scalar', value: '<binary>' };
  }

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'boolean':
    case 'bigint':
      return { kind: 'scalar', value };
    case 'object': {
      const entries = new Map<string, ValuesNode>();
      for (const [key, child] of Object.entries(value)) {
        entries.set(key, toValuesNode(child));
      }
      return { kind: 'mapping', entries };
    }
    default:
      return { kind: 'scalar', value: String(value) };
  }
}

/**
 * Parses values YAML content.
 *
 * Throws js-yaml's YAMLException on malformed input.
 *
 * @returns the document, or undefined when the root is not a mapping
 */
export function parseValuesDocument(content: string): ValuesDocument | undefined {
  const parsed = yaml.load(content);
  if (parsed === null || parsed === undefined) {
    return emptyValuesDocument();
  }

  const node = toValuesNode(parsed);
  return node.kind === 'mapping' ? node : undefined;
}

export function describeNodeKind(node: ValuesNode): string {
  switch (node.kind) {
    case 'mapping':
      return `mapping with ${node.entries.size} key(s)`;
    case 'sequence':
      return `list with ${node.items.length} item(s)`;
    case 'scalar':
      return 'scalar';
    case 'null':
      return 'null';
  }
}

/**
 * Document Node Lookups
 *
 * The parsers in src/storage only ever ask a document for "the string
 * value of attribute X" or "child element Y". This module provides that
 * lookup surface over the plain objects produced by the YAML loader.
 */

/**
 * String-or-absent lookups over one element of a structured document
 */
export interface DocumentNode {
  /** Scalar value of a named attribute, stringified; undefined when absent */
  attr(name: string): string | undefined;
  /** Named child element; undefined when absent or not a mapping */
  child(name: string): DocumentNode | undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Wrap a parsed YAML/JSON mapping as a DocumentNode.
 *
 * Strings, numbers and booleans are reported as attributes, booleans
 * spelled `yes`/`no`; mappings as children. Anything else counts as absent.
 */
export function documentNode(value: Record<string, unknown>): DocumentNode {
  return {
    attr(name: string): string | undefined {
      const field = value[name];
      if (typeof field === 'string') return field;
      if (typeof field === 'number') return String(field);
      if (typeof field === 'boolean') return field ? 'yes' : 'no';
      return undefined;
    },
    child(name: string): DocumentNode | undefined {
      const field = value[name];
      return isRecord(field) ? documentNode(field) : undefined;
    },
  };
}

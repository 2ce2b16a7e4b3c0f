import { type Document, isAlias, isMap, isScalar, isSeq } from 'yaml';
import type { JsonValue, Metadata, StructuredValue } from './types.js';

const MIN_SAFE = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * Convert a node from a parsed YAML document into a StructuredValue.
 * Aliases are followed; an alias that refers back into its own
 * ancestry becomes null.
 */
export function fromYamlNode(node: unknown, doc: Document.Parsed, ancestry: Set<unknown> = new Set()): StructuredValue {
  if (node === null || node === undefined) {
    return { kind: 'null' };
  }

  if (isAlias(node)) {
    const target = node.resolve(doc);
    if (!target || ancestry.has(target)) {
      return { kind: 'null' };
    }
    return fromYamlNode(target, doc, ancestry);
  }

  if (isScalar(node)) {
    const value = node.value;
    switch (typeof value) {
      case 'string':
        return { kind: 'string', value };
      case 'bigint':
        return { kind: 'integer', value };
      case 'number':
        // Ints arrive as bigint, so any number here is a float
        return { kind: 'real', value, text: node.source ?? String(value) };
      case 'boolean':
        return { kind: 'boolean', value };
      default:
        return value === null || value === undefined
          ? { kind: 'null' }
          : { kind: 'string', value: String(value) };
    }
  }

  if (isSeq(node) || isMap(node)) {
    const nested = new Set(ancestry).add(node);

    if (isSeq(node)) {
      return {
        kind: 'sequence',
        items: node.items.map(item => fromYamlNode(item, doc, nested))
      };
    }

    const entries = new Map<string, StructuredValue>();
    for (const pair of node.items) {
      const key = isScalar(pair.key) ? pair.key.value : pair.key;
      // Non-string keys are dropped
      if (typeof key !== 'string' || entries.has(key)) continue;
      entries.set(key, fromYamlNode(pair.value, doc, nested));
    }
    return { kind: 'mapping', entries };
  }

  return { kind: 'null' };
}

/**
 * Build a StructuredValue from a plain JavaScript value.
 * Whole numbers become integers; other numbers become reals.
 */
export function fromPlain(value: unknown): StructuredValue {
  if (value === null || value === undefined) {
    return { kind: 'null' };
  }
  if (typeof value === 'string') {
    return { kind: 'string', value };
  }
  if (typeof value === 'bigint') {
    return { kind: 'integer', value };
  }
  if (typeof value === 'number') {
    return Number.isInteger(value)
      ? { kind: 'integer', value: BigInt(value) }
      : { kind: 'real', value, text: String(value) };
  }
  if (typeof value === 'boolean') {
    return { kind: 'boolean', value };
  }
  if (Array.isArray(value)) {
    return { kind: 'sequence', items: value.map(fromPlain) };
  }
  if (typeof value === 'object') {
    return { kind: 'mapping', entries: entriesToMetadata(Object.entries(value)) };
  }
  return { kind: 'string', value: String(value) };
}

/**
 * Build note metadata from a plain object, keeping its key order.
 */
export function metadataFromPlain(source: Record<string, unknown>): Metadata {
  return entriesToMetadata(Object.entries(source));
}

function entriesToMetadata(pairs: Array<[string, unknown]>): Metadata {
  const entries = new Map<string, StructuredValue>();
  for (const [key, value] of pairs) {
    entries.set(key, fromPlain(value));
  }
  return entries;
}

/**
 * Text of a scalar value, or undefined for sequences, mappings and null.
 */
export function scalarText(value: StructuredValue): string | undefined {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'integer':
      return value.value.toString();
    case 'real':
      return value.text;
    case 'boolean':
      return value.value ? 'true' : 'false';
    case 'sequence':
    case 'mapping':
    case 'null':
      return undefined;
  }
}

/**
 * Render any value as a string. Collections fall back to their JSON form.
 */
export function valueToString(value: StructuredValue): string {
  switch (value.kind) {
    case 'string':
    case 'integer':
    case 'real':
    case 'boolean':
      return scalarText(value) ?? '';
    case 'null':
      return 'null';
    case 'sequence':
    case 'mapping':
      return JSON.stringify(valueToJson(value));
  }
}

/**
 * Substring containment. Sequences match when any element matches;
 * mappings and null never match.
 */
export function valueContains(value: StructuredValue, needle: string, caseSensitive = true): boolean {
  switch (value.kind) {
    case 'string':
    case 'integer':
    case 'real':
    case 'boolean': {
      const text = scalarText(value) ?? '';
      return caseSensitive
        ? text.includes(needle)
        : text.toLowerCase().includes(needle.toLowerCase());
    }
    case 'sequence':
      return value.items.some(item => valueContains(item, needle, caseSensitive));
    case 'mapping':
    case 'null':
      return false;
  }
}

/**
 * Case-insensitive substring containment.
 */
export function valueContainsIgnoreCase(value: StructuredValue, needle: string): boolean {
  return valueContains(value, needle, false);
}

/**
 * Strings a value contributes to a field's value list: the value itself
 * for scalars, the scalar elements for sequences, nothing otherwise.
 */
export function collectValueStrings(value: StructuredValue): string[] {
  switch (value.kind) {
    case 'string':
    case 'integer':
    case 'real':
    case 'boolean':
      return [scalarText(value) ?? ''];
    case 'sequence': {
      const strings: string[] = [];
      for (const item of value.items) {
        const text = scalarText(item);
        if (text !== undefined) strings.push(text);
      }
      return strings;
    }
    case 'mapping':
    case 'null':
      return [];
  }
}

/**
 * Convert to a JSON tree. Integers outside the safe range become
 * decimal strings; non-finite reals become null.
 */
export function valueToJson(value: StructuredValue): JsonValue {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'integer':
      return value.value >= MIN_SAFE && value.value <= MAX_SAFE
        ? Number(value.value)
        : value.value.toString();
    case 'real':
      return Number.isFinite(value.value) ? value.value : null;
    case 'boolean':
      return value.value;
    case 'sequence':
      return value.items.map(valueToJson);
    case 'mapping':
      return metadataToJson(value.entries);
    case 'null':
      return null;
  }
}

export function metadataToJson(metadata: Metadata): { [key: string]: JsonValue } {
  return Object.fromEntries(
    Array.from(metadata, ([key, value]) => [key, valueToJson(value)] as const)
  );
}

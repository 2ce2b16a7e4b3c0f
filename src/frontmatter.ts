import { isMap, parseDocument } from 'yaml';
import type { Metadata, StructuredValue } from './types.js';
import { fromYamlNode } from './value.js';

/**
 * Options for extracting frontmatter
 */
export interface ExtractOptions {
  /** Retry with line repair when the strict parse fails (default: true) */
  lenient?: boolean;
  /** Name used in diagnostics, usually the file path */
  source?: string;
}

/**
 * Result of extracting frontmatter from a document
 */
export interface FrontmatterResult {
  /** Parsed block; undefined when the text has no frontmatter block */
  metadata?: Metadata;
  /** Set when the block failed the strict parse */
  warning?: string;
}

type StrictParse =
  | { ok: true; metadata: Metadata | undefined }
  | { ok: false; error: string };

const DELIMITER = '---';

// Value already quoted or a flow collection: "x", 'x', [a, b], {a: b}
const STRUCTURED_VALUE_START = /^["'[{]/;

const LEADING_WHITESPACE = /^\s*/;

/**
 * Parse a block with the YAML core schema. A root that is neither a
 * mapping nor empty yields `metadata: undefined`.
 */
export function parseStrict(block: string): StrictParse {
  const doc = parseDocument(block, {
    intAsBigInt: true,
    uniqueKeys: true,
    prettyErrors: false
  });

  if (doc.errors.length > 0) {
    return { ok: false, error: doc.errors[0].message };
  }

  if (doc.contents === null) {
    return { ok: true, metadata: new Map() };
  }

  if (!isMap(doc.contents)) {
    return { ok: true, metadata: undefined };
  }

  const root = fromYamlNode(doc.contents, doc);
  return { ok: true, metadata: root.kind === 'mapping' ? root.entries : new Map<string, StructuredValue>() };
}

/**
 * Repair one line: quote a plain scalar value that contains a colon.
 */
function repairLine(line: string): string {
  const trimmed = line.trim();
  if (trimmed === '' || trimmed.startsWith('#')) {
    return line;
  }

  const colon = line.indexOf(':');
  if (colon === -1) {
    return line;
  }

  const keyPart = line.slice(0, colon);
  const valuePart = line.slice(colon + 1).trim();

  if (valuePart === '' || STRUCTURED_VALUE_START.test(valuePart)) {
    return line;
  }

  if (!valuePart.includes(':')) {
    return line;
  }

  const indent = LEADING_WHITESPACE.exec(line)?.[0] ?? '';
  // Inner quotes are left as they are
  return `${indent}${keyPart.trim()}: "${valuePart}"`;
}

/**
 * Quote unquoted scalar values that contain a colon, line by line.
 * Applying it to its own output changes nothing.
 */
export function repairFrontmatter(block: string): string {
  return block.split('\n').map(repairLine).join('\n');
}

/**
 * Locate the frontmatter block at the top of a document and return its
 * raw content, or undefined when there is no complete block.
 */
export function findFrontmatterBlock(text: string): string | undefined {
  const content = text.trim();
  if (!content.startsWith(DELIMITER)) {
    return undefined;
  }

  const lines = content.split(/\r?\n/);
  if (lines.length < 3) {
    return undefined;
  }

  const end = lines.findIndex((line, i) => i > 0 && line.trim() === DELIMITER);
  if (end === -1) {
    return undefined;
  }

  return lines.slice(1, end).join('\n');
}

/**
 * Extract and parse the frontmatter of a document.
 * Parse failures never throw; they yield empty metadata and a warning.
 */
export function extractFrontmatter(text: string, options: ExtractOptions = {}): FrontmatterResult {
  const { lenient = true, source = '<input>' } = options;

  const block = findFrontmatterBlock(text);
  if (block === undefined) {
    return {};
  }

  if (block.trim() === '') {
    return { metadata: new Map() };
  }

  const strict = parseStrict(block);
  if (strict.ok) {
    return strict.metadata ? { metadata: strict.metadata } : {};
  }

  if (!lenient) {
    return {
      metadata: new Map(),
      warning: `Failed to parse frontmatter in file ${source}: ${strict.error}`
    };
  }

  const retry = parseStrict(repairFrontmatter(block));
  if (retry.ok) {
    return {
      metadata: retry.metadata ?? new Map(),
      warning: `Used lenient parsing for frontmatter in file ${source} due to: ${strict.error}`
    };
  }

  return {
    metadata: new Map(),
    warning: `Failed to parse frontmatter in file ${source} (lenient parsing also failed): ${retry.error}`
  };
}

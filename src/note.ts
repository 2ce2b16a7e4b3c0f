import * as path from 'node:path';
import type { JsonValue, Metadata, Note, StructuredValue } from './types.js';
import { metadataToJson, valueContains } from './value.js';

/**
 * Create a note. The title comes from a string `title` field, falling
 * back to the file-name stem of the path.
 */
export function createNote(notePath: string, metadata: Metadata = new Map()): Note {
  const titleValue = metadata.get('title');
  const stem = path.parse(notePath).name;
  const title = titleValue?.kind === 'string' ? titleValue.value : stem || undefined;

  return Object.freeze({ path: notePath, metadata, title });
}

/**
 * Exact-key lookup.
 */
export function getValue(note: Note, key: string): StructuredValue | undefined {
  return note.metadata.get(key);
}

/**
 * Key of `note` that a case-insensitive lookup of `key` resolves to.
 * An exact match wins; otherwise the lexicographically smallest key
 * equal to `key` ignoring case.
 */
export function resolveKeyIgnoreCase(note: Note, key: string): string | undefined {
  if (note.metadata.has(key)) {
    return key;
  }

  const wanted = key.toLowerCase();
  let resolved: string | undefined;
  for (const candidate of note.metadata.keys()) {
    if (candidate.toLowerCase() === wanted && (resolved === undefined || candidate < resolved)) {
      resolved = candidate;
    }
  }
  return resolved;
}

/**
 * Case-insensitive key lookup.
 */
export function getValueIgnoreCase(note: Note, key: string): StructuredValue | undefined {
  const resolved = resolveKeyIgnoreCase(note, key);
  return resolved === undefined ? undefined : note.metadata.get(resolved);
}

/**
 * Whether the value at `key` contains `substring`. Both the key lookup
 * and the containment test follow `caseSensitive`.
 */
export function matchesFilter(note: Note, key: string, substring: string, caseSensitive = true): boolean {
  const value = caseSensitive ? getValue(note, key) : getValueIgnoreCase(note, key);
  if (!value) {
    return false;
  }
  return valueContains(value, substring, caseSensitive);
}

/**
 * JSON form of a note for serialization.
 */
export function noteToJson(note: Note): { path: string; title: string | null; frontmatter: { [key: string]: JsonValue } } {
  return {
    path: note.path,
    title: note.title ?? null,
    frontmatter: metadataToJson(note.metadata)
  };
}

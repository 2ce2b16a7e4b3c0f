import type { FieldStatistics, Note, QueryPredicate, StructuredValue } from './types.js';
import { getValue, matchesFilter } from './note.js';
import { collectValueStrings, scalarText, valueToString } from './value.js';

/**
 * Options for building a query predicate
 */
export interface PredicateOptions {
  /** Match keys and values exactly (default: true) */
  caseSensitive?: boolean;
}

/**
 * Case-insensitive field values, with the key spelling that matched
 */
export interface FieldValuesResult {
  values: string[];
  /** First key variant met, or the requested field when none matched */
  matchedField: string;
}

export function createPredicate(
  filters: Iterable<readonly [string, string]> = [],
  options: PredicateOptions = {}
): QueryPredicate {
  const { caseSensitive = true } = options;
  return {
    filters: Array.from(filters, ([key, substring]) => [key, substring] as const),
    caseSensitive
  };
}

/**
 * Parse a `key=value` filter, splitting at the first `=`.
 * Returns undefined when there is no `=`.
 */
export function parseFilter(text: string): [string, string] | undefined {
  const eq = text.indexOf('=');
  if (eq === -1) {
    return undefined;
  }
  return [text.slice(0, eq), text.slice(eq + 1)];
}

/**
 * Notes matching every filter of the predicate, in input order.
 */
export function applyPredicate(predicate: QueryPredicate, notes: readonly Note[]): Note[] {
  if (predicate.filters.length === 0) {
    return notes.slice();
  }

  return notes.filter(note =>
    predicate.filters.every(([key, substring]) =>
      matchesFilter(note, key, substring, predicate.caseSensitive)
    )
  );
}

/**
 * All frontmatter keys across the notes, sorted.
 */
export function collectFields(notes: readonly Note[]): string[] {
  const fields = new Set<string>();
  for (const note of notes) {
    for (const key of note.metadata.keys()) {
      fields.add(key);
    }
  }
  return Array.from(fields).sort();
}

/**
 * Distinct values of `field` (exact key), sorted.
 */
export function collectFieldValues(notes: readonly Note[], field: string): string[] {
  const values = new Set<string>();
  for (const note of notes) {
    const value = getValue(note, field);
    if (value) {
      collectValueStrings(value).forEach(v => values.add(v));
    }
  }
  return Array.from(values).sort();
}

/**
 * Distinct values of every key equal to `field` ignoring case, sorted.
 */
export function collectFieldValuesIgnoreCase(notes: readonly Note[], field: string): FieldValuesResult {
  const wanted = field.toLowerCase();
  const values = new Set<string>();
  let matchedField: string | undefined;

  for (const note of notes) {
    for (const [key, value] of note.metadata) {
      if (key.toLowerCase() !== wanted) continue;
      matchedField ??= key;
      collectValueStrings(value).forEach(v => values.add(v));
    }
  }

  return { values: Array.from(values).sort(), matchedField: matchedField ?? field };
}

/**
 * Strings a field value contributes to statistics: one per scalar, one
 * per sequence element. Non-scalar values use their JSON rendering.
 */
function statisticEntries(value: StructuredValue): string[] {
  if (value.kind === 'sequence') {
    return value.items.map(item => scalarText(item) ?? valueToString(item));
  }
  return [scalarText(value) ?? valueToString(value)];
}

/**
 * Per-field occurrence counts in one pass over the notes.
 */
export function fieldStatistics(notes: readonly Note[]): Map<string, FieldStatistics> {
  const stats = new Map<string, FieldStatistics>();

  for (const note of notes) {
    for (const [key, value] of note.metadata) {
      let fieldStats = stats.get(key);
      if (!fieldStats) {
        fieldStats = { totalCount: 0, uniqueValues: new Set(), valueCounts: new Map() };
        stats.set(key, fieldStats);
      }

      for (const entry of statisticEntries(value)) {
        fieldStats.totalCount++;
        fieldStats.uniqueValues.add(entry);
        fieldStats.valueCounts.set(entry, (fieldStats.valueCounts.get(entry) ?? 0) + 1);
      }
    }
  }

  return stats;
}

import type { FieldStatistics, Note } from './types.js';
import { noteToJson } from './note.js';
import { collectFieldValues, collectFieldValuesIgnoreCase, collectFields, fieldStatistics } from './query.js';

export const OUTPUT_FORMATS = ['table', 'paths', 'json'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

const MAX_PATH_WIDTH = 50;
const MAX_TITLE_WIDTH = 30;
const MIN_COLUMN_WIDTH = 10;
const NO_MATCHES = 'No notes match the specified criteria.';

export function isOutputFormat(value: string): value is OutputFormat {
  return (OUTPUT_FORMATS as readonly string[]).includes(value);
}

function maxLength(items: readonly string[], floor = 0): number {
  return items.reduce((max, item) => Math.max(max, item.length), floor);
}

function truncateStart(text: string, width: number): string {
  return text.length > width ? `...${text.slice(text.length - width + 3)}` : text;
}

function truncateEnd(text: string, width: number): string {
  return text.length > width ? `${text.slice(0, width - 3)}...` : text;
}

/**
 * Up to three frontmatter keys, then a count of the rest
 */
function keySummary(note: Note): string {
  const keys = Array.from(note.metadata.keys());
  if (keys.length === 0) return '-';
  if (keys.length <= 3) return keys.join(', ');
  return `${keys.slice(0, 3).join(', ')}, ... (+${keys.length - 3})`;
}

function formatTable(notes: readonly Note[]): string[] {
  if (notes.length === 0) {
    return [NO_MATCHES];
  }

  const pathWidth = Math.min(maxLength(notes.map(n => n.path)), MAX_PATH_WIDTH);
  const titleWidth = Math.min(maxLength(notes.map(n => n.title ?? '')), MAX_TITLE_WIDTH);

  const lines = [
    `Found ${notes.length} matching notes:`,
    '',
    `${'Path'.padEnd(pathWidth)} ${'Title'.padEnd(titleWidth)} Frontmatter`,
    '-'.repeat(pathWidth + titleWidth + 20)
  ];

  for (const note of notes) {
    const notePath = truncateStart(note.path, pathWidth);
    const title = note.title ? truncateEnd(note.title, titleWidth) : '-';
    lines.push(`${notePath.padEnd(pathWidth)} ${title.padEnd(titleWidth)} ${keySummary(note)}`);
  }

  return lines;
}

/**
 * Render notes as a table, one path per line, or pretty JSON.
 */
export function formatNotes(notes: readonly Note[], format: OutputFormat = 'table'): string[] {
  switch (format) {
    case 'table':
      return formatTable(notes);
    case 'paths':
      return notes.length === 0 ? [NO_MATCHES] : notes.map(n => n.path);
    case 'json':
      return [JSON.stringify(notes.map(noteToJson), null, 2)];
  }
}

/**
 * Table of every field with its occurrence and distinct value counts.
 */
export function formatFields(notes: readonly Note[]): string[] {
  const fields = collectFields(notes);
  if (fields.length === 0) {
    return ['No frontmatter fields found in any notes.'];
  }

  const stats = fieldStatistics(notes);
  const fieldWidth = maxLength(fields, MIN_COLUMN_WIDTH);

  const lines = [
    'Available frontmatter fields:',
    '',
    `${'Field'.padEnd(fieldWidth)} ${'Count'.padStart(8)} ${'Values'.padStart(8)}`,
    '-'.repeat(fieldWidth + 18)
  ];

  for (const field of fields) {
    const fieldStats = stats.get(field);
    const count = fieldStats?.totalCount ?? 0;
    const distinct = fieldStats?.uniqueValues.size ?? 0;
    lines.push(`${field.padEnd(fieldWidth)} ${String(count).padStart(8)} ${String(distinct).padStart(8)}`);
  }

  lines.push('', `Total: ${fields.length} unique fields across ${notes.length} notes`);
  return lines;
}

/**
 * Counts for `field`, merging every key spelling when case-insensitive.
 */
export function mergedFieldStatistics(notes: readonly Note[], field: string, caseSensitive: boolean): FieldStatistics | undefined {
  const stats = fieldStatistics(notes);
  if (caseSensitive) {
    return stats.get(field);
  }

  const wanted = field.toLowerCase();
  let merged: FieldStatistics | undefined;
  for (const [key, fieldStats] of stats) {
    if (key.toLowerCase() !== wanted) continue;
    merged ??= { totalCount: 0, uniqueValues: new Set(), valueCounts: new Map() };
    merged.totalCount += fieldStats.totalCount;
    for (const [value, count] of fieldStats.valueCounts) {
      merged.uniqueValues.add(value);
      merged.valueCounts.set(value, (merged.valueCounts.get(value) ?? 0) + count);
    }
  }
  return merged;
}

/**
 * Value/count pairs, most frequent first, ties by value.
 */
export function rankValues(stats: FieldStatistics): Array<[string, number]> {
  return Array.from(stats.valueCounts).sort((a, b) => b[1] - a[1] || (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));
}

/**
 * Listed values of a field with their counts
 */
export interface FieldValueCounts {
  values: string[];
  matchedField: string;
  /** Listed values, most frequent first */
  counts: Array<[string, number]>;
  /** Sum of the listed counts */
  occurrences: number;
}

/**
 * Values of `field` ranked by count. Only values that appear in the
 * value listing are counted, so null and collection entries are left out.
 */
export function fieldValueCounts(notes: readonly Note[], field: string, caseSensitive = true): FieldValueCounts {
  const { values, matchedField } = caseSensitive
    ? { values: collectFieldValues(notes, field), matchedField: field }
    : collectFieldValuesIgnoreCase(notes, field);

  const listed = new Set(values);
  const stats = mergedFieldStatistics(notes, field, caseSensitive);
  const counts = stats ? rankValues(stats).filter(([value]) => listed.has(value)) : [];
  const occurrences = counts.reduce((sum, [, count]) => sum + count, 0);

  return { values, matchedField, counts, occurrences };
}

/**
 * Table of the values of one field with their counts.
 */
export function formatFieldValues(notes: readonly Note[], field: string, caseSensitive = true): string[] {
  const { values, matchedField, counts, occurrences } = fieldValueCounts(notes, field, caseSensitive);

  if (values.length === 0) {
    return [caseSensitive
      ? `No values found for field '${field}'.`
      : `No values found for field '${field}' (case-insensitive search).`];
  }

  const displayField = caseSensitive ? field : `${field} (matched: ${matchedField})`;
  const valueWidth = maxLength(values, MIN_COLUMN_WIDTH);
  const lines = [
    `Values for field '${displayField}':`,
    '',
    `${'Value'.padEnd(valueWidth)} ${'Count'.padStart(8)}`,
    '-'.repeat(valueWidth + 10)
  ];

  for (const [value, count] of counts) {
    lines.push(`${value.padEnd(valueWidth)} ${String(count).padStart(8)}`);
  }

  lines.push('', `Total: ${values.length} unique values, ${occurrences} total occurrences`);
  return lines;
}

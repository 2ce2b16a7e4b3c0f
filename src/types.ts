/**
 * A value parsed from a frontmatter block.
 * Closed union: every consumer switches on `kind`.
 */
export type StructuredValue =
  | { kind: 'string'; value: string }
  | { kind: 'integer'; value: bigint }
  | {
      kind: 'real';
      value: number;
      /** Source text the number was read from (e.g. "1.50", ".inf") */
      text: string;
    }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'sequence'; items: readonly StructuredValue[] }
  | { kind: 'mapping'; entries: Metadata }
  | { kind: 'null' };

export type StructuredKind = StructuredValue['kind'];

/**
 * String-keyed metadata, in the order keys appear in the source block.
 */
export type Metadata = ReadonlyMap<string, StructuredValue>;

/**
 * A markdown note with its parsed frontmatter.
 */
export interface Note {
  /** Path the note was read from */
  readonly path: string;

  /** Parsed frontmatter (empty when absent or unparseable) */
  readonly metadata: Metadata;

  /** Frontmatter `title`, else the file-name stem */
  readonly title?: string;
}

/**
 * Result of reading and parsing one note.
 */
export interface ParseOutcome {
  note?: Note;

  /** Parse diagnostic, present when strict parsing failed */
  warning?: string;
}

/**
 * A conjunction of key/substring constraints.
 */
export interface QueryPredicate {
  readonly filters: ReadonlyArray<readonly [key: string, substring: string]>;
  readonly caseSensitive: boolean;
}

/**
 * Occurrence counts for one frontmatter field.
 */
export interface FieldStatistics {
  totalCount: number;
  uniqueValues: Set<string>;
  valueCounts: Map<string, number>;
}

export type Severity = 'critical' | 'warning' | 'info';

export type WarningCategory =
  | 'Frontmatter parsing errors'
  | 'File parsing errors'
  | 'File read errors'
  | 'Other errors';

/**
 * One anomaly recorded during a scan.
 */
export interface DiagnosticEvent {
  severity: Severity;
  message: string;
  path?: string;

  /** Summary bucket; unset for info and for repair warnings */
  category?: WarningCategory;
}

/**
 * JSON tree produced for serialization.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

import fs from 'fs-extra';
import type { Dirent } from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Note, ParseOutcome } from './types.js';
import { Diagnostics, type DiagnosticsOptions } from './diagnostics.js';
import { extractFrontmatter } from './frontmatter.js';
import { createNote } from './note.js';

/**
 * Thrown when the vault root is missing or not a directory.
 */
export class VaultError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'VaultError';
  }
}

/**
 * Options for discovering note files
 */
export interface FindOptions {
  /** Extensions to include, with leading dot (default: ['.md']) */
  extensions?: string[];
  /** Descend into and include entries starting with "." (default: false) */
  includeHidden?: boolean;
  /** Called for a directory below the root that cannot be listed; it is skipped */
  onUnreadable?: (dir: string, err: unknown) => void;
}

/**
 * Options for a scan
 */
export interface ScanOptions extends DiagnosticsOptions, FindOptions {
  /** Repair colon-in-value frontmatter (default: true) */
  lenient?: boolean;
  /** Notes read and parsed at once (default: available CPUs) */
  concurrency?: number;
  /** Collector to record into; one is created when absent */
  diagnostics?: Diagnostics;
}

/**
 * Result of a scan
 */
export interface ScanResult {
  /** Parsed notes, in completion order */
  notes: Note[];
  /** Number of candidate files */
  total: number;
  /** Summary lines */
  summary: string[];
  diagnostics: Diagnostics;
}

/**
 * Check that the vault root exists and is a directory.
 * Returns the resolved path.
 */
export async function openVault(root: string): Promise<string> {
  const resolved = path.resolve(root);

  if (!(await fs.pathExists(resolved))) {
    throw new VaultError(`Vault path does not exist: ${resolved}`);
  }

  const stat = await fs.stat(resolved);
  if (!stat.isDirectory()) {
    throw new VaultError(`Vault path is not a directory: ${resolved}`);
  }

  return resolved;
}

/**
 * Find note files under a directory, recursively. Hidden entries are
 * skipped (and not descended into) unless asked for. Sorted by path.
 */
export async function findNoteFiles(root: string, options: FindOptions = {}): Promise<string[]> {
  const { extensions = ['.md'], includeHidden = false, onUnreadable } = options;
  const files: string[] = [];

  async function walk(dir: string): Promise<void> {
    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      // Only the root is fatal
      if (dir === root) throw err;
      onUnreadable?.(dir, err);
      return;
    }

    for (const entry of entries) {
      if (!includeHidden && entry.name.startsWith('.')) continue;

      const fullPath = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        await walk(fullPath);
      } else if (entry.isFile() && extensions.includes(path.extname(entry.name))) {
        files.push(fullPath);
      }
    }
  }

  await walk(root);
  return files.sort();
}

/**
 * Read a note and parse its frontmatter.
 * Read failures throw; parse failures come back as a warning.
 */
export async function readNote(notePath: string, options: { lenient?: boolean } = {}): Promise<ParseOutcome> {
  const text = await fs.readFile(notePath, 'utf-8');
  const { metadata, warning } = extractFrontmatter(text, {
    lenient: options.lenient ?? true,
    source: notePath
  });

  return { note: createNote(notePath, metadata), warning };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Read and parse candidate files with a fixed number of lanes pulling
 * from a shared queue. A failed read drops that file; a parse warning
 * keeps the note. The summary is taken once every lane has finished.
 */
export async function scanNotes(candidates: readonly string[], options: ScanOptions = {}): Promise<ScanResult> {
  const {
    lenient = true,
    concurrency = os.availableParallelism(),
    diagnostics = new Diagnostics(options)
  } = options;

  const notes: Note[] = [];
  let next = 0;

  async function lane(): Promise<void> {
    while (next < candidates.length) {
      const candidate = candidates[next++];
      let outcome: ParseOutcome;
      try {
        outcome = await readNote(candidate, { lenient });
      } catch (err) {
        diagnostics.critical(`Failed to read file: ${errorMessage(err)}`, candidate);
        continue;
      }

      if (outcome.warning) {
        diagnostics.warning(outcome.warning, candidate);
      }
      if (outcome.note) {
        notes.push(outcome.note);
      }
    }
  }

  const lanes = Number.isInteger(concurrency) && concurrency > 0 ? concurrency : 1;
  const laneCount = Math.max(1, Math.min(lanes, candidates.length));
  await Promise.all(Array.from({ length: laneCount }, () => lane()));

  const summary = diagnostics.summary(candidates.length, notes.length);
  return { notes, total: candidates.length, summary, diagnostics };
}

/**
 * Open a vault, find its notes and scan them.
 */
export async function scanVault(root: string, options: ScanOptions = {}): Promise<ScanResult> {
  const vaultPath = await openVault(root);
  const diagnostics = options.diagnostics ?? new Diagnostics(options);

  diagnostics.info(`Scanning vault: ${vaultPath}`);
  const candidates = await findNoteFiles(vaultPath, {
    ...options,
    onUnreadable: (dir, err) => {
      diagnostics.warning(`Failed to read directory: ${errorMessage(err)}`, dir);
      options.onUnreadable?.(dir, err);
    }
  });
  diagnostics.info(`Found ${candidates.length} markdown files`);

  return scanNotes(candidates, { ...options, diagnostics });
}

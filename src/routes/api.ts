import { Router, type Request, type Response } from 'express';
import type { Note } from '../types.js';
import { noteToJson } from '../note.js';
import { fieldValueCounts } from '../output.js';
import {
  applyPredicate,
  collectFields,
  createPredicate,
  fieldStatistics,
  parseFilter
} from '../query.js';

/**
 * Read a query parameter that may be given once or repeated
 */
function queryList(value: unknown): string[] {
  if (typeof value === 'string') return [value];
  if (Array.isArray(value)) return value.filter((v): v is string => typeof v === 'string');
  return [];
}

function isTrue(value: unknown): boolean {
  return value === 'true' || value === '1';
}

/**
 * Notes selected by ?filter=key=value (repeatable) and ?ignoreCase=true.
 * Responds 400 and returns undefined on a malformed filter.
 */
function selectNotes(notes: readonly Note[], req: Request, res: Response): Note[] | undefined {
  const filters: Array<[string, string]> = [];

  for (const raw of queryList(req.query.filter)) {
    const filter = parseFilter(raw);
    if (!filter) {
      res.status(400).json({ error: `Invalid filter format: '${raw}'. Use field=value` });
      return undefined;
    }
    filters.push(filter);
  }

  const predicate = createPredicate(filters, { caseSensitive: !isTrue(req.query.ignoreCase) });
  return applyPredicate(predicate, notes);
}

/**
 * Create API routes for querying scanned notes
 */
export function createApiRoutes(notes: readonly Note[]): Router {
  const router = Router();

  /**
   * GET /api/notes
   * Notes matching every filter
   * Query params: ?filter=status=active&filter=tags=work&ignoreCase=true&limit=10
   */
  router.get('/notes', (req: Request, res: Response) => {
    let selected = selectNotes(notes, req, res);
    if (!selected) return;

    const { limit } = req.query;
    if (limit && typeof limit === 'string') {
      const n = parseInt(limit, 10);
      if (!isNaN(n) && n > 0) {
        selected = selected.slice(0, n);
      }
    }

    res.json(selected.map(noteToJson));
  });

  /**
   * GET /api/fields
   * Every frontmatter field with occurrence and distinct value counts
   */
  router.get('/fields', (req: Request, res: Response) => {
    const selected = selectNotes(notes, req, res);
    if (!selected) return;

    const stats = fieldStatistics(selected);
    const result = collectFields(selected).map(field => ({
      field,
      count: stats.get(field)?.totalCount ?? 0,
      values: stats.get(field)?.uniqueValues.size ?? 0
    }));

    res.json(result);
  });

  /**
   * GET /api/values/:field
   * Values of one field, most frequent first
   * Query params: ?ignoreCase=true merges every spelling of the key
   */
  router.get('/values/:field', (req: Request, res: Response) => {
    const selected = selectNotes(notes, req, res);
    if (!selected) return;

    const { field } = req.params;
    const { matchedField, counts, occurrences } = fieldValueCounts(selected, field, !isTrue(req.query.ignoreCase));

    res.json({
      field,
      matchedField,
      total: occurrences,
      values: counts.map(([value, count]) => ({ value, count }))
    });
  });

  return router;
}

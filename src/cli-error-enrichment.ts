/**
 * CLI Error Enrichment
 * Functions for extracting source snippets and suggesting similar names
 */

import type { MuffasaError, SourceLocation } from './types.js';

// ============================================================
// TYPES
// ============================================================

export interface SourceSnippet {
  readonly lines: SnippetLine[];
  readonly location: SourceLocation;
}

export interface SnippetLine {
  readonly lineNumber: number;
  readonly content: string;
  readonly isErrorLine: boolean;
}

export interface EnrichedError {
  readonly message: string;
  readonly sourceSnippet?: SourceSnippet | undefined;
  readonly suggestions?: string[] | undefined;
}

// ============================================================
// SNIPPETS
// ============================================================

/**
 * Extract source lines around an error location.
 *
 * @param contextLines - Number of context lines before/after (default: 1)
 * @throws {RangeError} When the location lies outside the source
 */
export function extractSnippet(
  source: string,
  location: SourceLocation,
  contextLines: number = 1
): SourceSnippet {
  const lines = source.split('\n');
  const totalLines = lines.length;

  if (location.line < 1 || location.line > totalLines) {
    throw new RangeError('Location exceeds source bounds');
  }

  const firstLine = Math.max(1, location.line - contextLines);
  const lastLine = Math.min(totalLines, location.line + contextLines);

  const snippetLines: SnippetLine[] = [];
  for (let lineNum = firstLine; lineNum <= lastLine; lineNum++) {
    snippetLines.push({
      lineNumber: lineNum,
      content: lines[lineNum - 1] ?? '', // Convert 1-based to 0-based index
      isErrorLine: lineNum === location.line,
    });
  }

  return { lines: snippetLines, location };
}

/**
 * Render a snippet with a gutter and a caret under the error column.
 *
 * @example
 * ```
 *   1 | x = 1~
 * > 2 | y = q~
 *     |     ^
 * ```
 */
export function formatSnippet(snippet: SourceSnippet): string {
  const width = String(
    snippet.lines[snippet.lines.length - 1]?.lineNumber ?? 0
  ).length;
  const out: string[] = [];

  for (const line of snippet.lines) {
    const marker = line.isErrorLine ? '>' : ' ';
    const number = String(line.lineNumber).padStart(width);
    out.push(`${marker} ${number} | ${line.content}`);
    if (line.isErrorLine) {
      const pad = ' '.repeat(Math.max(0, snippet.location.column - 1));
      out.push(`  ${' '.repeat(width)} | ${pad}^`);
    }
  }

  return out.join('\n');
}

// ============================================================
// SUGGESTIONS
// ============================================================

/**
 * Find similar names using fuzzy matching.
 *
 * Constraints:
 * - Edit distance threshold: <= 2
 * - Max suggestions: 3
 * - Sort: ascending by distance, then alphabetically
 */
export function suggestSimilarNames(
  target: string,
  candidates: string[]
): string[] {
  if (target === '' || candidates.length === 0) {
    return [];
  }

  const candidatesWithDistance = candidates
    .filter((candidate) => candidate !== target)
    .map((candidate) => ({
      name: candidate,
      distance: levenshteinDistance(target, candidate),
    }))
    .filter((item) => item.distance <= 2);

  candidatesWithDistance.sort((a, b) => {
    if (a.distance !== b.distance) {
      return a.distance - b.distance;
    }
    return a.name.localeCompare(b.name);
  });

  return candidatesWithDistance.slice(0, 3).map((item) => item.name);
}

/**
 * Levenshtein distance with a two-row table.
 */
function levenshteinDistance(a: string, b: string): number {
  if (a.length > b.length) {
    [a, b] = [b, a];
  }

  const m = a.length;
  const n = b.length;

  if (m === 0) return n;

  let prevRow = Array.from({ length: m + 1 }, (_, i) => i);
  let currRow = new Array<number>(m + 1).fill(0);

  for (let j = 1; j <= n; j++) {
    currRow[0] = j;

    for (let i = 1; i <= m; i++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      currRow[i] = Math.min(
        (prevRow[i] ?? 0) + 1, // deletion
        (currRow[i - 1] ?? 0) + 1, // insertion
        (prevRow[i - 1] ?? 0) + cost // substitution
      );
    }

    [prevRow, currRow] = [currRow, prevRow];
  }

  return prevRow[m] ?? 0;
}

// ============================================================
// ENRICHMENT
// ============================================================

/**
 * Attach a source snippet and, for undefined names, close matches from
 * the names in scope.
 */
export function enrichError(
  error: MuffasaError,
  source: string,
  names: string[] = []
): EnrichedError {
  let sourceSnippet: SourceSnippet | undefined;
  if (error.location && source !== '') {
    try {
      sourceSnippet = extractSnippet(source, error.location);
    } catch (err) {
      if (!(err instanceof RangeError)) throw err;
      sourceSnippet = undefined;
    }
  }

  let suggestions: string[] | undefined;
  const undefinedName = error.context?.['name'];
  if (error.code === 'UndefinedVariable' && typeof undefinedName === 'string') {
    const similarNames = suggestSimilarNames(undefinedName, names);
    if (similarNames.length > 0) {
      suggestions = similarNames;
    }
  }

  return {
    message: error.toData().message,
    sourceSnippet,
    suggestions,
  };
}

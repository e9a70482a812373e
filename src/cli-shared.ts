/**
 * CLI Shared Utilities
 * Common formatting functions for the CLI
 */

import { enrichError, formatSnippet } from './cli-error-enrichment.js';
import { inspectValue, type MuffasaValue } from './runtime/index.js';
import { MuffasaError, type ProgramNode, type Token } from './types.js';

/**
 * Convert a value to its textual form for dumps
 */
export function formatOutput(value: MuffasaValue): string {
  return inspectValue(value);
}

/**
 * One `name = value` line per global binding, in binding order
 */
export function formatVariables(
  variables: Record<string, MuffasaValue>
): string {
  return Object.entries(variables)
    .map(([name, value]) => `${name} = ${formatOutput(value)}`)
    .join('\n');
}

/**
 * One line per token: `line:column TYPE "lexeme"`
 */
export function formatTokens(tokens: Token[]): string {
  return tokens
    .map(
      (token) =>
        `${token.span.start.line}:${token.span.start.column} ${token.type} ${JSON.stringify(token.value)}`
    )
    .join('\n');
}

/**
 * AST as indented JSON, without source spans
 */
export function formatAst(ast: ProgramNode): string {
  return JSON.stringify(
    ast,
    (key, value: unknown) => (key === 'span' ? undefined : value),
    2
  );
}

/**
 * Format error for stderr output
 *
 * Muffasa errors render as `<Stage>[<code>] at line L, column C: <message>`.
 * When the source is given, a snippet and name suggestions follow.
 *
 * @param err - The error to format
 * @param source - Program text, for the snippet
 * @param names - Names in scope, for suggestions
 */
export function formatError(
  err: Error,
  source?: string,
  names?: string[]
): string {
  if (err instanceof MuffasaError) {
    const data = err.toData();
    const where = data.location
      ? ` at line ${data.location.line}, column ${data.location.column}`
      : '';
    const headline = `${data.stage}[${data.code}]${where}: ${data.message}`;
    if (source === undefined) return headline;

    const enriched = enrichError(err, source, names);
    const parts = [headline];
    if (enriched.sourceSnippet) {
      parts.push(formatSnippet(enriched.sourceSnippet));
    }
    if (enriched.suggestions) {
      parts.push(`Did you mean: ${enriched.suggestions.join(', ')}?`);
    }
    return parts.join('\n');
  }

  // Handle file not found errors (ENOENT)
  if ('code' in err && err.code === 'ENOENT' && 'path' in err) {
    return `File not found: ${String(err.path)}`;
  }

  return err.message;
}

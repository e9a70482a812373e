/**
 * Comment Detection
 *
 * The language has no comment syntax of its own. A string literal that
 * stands alone as a statement is a comment: it starts a statement and is not
 * followed by an operator or a method call. The statement terminator after
 * it, if any, belongs to the comment.
 */

import type { Token } from '../types.js';
import { TOKEN_TYPES } from '../types.js';

function startsStatement(previous: Token | undefined): boolean {
  if (!previous) return true;
  if (
    previous.type === TOKEN_TYPES.STATEMENT_END ||
    previous.type === TOKEN_TYPES.COMMENT
  ) {
    return true;
  }
  return (
    previous.type === TOKEN_TYPES.PUNCTUATION &&
    (previous.value === '{' || previous.value === '}')
  );
}

function continuesExpression(next: Token | undefined): boolean {
  if (!next) return false;
  if (next.type === TOKEN_TYPES.OPERATOR) return true;
  return next.type === TOKEN_TYPES.PUNCTUATION && next.value === '.';
}

/**
 * Retype comment strings as COMMENT tokens and drop the terminators they absorb.
 */
export function markComments(tokens: readonly Token[]): Token[] {
  const result: Token[] = [];
  let absorbTerminator = false;

  tokens.forEach((token, index) => {
    if (absorbTerminator) {
      absorbTerminator = false;
      if (token.type === TOKEN_TYPES.STATEMENT_END) return;
    }

    if (
      token.type === TOKEN_TYPES.STRING &&
      startsStatement(result[result.length - 1]) &&
      !continuesExpression(tokens[index + 1])
    ) {
      result.push({ ...token, type: TOKEN_TYPES.COMMENT });
      absorbTerminator = true;
      return;
    }

    result.push(token);
  });

  return result;
}

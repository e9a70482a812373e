/**
 * Lexer Errors
 */

import { MuffasaError } from '../types.js';
import type { LexicalErrorCode, SourceLocation } from '../types.js';

export class LexicalError extends MuffasaError {
  // Override to make location required (lexical errors always have location)
  override readonly location: SourceLocation;
  /** The character that could not be tokenized */
  readonly character: string;

  constructor(
    code: LexicalErrorCode,
    message: string,
    location: SourceLocation,
    character: string
  ) {
    super({
      stage: 'LexicalError',
      code,
      message,
      location,
      context: { character },
    });

    this.name = 'LexicalError';
    this.location = location;
    this.character = character;
  }
}

/**
 * Muffasa AST Types
 * Source locations, the error hierarchy, tokens and AST nodes
 */

// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

// ============================================================
// ERROR HIERARCHY
// ============================================================

/** Pipeline stage that raised an error */
export type ErrorStage = 'LexicalError' | 'SyntaxError' | 'RuntimeError';

/** Error codes for programmatic handling */
export const LEXICAL_ERROR_CODES = {
  UNEXPECTED_CHARACTER: 'UnexpectedCharacter',
  UNTERMINATED_STRING: 'UnterminatedString',
} as const;

export const SYNTAX_ERROR_CODES = {
  UNEXPECTED_TOKEN: 'UnexpectedToken',
  MISPLACED_CONTROL: 'MisplacedControl',
} as const;

export const RUNTIME_ERROR_CODES = {
  UNDEFINED_VARIABLE: 'UndefinedVariable',
  TYPE_MISMATCH: 'TypeMismatch',
  DIVISION_BY_ZERO: 'DivisionByZero',
  INDEX_OUT_OF_BOUNDS: 'IndexOutOfBounds',
  NO_SUCH_METHOD: 'NoSuchMethod',
  DOMAIN_ERROR: 'DomainError',
  INVALID_ARGUMENT: 'InvalidArgument',
} as const;

export type LexicalErrorCode =
  (typeof LEXICAL_ERROR_CODES)[keyof typeof LEXICAL_ERROR_CODES];
export type SyntaxErrorCode =
  (typeof SYNTAX_ERROR_CODES)[keyof typeof SYNTAX_ERROR_CODES];
export type RuntimeErrorCode =
  (typeof RUNTIME_ERROR_CODES)[keyof typeof RUNTIME_ERROR_CODES];

export type MuffasaErrorCode =
  | LexicalErrorCode
  | SyntaxErrorCode
  | RuntimeErrorCode;

/** Structured error data for host applications */
export interface MuffasaErrorData {
  readonly stage: ErrorStage;
  readonly code: MuffasaErrorCode;
  readonly message: string;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;
}

/**
 * Base error class for all Muffasa errors.
 * Provides structured data for host applications to format as needed.
 */
export class MuffasaError extends Error {
  readonly stage: ErrorStage;
  readonly code: MuffasaErrorCode;
  readonly location?: SourceLocation | undefined;
  readonly context?: Record<string, unknown> | undefined;

  constructor(data: MuffasaErrorData) {
    const locationStr = data.location
      ? ` at ${data.location.line}:${data.location.column}`
      : '';
    super(`${data.message}${locationStr}`);
    this.name = 'MuffasaError';
    this.stage = data.stage;
    this.code = data.code;
    this.location = data.location;
    this.context = data.context;
  }

  /** Get structured error data for custom formatting */
  toData(): MuffasaErrorData {
    return {
      stage: this.stage,
      code: this.code,
      message: this.message.replace(/ at \d+:\d+$/, ''), // Strip location suffix
      location: this.location,
      context: this.context,
    };
  }

  /** Format error for display (can be overridden by host) */
  format(formatter?: (data: MuffasaErrorData) => string): string {
    if (formatter) return formatter(this.toData());
    return this.message;
  }
}

/**
 * Parse-time errors.
 * Carries the expected construct and a description of the token found instead.
 */
export class ParseError extends MuffasaError {
  override readonly location: SourceLocation;
  readonly expected: string;
  readonly found: string;

  constructor(
    code: SyntaxErrorCode,
    message: string,
    location: SourceLocation,
    details: { expected: string; found: string }
  ) {
    super({
      stage: 'SyntaxError',
      code,
      message,
      location,
      context: { ...details },
    });
    this.name = 'ParseError';
    this.location = location;
    this.expected = details.expected;
    this.found = details.found;
  }
}

/** Runtime execution errors */
export class RuntimeError extends MuffasaError {
  override readonly code: RuntimeErrorCode;

  constructor(
    code: RuntimeErrorCode,
    message: string,
    location?: SourceLocation,
    context?: Record<string, unknown>
  ) {
    super({ stage: 'RuntimeError', code, message, location, context });
    this.name = 'RuntimeError';
    this.code = code;
  }

  /** Create from an AST node */
  static fromNode(
    code: RuntimeErrorCode,
    message: string,
    node?: { span: SourceSpan },
    context?: Record<string, unknown>
  ): RuntimeError {
    return new RuntimeError(code, message, node?.span.start, context);
  }
}

// ============================================================
// TOKEN TYPES
// ============================================================

export const TOKEN_TYPES = {
  IDENTIFIER: 'IDENTIFIER',
  KEYWORD: 'KEYWORD',
  NUMBER: 'NUMBER',
  STRING: 'STRING',
  OPERATOR: 'OPERATOR', // == != && || = < > + - * / ^
  PUNCTUATION: 'PUNCTUATION', // ( ) { } , .
  STATEMENT_END: 'STATEMENT_END', // ~ or ;
  COMMENT: 'COMMENT', // bare string on its own statement
  EOF: 'EOF',
} as const;

export type TokenType = (typeof TOKEN_TYPES)[keyof typeof TOKEN_TYPES];

export interface Token {
  readonly type: TokenType;
  readonly value: string;
  readonly span: SourceSpan;
}

/** Reserved words, matched before generic identifiers */
export const KEYWORD_NAMES = [
  'if',
  'else',
  'while',
  'for',
  'True',
  'False',
  'Shmuple',
  'StringBeans',
  'Arrays',
  'break',
  'continue',
] as const;

export type Keyword = (typeof KEYWORD_NAMES)[number];

/** Built-in composite type names usable as constructors */
export const CONSTRUCTOR_NAMES = ['Shmuple', 'Arrays', 'StringBeans'] as const;

export type ConstructorName = (typeof CONSTRUCTOR_NAMES)[number];

// ============================================================
// AST NODE TYPES
// ============================================================

export type NodeType =
  | 'Program'
  | 'NumberLiteral'
  | 'StringLiteral'
  | 'BoolLiteral'
  | 'Identifier'
  | 'BinaryOp'
  | 'UnaryOp'
  | 'Assignment'
  | 'ExpressionStatement'
  | 'Block'
  | 'If'
  | 'While'
  | 'For'
  | 'Break'
  | 'Continue'
  | 'MethodCall'
  | 'ConstructorCall'
  | 'FunctionCall';

interface BaseNode {
  readonly span: SourceSpan;
}

// ============================================================
// PROGRAM STRUCTURE
// ============================================================

export interface ProgramNode extends BaseNode {
  readonly type: 'Program';
  readonly statements: StatementNode[];
}

// ============================================================
// STATEMENTS
// ============================================================

/**
 * Assignment: name = expr
 * Binds into the innermost frame that already holds the name,
 * or creates the binding in the current frame.
 */
export interface AssignmentNode extends BaseNode {
  readonly type: 'Assignment';
  readonly target: string;
  readonly value: ExpressionNode;
}

/** Expression evaluated for its effect, result discarded */
export interface ExpressionStatementNode extends BaseNode {
  readonly type: 'ExpressionStatement';
  readonly expression: ExpressionNode;
}

/** Braced statement list; opens a scope frame */
export interface BlockNode extends BaseNode {
  readonly type: 'Block';
  readonly statements: StatementNode[];
}

/**
 * Conditional: if (cond) { ... } else { ... }
 * There is no else-if form; nest an if inside the else block.
 */
export interface IfNode extends BaseNode {
  readonly type: 'If';
  readonly condition: ExpressionNode;
  readonly thenBlock: BlockNode;
  readonly elseBlock: BlockNode | null;
}

export interface WhileNode extends BaseNode {
  readonly type: 'While';
  readonly condition: ExpressionNode;
  readonly body: BlockNode;
}

/**
 * C-style loop: for (init; condition; step) { body }
 * init and step share one frame that lives for the whole loop.
 */
export interface ForNode extends BaseNode {
  readonly type: 'For';
  readonly init: AssignmentNode;
  readonly condition: ExpressionNode;
  readonly step: AssignmentNode;
  readonly body: BlockNode;
}

export interface BreakNode extends BaseNode {
  readonly type: 'Break';
}

export interface ContinueNode extends BaseNode {
  readonly type: 'Continue';
}

export type StatementNode =
  | AssignmentNode
  | ExpressionStatementNode
  | BlockNode
  | IfNode
  | WhileNode
  | ForNode
  | BreakNode
  | ContinueNode;

// ============================================================
// EXPRESSIONS
// ============================================================

export interface NumberLiteralNode extends BaseNode {
  readonly type: 'NumberLiteral';
  readonly value: number;
}

export interface StringLiteralNode extends BaseNode {
  readonly type: 'StringLiteral';
  readonly value: string;
}

export interface BoolLiteralNode extends BaseNode {
  readonly type: 'BoolLiteral';
  readonly value: boolean;
}

export type LiteralNode = NumberLiteralNode | StringLiteralNode | BoolLiteralNode;

export interface IdentifierNode extends BaseNode {
  readonly type: 'Identifier';
  readonly name: string;
}

export type ArithmeticOp = '+' | '-' | '*' | '/' | '^';
export type ComparisonOp = '==' | '!=' | '<' | '>';
export type LogicalOp = '&&' | '||';
export type BinaryOp = ArithmeticOp | ComparisonOp | LogicalOp;

export interface BinaryOpNode extends BaseNode {
  readonly type: 'BinaryOp';
  readonly op: BinaryOp;
  readonly left: ExpressionNode;
  readonly right: ExpressionNode;
}

export interface UnaryOpNode extends BaseNode {
  readonly type: 'UnaryOp';
  readonly op: '-';
  readonly operand: ExpressionNode;
}

/** receiver.method(args); chains re-apply the postfix rule */
export interface MethodCallNode extends BaseNode {
  readonly type: 'MethodCall';
  readonly receiver: ExpressionNode;
  readonly method: string;
  readonly args: ExpressionNode[];
}

/** Shmuple(...), Arrays(...), StringBeans(...) */
export interface ConstructorCallNode extends BaseNode {
  readonly type: 'ConstructorCall';
  readonly typeName: ConstructorName;
  readonly args: ExpressionNode[];
}

/** Built-in function call: min, max, squareRoot */
export interface FunctionCallNode extends BaseNode {
  readonly type: 'FunctionCall';
  readonly name: string;
  readonly args: ExpressionNode[];
}

export type ExpressionNode =
  | LiteralNode
  | IdentifierNode
  | BinaryOpNode
  | UnaryOpNode
  | MethodCallNode
  | ConstructorCallNode
  | FunctionCallNode;

// ============================================================
// UNION TYPE FOR ALL NODES
// ============================================================

export type ASTNode = ProgramNode | StatementNode | ExpressionNode;

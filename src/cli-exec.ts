#!/usr/bin/env node
/**
 * CLI Execution Entry Point
 *
 * Implements main(), parseArgs(), and executeScript() for the muffasa binary.
 * Handles file execution, stdin input, configuration and debug dumps.
 */

import * as fs from 'fs/promises';
import * as fsSync from 'fs';
import { fileURLToPath } from 'url';
import {
  createDefaultConfig,
  loadConfig,
  type CliConfig,
} from './cli-config.js';
import {
  formatAst,
  formatError,
  formatTokens,
  formatVariables,
} from './cli-shared.js';
import { createRuntimeContext, execute, parse, tokenize } from './index.js';
import type {
  ConditionalScope,
  ExecutionResult,
  ProgramNode,
  RuntimeCallbacks,
  Token,
} from './index.js';
import { MuffasaError } from './types.js';

/**
 * Debug flags given on the command line; absent flags leave the
 * configuration file's value in place
 */
export type CliFlags = Partial<
  Pick<CliConfig, 'showTokens' | 'showAst' | 'showVariables'>
>;

/**
 * Parsed command-line arguments
 */
export type ParsedArgs =
  | { mode: 'exec'; file: string; flags: CliFlags }
  | { mode: 'help' | 'version' };

const FLAG_OPTIONS: Record<string, keyof CliFlags> = {
  '--tokens': 'showTokens',
  '--ast': 'showAst',
  '--vars': 'showVariables',
};

/**
 * Parse command-line arguments into structured command
 *
 * @param argv - Raw command-line arguments (typically process.argv.slice(2))
 * @returns Parsed command object
 */
export function parseArgs(argv: string[]): ParsedArgs {
  // Check for --help or --version flags in any position
  if (argv.includes('--help') || argv.includes('-h')) {
    return { mode: 'help' };
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    return { mode: 'version' };
  }

  const flags: CliFlags = {};
  let file: string | undefined;

  for (const arg of argv) {
    if (arg.startsWith('-') && arg !== '-') {
      const flag = Object.hasOwn(FLAG_OPTIONS, arg)
        ? FLAG_OPTIONS[arg]
        : undefined;
      if (!flag) {
        throw new Error(`Unknown option: ${arg}`);
      }
      flags[flag] = true;
    } else if (file === undefined) {
      file = arg;
    } else {
      throw new Error(`Unexpected argument: ${arg}`);
    }
  }

  if (file === undefined) {
    throw new Error('Missing file argument');
  }

  return { mode: 'exec', file, flags };
}

/**
 * Read program text from a file, or from stdin for '-'
 *
 * @throws Error if the file does not exist
 */
export async function readSource(file: string): Promise<string> {
  if (file === '-') {
    // Read from stdin (must use sync API for stdin)
    return fsSync.readFileSync(0, 'utf-8');
  }

  try {
    await fs.access(file);
  } catch {
    throw new Error(`File not found: ${file}`);
  }
  return fs.readFile(file, 'utf-8');
}

/** Options for running a program from the CLI */
export interface RunOptions {
  conditionalScope?: ConditionalScope;
  callbacks?: Partial<RuntimeCallbacks>;
  /** Called once the program has parsed, before it runs */
  onParsed?: (tokens: Token[], ast: ProgramNode) => void;
}

/** Every stage's product for one program */
export interface ScriptRun {
  tokens: Token[];
  ast: ProgramNode;
  result: ExecutionResult;
}

/**
 * Tokenize, parse and execute program text.
 * Lexical and syntax errors are thrown; runtime errors land in result.error.
 */
export function runSource(source: string, options: RunOptions = {}): ScriptRun {
  const tokens = tokenize(source);
  const ast = parse(tokens);
  options.onParsed?.(tokens, ast);
  const ctx = createRuntimeContext({
    conditionalScope: options.conditionalScope ?? 'enclosing',
    callbacks: options.callbacks ?? {},
  });
  const result = execute(ast, ctx);
  return { tokens, ast, result };
}

/**
 * Execute a Muffasa program file
 *
 * @param file - File path or '-' for stdin
 * @throws Error if the file is not found, or on lexical/syntax errors
 */
export async function executeScript(
  file: string,
  options: RunOptions = {}
): Promise<ScriptRun> {
  const source = await readSource(file);
  return runSource(source, options);
}

/**
 * Package version from package.json next to the sources or build output
 */
export async function readVersion(): Promise<string> {
  const packageJsonPath = fileURLToPath(
    new URL('../package.json', import.meta.url)
  );
  const packageJson: unknown = JSON.parse(
    await fs.readFile(packageJsonPath, 'utf-8')
  );
  if (
    typeof packageJson === 'object' &&
    packageJson !== null &&
    'version' in packageJson &&
    typeof packageJson.version === 'string'
  ) {
    return packageJson.version;
  }
  throw new Error('package.json has no version');
}

const USAGE = `Usage:
  muffasa <program.muf> [options]  Execute a Muffasa program
  muffasa -                        Read the program from stdin
  muffasa --help                   Show this help message
  muffasa --version                Show version information

Options:
  --tokens   Print the token stream before running
  --ast      Print the syntax tree before running
  --vars     Print global variables after the run

Defaults for these options, and conditionalScope ('enclosing' or 'block'),
are read from .muffasarc.yaml in the working directory.`;

/**
 * Entry point for the muffasa binary
 *
 * Parses command-line arguments, executes the program, and handles errors.
 * Program output goes to stdout, errors to stderr.
 * Sets process.exit(1) on any error.
 */
export async function main(): Promise<void> {
  let source: string | undefined;
  try {
    const parsed = parseArgs(process.argv.slice(2));

    switch (parsed.mode) {
      case 'help':
        console.log(USAGE);
        return;

      case 'version':
        console.log(await readVersion());
        return;

      case 'exec': {
        const config = {
          ...(loadConfig(process.cwd()) ?? createDefaultConfig()),
          ...parsed.flags,
        };
        source = await readSource(parsed.file);

        const { result } = runSource(source, {
          conditionalScope: config.conditionalScope,
          onParsed: (tokens, ast) => {
            if (config.showTokens) console.log(formatTokens(tokens));
            if (config.showAst) console.log(formatAst(ast));
          },
        });
        if (result.error) {
          console.error(
            formatError(result.error, source, Object.keys(result.variables))
          );
          process.exit(1);
        }
        if (config.showVariables) {
          console.log(formatVariables(result.variables));
        }
        return;
      }
    }
  } catch (err) {
    if (err instanceof MuffasaError) {
      console.error(formatError(err, source));
    } else if (err instanceof Error) {
      console.error(formatError(err));
    } else {
      console.error(formatError(new Error(String(err))));
    }
    process.exit(1);
  }
}

// Only run main if not in test environment
const shouldRunMain =
  process.env['NODE_ENV'] !== 'test' &&
  !process.env['VITEST'] &&
  !process.env['VITEST_WORKER_ID'];

if (shouldRunMain) {
  main().catch((err: unknown) => {
    console.error(err);
    process.exit(1);
  });
}

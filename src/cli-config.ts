/**
 * Configuration Loader for the muffasa CLI
 * Loads and validates .muffasarc.yaml configuration files.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import * as yaml from 'yaml';
import type { ConditionalScope } from './runtime/index.js';

// ============================================================
// CONSTANTS
// ============================================================

/** Configuration file name */
export const CONFIG_FILE_NAME = '.muffasarc.yaml';

const BOOLEAN_KEYS = ['showTokens', 'showAst', 'showVariables'] as const;

type BooleanKey = (typeof BOOLEAN_KEYS)[number];

// ============================================================
// TYPES
// ============================================================

export interface CliConfig {
  /** Print the token stream before running */
  showTokens: boolean;
  /** Print the AST before running */
  showAst: boolean;
  /** Print global variables after a successful run */
  showVariables: boolean;
  /** Scoping of if/else branches */
  conditionalScope: ConditionalScope;
}

// ============================================================
// DEFAULT CONFIGURATION
// ============================================================

export function createDefaultConfig(): CliConfig {
  return {
    showTokens: false,
    showAst: false,
    showVariables: false,
    conditionalScope: 'enclosing',
  };
}

// ============================================================
// VALIDATION
// ============================================================

function isBooleanKey(key: string): key is BooleanKey {
  return BOOLEAN_KEYS.some((k) => k === key);
}

function isConditionalScope(value: unknown): value is ConditionalScope {
  return value === 'enclosing' || value === 'block';
}

/**
 * Validate configuration structure and values.
 * Returns the validated settings; throws Error if configuration is invalid.
 */
function validateConfig(data: unknown): Partial<CliConfig> {
  // An empty file parses to null
  if (data === null || data === undefined) return {};

  if (typeof data !== 'object' || Array.isArray(data)) {
    throw new Error('Invalid configuration: must be a mapping');
  }

  const config: Partial<CliConfig> = {};
  const entries: [string, unknown][] = Object.entries(data);

  for (const [key, value] of entries) {
    if (isBooleanKey(key)) {
      if (typeof value !== 'boolean') {
        throw new Error(`Invalid configuration: ${key} must be a boolean`);
      }
      config[key] = value;
    } else if (key === 'conditionalScope') {
      if (!isConditionalScope(value)) {
        throw new Error(
          `Invalid configuration: conditionalScope has invalid value "${String(value)}" (must be 'enclosing' or 'block')`
        );
      }
      config.conditionalScope = value;
    } else {
      throw new Error(`Invalid configuration: unknown key ${key}`);
    }
  }

  return config;
}

// ============================================================
// CONFIGURATION LOADING
// ============================================================

/**
 * Load configuration from .muffasarc.yaml in the specified directory.
 *
 * @param cwd - Directory to search for configuration file
 * @returns CliConfig merged over the defaults, or null if file not found
 * @throws Error with "Invalid configuration: {reason}" if the file is invalid
 */
export function loadConfig(cwd: string): CliConfig | null {
  const configPath = join(cwd, CONFIG_FILE_NAME);

  // Return null if file not found (not an error)
  if (!existsSync(configPath)) {
    return null;
  }

  let fileContent: string;
  try {
    fileContent = readFileSync(configPath, 'utf-8');
  } catch (err) {
    throw new Error(
      `Invalid configuration: failed to read file (${err instanceof Error ? err.message : String(err)})`
    );
  }

  let parsedData: unknown;
  try {
    parsedData = yaml.parse(fileContent);
  } catch (err) {
    throw new Error(
      `Invalid configuration: invalid YAML (${err instanceof Error ? err.message : String(err)})`
    );
  }

  return { ...createDefaultConfig(), ...validateConfig(parsedData) };
}

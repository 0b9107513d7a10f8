/**
 * Configuration loader for Sprig.
 *
 * Loads sprig.config.json from the script's directory, the working
 * directory or a specified path.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { SignaturePolicy } from './interpreter';

const CONFIG_FILENAMES = ['sprig.config.json', '.sprigrc.json'];
const SIGNATURE_POLICIES: readonly SignaturePolicy[] = ['nominal', 'structural'];

export interface SprigConfig {
  /** Capacity of the struct registry. */
  maxStructs?: number;
  /** Files evaluated before the script or REPL, relative to the config file. */
  prelude?: string[];
  /** REPL prompt. */
  prompt?: string;
  trace?: boolean;
  signaturePolicy?: SignaturePolicy;
}

/**
 * Load Sprig configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. sprig.config.json in cwd
 * 3. .sprigrc.json in cwd
 *
 * Returns empty config if no file is found (not an error).
 */
export function loadConfig(explicitPath?: string): SprigConfig {
  if (explicitPath) {
    return readConfigFile(explicitPath);
  }

  const cwd = process.cwd();

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(cwd, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  return {};
}

/**
 * Load config relative to a script file's directory.
 * Useful when running `sprig path/to/script.sprig` from a different cwd.
 */
export function loadConfigForScript(scriptPath: string): SprigConfig {
  const scriptDir = path.dirname(path.resolve(scriptPath));

  for (const filename of CONFIG_FILENAMES) {
    const filePath = path.join(scriptDir, filename);
    if (fs.existsSync(filePath)) {
      return readConfigFile(filePath);
    }
  }

  return loadConfig();
}

function readConfigFile(filePath: string): SprigConfig {
  const content = fs.readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in config file ${filePath}: ${message}`);
  }
  const config = validateConfig(raw, filePath);
  if (config.prelude) {
    const base = path.dirname(path.resolve(filePath));
    config.prelude = config.prelude.map(file => path.resolve(base, file));
  }
  return config;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isSignaturePolicy(value: unknown): value is SignaturePolicy {
  return SIGNATURE_POLICIES.some(policy => policy === value);
}

/**
 * Validate config structure. Throws on invalid config.
 */
export function validateConfig(raw: unknown, filePath: string): SprigConfig {
  if (!isRecord(raw)) {
    throw new Error(`Invalid config in ${filePath}: must be an object`);
  }

  const config: SprigConfig = {};
  const { maxStructs, prelude, prompt, trace, signaturePolicy } = raw;

  if (maxStructs !== undefined) {
    if (typeof maxStructs !== 'number' || !Number.isInteger(maxStructs) || maxStructs < 1) {
      throw new Error(`Invalid "maxStructs" in ${filePath}: must be a positive integer`);
    }
    config.maxStructs = maxStructs;
  }

  if (prelude !== undefined) {
    if (!Array.isArray(prelude) || !prelude.every((file): file is string => typeof file === 'string')) {
      throw new Error(`Invalid "prelude" in ${filePath}: must be an array of file paths`);
    }
    config.prelude = prelude;
  }

  if (prompt !== undefined) {
    if (typeof prompt !== 'string') {
      throw new Error(`Invalid "prompt" in ${filePath}: must be a string`);
    }
    config.prompt = prompt;
  }

  if (trace !== undefined) {
    if (typeof trace !== 'boolean') {
      throw new Error(`Invalid "trace" in ${filePath}: must be a boolean`);
    }
    config.trace = trace;
  }

  if (signaturePolicy !== undefined) {
    if (!isSignaturePolicy(signaturePolicy)) {
      throw new Error(
        `Invalid "signaturePolicy" in ${filePath}: must be one of ${SIGNATURE_POLICIES.join(', ')}`,
      );
    }
    config.signaturePolicy = signaturePolicy;
  }

  return config;
}

/**
 * csafkit Configuration
 *
 * Options shared by parsing, serialization and interop. Callers pass partial
 * objects; anything left out falls back to DEFAULT_CONFIG.
 */

import type { Publisher } from '../model/index.js';

export interface InteropConfig {
  /** Publisher written into converted documents */
  publisher?: Publisher;
  /** Document language for converted documents */
  lang?: string;
}

export interface CsafkitConfig {
  // Parse options
  strict?: boolean;
  verbose?: boolean;

  // Serialize options
  indent?: number;

  interop?: InteropConfig;
}

export interface ResolvedConfig {
  strict: boolean;
  verbose: boolean;
  indent: number;
  interop: InteropConfig;
}

export const DEFAULT_CONFIG: ResolvedConfig = {
  strict: false,
  verbose: false,
  indent: 2,
  interop: {},
};

export const MAX_INDENT = 10;

export class ConfigError extends Error {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(`Invalid configuration: ${errors.join('; ')}`);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

/**
 * Merge configurations (overrides win, undefined values are ignored)
 */
export function mergeConfig(base: CsafkitConfig, overrides: CsafkitConfig): CsafkitConfig {
  const merged: CsafkitConfig = { ...base };

  if (overrides.strict !== undefined) merged.strict = overrides.strict;
  if (overrides.verbose !== undefined) merged.verbose = overrides.verbose;
  if (overrides.indent !== undefined) merged.indent = overrides.indent;

  if (overrides.interop !== undefined) {
    const interop: InteropConfig = { ...base.interop };
    if (overrides.interop.publisher !== undefined) interop.publisher = overrides.interop.publisher;
    if (overrides.interop.lang !== undefined) interop.lang = overrides.interop.lang;
    merged.interop = interop;
  }

  return merged;
}

/**
 * Fill in defaults for every option. Throws ConfigError when the overrides
 * fail validation.
 */
export function resolveConfig(config: CsafkitConfig = {}): ResolvedConfig {
  const { valid, errors } = validateConfig(config);
  if (!valid) {
    throw new ConfigError(errors);
  }

  const merged = mergeConfig(DEFAULT_CONFIG, config);
  return {
    strict: merged.strict ?? DEFAULT_CONFIG.strict,
    verbose: merged.verbose ?? DEFAULT_CONFIG.verbose,
    indent: merged.indent ?? DEFAULT_CONFIG.indent,
    interop: merged.interop ?? DEFAULT_CONFIG.interop,
  };
}

/**
 * Validate configuration
 */
export function validateConfig(config: CsafkitConfig): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (config.indent !== undefined) {
    if (!Number.isInteger(config.indent) || config.indent < 0 || config.indent > MAX_INDENT) {
      errors.push(`indent must be an integer between 0 and ${MAX_INDENT}`);
    }
  }

  const publisher = config.interop?.publisher;
  if (publisher) {
    if (publisher.name.trim() === '') {
      errors.push('interop.publisher.name must not be empty');
    }
    if (publisher.namespace.trim() === '') {
      errors.push('interop.publisher.namespace must not be empty');
    } else if (!URL.canParse(publisher.namespace)) {
      errors.push(`interop.publisher.namespace is not a URL: ${publisher.namespace}`);
    }
  }

  if (config.interop?.lang !== undefined && !/^[A-Za-z]{2,8}(-[A-Za-z0-9]{1,8})*$/.test(config.interop.lang)) {
    errors.push(`interop.lang is not a language tag: ${config.interop.lang}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

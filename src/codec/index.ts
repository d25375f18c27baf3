/**
 * csafkit - Serialization
 *
 * bytes -> JSON tree -> structural decode -> canonical Csaf, and back.
 */

import { z } from 'zod';
import { isUnrecognized } from '../enums/index.js';
import { resolveConfig, type CsafkitConfig } from '../config/index.js';
import { logError, logWarnings, type Diagnostic } from '../log.js';
import type { Csaf } from '../model/index.js';
import { csafSchema, type IssueParams } from '../schema/index.js';
import { canonicalize } from './canonical.js';
import { decodeBranchForest } from './branches.js';
import { writeWithSchema } from './encode.js';
import { extendPath, formatPath, ParseError, pathSegments, type PathLink } from './errors.js';
import { firstInvalidUtf8, JsonSyntaxError, locate, readJson, type JsonValue } from './json.js';

export type ParseOptions = Pick<CsafkitConfig, 'strict' | 'verbose'>;
export type SerializeOptions = Pick<CsafkitConfig, 'indent'>;

export type ParseWarning = Diagnostic;

export type ParseResult =
  | { ok: true; value: Csaf; warnings: ParseWarning[] }
  | { ok: false; error: ParseError };

// ============================================================
// Decoding
// ============================================================

function decodeText(input: string | Uint8Array): string {
  if (typeof input === 'string') {
    return input;
  }
  const bad = firstInvalidUtf8(input);
  if (bad !== -1) {
    // Everything before the bad byte is valid, so its length in bytes is `bad`
    const prefix = new TextDecoder('utf-8', { ignoreBOM: true }).decode(input.subarray(0, bad));
    throw new ParseError({ kind: 'syntax', ...locate(prefix, prefix.length) }, 'Invalid UTF-8');
  }
  // Keep a BOM in the text so offsets still count its three bytes
  return new TextDecoder('utf-8', { ignoreBOM: true }).decode(input);
}

function isIssueParams(value: unknown): value is IssueParams {
  if (typeof value !== 'object' || value === null || !('kind' in value)) {
    return false;
  }
  return value.kind === 'unknown_variant' || value.kind === 'type_mismatch';
}

function toParseError(issue: z.ZodIssue): ParseError {
  const path = formatPath(issue.path);

  if (issue.code === z.ZodIssueCode.invalid_type) {
    if (issue.received === z.ZodParsedType.undefined) {
      return new ParseError({ kind: 'missing_field', path });
    }
    return new ParseError({ kind: 'type_mismatch', path, expected: issue.expected, found: issue.received });
  }

  if (issue.code === z.ZodIssueCode.custom && isIssueParams(issue.params)) {
    const params = issue.params;
    if (params.kind === 'unknown_variant') {
      return new ParseError({ kind: 'unknown_variant', path, value: params.value, allowed: params.allowed });
    }
    return new ParseError({ kind: 'type_mismatch', path, expected: params.expected, found: params.found }, issue.message);
  }

  return new ParseError({ kind: 'type_mismatch', path, expected: 'valid value', found: 'invalid value' }, issue.message);
}

/**
 * Every unrecognized enum value with its path, in document order
 */
function collectUnrecognized(root: unknown): ParseWarning[] {
  const out: ParseWarning[] = [];
  const stack: Array<{ value: unknown; path: PathLink | undefined }> = [{ value: root, path: undefined }];

  for (let item = stack.pop(); item; item = stack.pop()) {
    const { value, path } = item;
    if (isUnrecognized(value)) {
      out.push({ path: formatPath(pathSegments(path)), message: `unrecognized value "${value.unrecognized}" kept as-is` });
    } else if (Array.isArray(value)) {
      for (let i = value.length - 1; i >= 0; i--) {
        stack.push({ value: value[i], path: extendPath(path, i) });
      }
    } else if (typeof value === 'object' && value !== null) {
      const entries = Object.entries(value);
      for (let i = entries.length - 1; i >= 0; i--) {
        stack.push({ value: entries[i][1], path: extendPath(path, entries[i][0]) });
      }
    }
  }
  return out;
}

function isJsonObject(value: JsonValue): value is { [key: string]: JsonValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * An object member whose value is null reads as an absent field. Nulls inside
 * arrays are left for the schema to reject. Edits the tree in place.
 */
function dropNullMembers(tree: JsonValue): void {
  const stack: JsonValue[] = [tree];
  for (let value = stack.pop(); value !== undefined; value = stack.pop()) {
    if (Array.isArray(value)) {
      for (const item of value) {
        stack.push(item);
      }
    } else if (isJsonObject(value)) {
      for (const key of Object.keys(value)) {
        const member = value[key];
        if (member === null) {
          delete value[key];
        } else {
          stack.push(member);
        }
      }
    }
  }
}

/**
 * Take `product_tree.branches` out of the tree so the schema never recurses
 * into it
 */
function detachBranches(tree: JsonValue): JsonValue | undefined {
  if (!isJsonObject(tree) || !('product_tree' in tree)) {
    return undefined;
  }
  const productTree = tree.product_tree;
  if (!isJsonObject(productTree) || !('branches' in productTree)) {
    return undefined;
  }
  const branches = productTree.branches;
  delete productTree.branches;
  return branches;
}

const BRANCHES_PATH = extendPath(extendPath(undefined, 'product_tree'), 'branches');

/**
 * Zod reports issues in field order. Branches come first in the product
 * tree, so their issue ranks after the document's and before the rest.
 */
function firstIssue(issues: z.ZodIssue[], branchIssue: z.ZodIssue | undefined): z.ZodIssue {
  const first = issues[0];
  if (first.path.length === 0 || first.path[0] === 'document') {
    return first;
  }
  return branchIssue ?? first;
}

function decode(input: string | Uint8Array, strict: boolean): { value: Csaf; warnings: ParseWarning[] } {
  const text = decodeText(input);

  let tree: JsonValue;
  try {
    tree = readJson(text);
  } catch (err) {
    if (err instanceof JsonSyntaxError) {
      throw new ParseError({ kind: 'syntax', ...err.position }, err.reason);
    }
    throw err;
  }

  dropNullMembers(tree);
  const rawBranches = detachBranches(tree);
  const forest = rawBranches === undefined ? undefined : decodeBranchForest(rawBranches, BRANCHES_PATH, { strict });

  const branchIssue = forest && !forest.ok ? forest.issue : undefined;

  const result = csafSchema({ strict }).safeParse(tree);
  if (!result.success) {
    throw toParseError(firstIssue(result.error.issues, branchIssue));
  }
  if (branchIssue) {
    throw toParseError(branchIssue);
  }

  const csaf = result.data;
  if (forest?.ok && csaf.product_tree) {
    csaf.product_tree = { branches: forest.branches, ...csaf.product_tree };
  }

  const value = canonicalize(csaf);
  return { value, warnings: collectUnrecognized(value) };
}

/**
 * Parse a CSAF document. Never throws for bad input; the result carries
 * either the value or the first error found.
 */
export function parse(input: string | Uint8Array, options: ParseOptions = {}): ParseResult {
  const config = resolveConfig(options);
  try {
    const { value, warnings } = decode(input, config.strict);
    if (config.verbose) {
      logWarnings(warnings);
    }
    return { ok: true, value, warnings };
  } catch (err) {
    if (err instanceof ParseError) {
      if (config.verbose) {
        logError(err.message);
      }
      return { ok: false, error: err };
    }
    throw err;
  }
}

/**
 * Parse a CSAF document, throwing ParseError on failure
 */
export function parseOrThrow(input: string | Uint8Array, options: ParseOptions = {}): Csaf {
  const result = parse(input, options);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

// ============================================================
// Encoding
// ============================================================

/**
 * Serialize a CSAF value to JSON text in declared field order
 */
export function serialize(csaf: Csaf, options: SerializeOptions = {}): string {
  const { indent } = resolveConfig(options);
  return writeWithSchema(csafSchema(), canonicalize(csaf), indent);
}

export function serializeToBytes(csaf: Csaf, options: SerializeOptions = {}): Uint8Array {
  return new TextEncoder().encode(serialize(csaf, options));
}

export { canonicalize } from './canonical.js';
export { ParseError, formatPath } from './errors.js';
export type { ParseErrorDetail, ParseErrorKind } from './errors.js';
export { normalizeTimestamp, datePart } from './timestamp.js';

/**
 * csafkit - Decoding errors
 */

import type { SourcePosition } from './json.js';

export type ParseErrorDetail =
  | ({ kind: 'syntax' } & SourcePosition)
  | { kind: 'missing_field'; path: string }
  | { kind: 'type_mismatch'; path: string; expected: string; found: string }
  | { kind: 'unknown_variant'; path: string; value: string; allowed: string[] };

export type ParseErrorKind = ParseErrorDetail['kind'];

const where = (path: string): string => (path === '' ? 'document root' : `'${path}'`);

function describe(detail: ParseErrorDetail): string {
  switch (detail.kind) {
    case 'syntax':
      return `Malformed JSON at line ${detail.line}, column ${detail.column} (offset ${detail.offset})`;
    case 'missing_field':
      return `Missing required field ${where(detail.path)}`;
    case 'type_mismatch':
      return `Expected ${detail.expected} at ${where(detail.path)}, found ${detail.found}`;
    case 'unknown_variant':
      return `Unknown value ${JSON.stringify(detail.value)} at ${where(detail.path)} (expected one of: ${detail.allowed.join(', ')})`;
  }
}

export class ParseError extends Error {
  readonly detail: ParseErrorDetail;

  constructor(detail: ParseErrorDetail, reason?: string) {
    super(reason ? `${describe(detail)}: ${reason}` : describe(detail));
    this.name = 'ParseError';
    this.detail = detail;
  }

  get kind(): ParseErrorKind {
    return this.detail.kind;
  }

  /** Dotted field path, or an empty string for syntax errors */
  get path(): string {
    return this.detail.kind === 'syntax' ? '' : this.detail.path;
  }
}

/**
 * Render a field path as `document.tracking.revision_history[0].date`
 */
export function formatPath(segments: ReadonlyArray<string | number>): string {
  let path = '';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      path += `[${segment}]`;
    } else {
      path += path === '' ? segment : `.${segment}`;
    }
  }
  return path;
}

/**
 * Parent-linked path. Deep walks extend it in constant time and only
 * materialize the segments when something needs reporting.
 */
export interface PathLink {
  readonly segment: string | number;
  readonly parent: PathLink | undefined;
}

export function extendPath(parent: PathLink | undefined, segment: string | number): PathLink {
  return { segment, parent };
}

export function pathSegments(link: PathLink | undefined): Array<string | number> {
  const segments: Array<string | number> = [];
  for (let node = link; node; node = node.parent) {
    segments.push(node.segment);
  }
  return segments.reverse();
}

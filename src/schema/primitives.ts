/**
 * csafkit - Shared schema building blocks
 */

import { z } from 'zod';
import { isKnownVariant, unrecognized, type Open } from '../enums/index.js';
import { normalizeTimestamp } from '../codec/timestamp.js';

export interface SchemaMode {
  /** Reject enum text outside the known variants */
  strict: boolean;
}

/**
 * Issue params attached to custom issues so the decoder can rebuild the
 * matching ParseError detail
 */
export type IssueParams =
  | { kind: 'unknown_variant'; value: string; allowed: string[] }
  | { kind: 'type_mismatch'; expected: string; found: string };

export function openEnum<K extends string>(values: readonly K[], mode: SchemaMode) {
  return z.string().transform((text, ctx): Open<K> => {
    if (isKnownVariant(values, text)) {
      return text;
    }
    if (mode.strict) {
      const params: IssueParams = { kind: 'unknown_variant', value: text, allowed: [...values] };
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown value "${text}"`, params });
      return z.NEVER;
    }
    return unrecognized(text);
  });
}

export const timestamp = z.string().transform((text, ctx) => {
  const normalized = normalizeTimestamp(text);
  if (normalized === undefined) {
    const params: IssueParams = { kind: 'type_mismatch', expected: 'timestamp', found: 'string' };
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid timestamp "${text}"`, params });
    return z.NEVER;
  }
  return normalized;
});

export const strings = z.array(z.string());

/**
 * Product ID set: duplicates collapse, first occurrence wins
 */
export const productIdSet = z.array(z.string()).transform(ids => [...new Set(ids)]);

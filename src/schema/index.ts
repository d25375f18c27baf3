/**
 * csafkit - CSAF 2.0 structural schemas
 *
 * The shape objects double as the field order used when encoding.
 */

import { z } from 'zod';
import type { Branch, Csaf } from '../model/index.js';
import { documentSchemas } from './document.js';
import { productTreeSchemas } from './product-tree.js';
import type { SchemaMode } from './primitives.js';
import { vulnerabilitySchemas } from './vulnerability.js';

export type { IssueParams, SchemaMode } from './primitives.js';

export type CsafSchema = z.ZodType<Csaf, z.ZodTypeDef, unknown>;
export type BranchNodeSchema = z.ZodType<Omit<Branch, 'branches'>, z.ZodTypeDef, unknown>;

interface SchemaSet {
  csaf: CsafSchema;
  branchNode: BranchNodeSchema;
}

function buildSchemas(mode: SchemaMode): SchemaSet {
  const { document } = documentSchemas(mode);
  const { branchNode, productTree } = productTreeSchemas(mode);
  const { vulnerability } = vulnerabilitySchemas(mode);

  const csaf = z.object({
    document,
    product_tree: productTree.optional(),
    vulnerabilities: z.array(vulnerability).optional(),
  });

  return { csaf, branchNode };
}

const cache = new Map<boolean, SchemaSet>();

function schemas(mode: SchemaMode): SchemaSet {
  let set = cache.get(mode.strict);
  if (!set) {
    set = buildSchemas(mode);
    cache.set(mode.strict, set);
  }
  return set;
}

/**
 * Schema for the given mode, built once and shared read-only. Its branch
 * schema is recursive; `parse` decodes branch forests node by node instead.
 */
export function csafSchema(mode: SchemaMode = { strict: false }): CsafSchema {
  return schemas(mode).csaf;
}

/**
 * One branch without its `branches` field
 */
export function branchNodeSchema(mode: SchemaMode = { strict: false }): BranchNodeSchema {
  return schemas(mode).branchNode;
}

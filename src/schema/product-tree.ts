/**
 * csafkit - Product tree schemas
 */

import { z } from 'zod';
import { BRANCH_CATEGORIES, RELATIONSHIP_CATEGORIES } from '../enums/index.js';
import type { Branch } from '../model/index.js';
import { openEnum, strings, type SchemaMode } from './primitives.js';

export function productTreeSchemas(mode: SchemaMode) {
  const helper = z.object({
    cpe: z.string().optional(),
    hashes: z
      .array(
        z.object({
          file_hashes: z.array(z.object({ algorithm: z.string(), value: z.string() })),
          filename: z.string(),
        })
      )
      .optional(),
    model_numbers: strings.optional(),
    purl: z.string().optional(),
    sbom_urls: strings.optional(),
    serial_numbers: strings.optional(),
    skus: strings.optional(),
    x_generic_uris: z.array(z.object({ namespace: z.string(), uri: z.string() })).optional(),
  });

  const fullProductName = z.object({
    name: z.string(),
    product_id: z.string(),
    product_identification_helper: helper.optional(),
  });

  const branchCategory = openEnum(BRANCH_CATEGORIES, mode);

  const branch: z.ZodType<Branch, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.object({
      branches: z.array(branch).optional(),
      category: branchCategory,
      name: z.string(),
      product: fullProductName.optional(),
    })
  );

  // A single branch without its children. Decoding walks the forest itself
  const branchNode = z.object({
    category: branchCategory,
    name: z.string(),
    product: fullProductName.optional(),
  });

  const productTree = z.object({
    branches: z.array(branch).optional(),
    full_product_names: z.array(fullProductName).optional(),
    product_groups: z
      .array(
        z.object({
          group_id: z.string(),
          product_ids: strings,
          summary: z.string().optional(),
        })
      )
      .optional(),
    relationships: z
      .array(
        z.object({
          category: openEnum(RELATIONSHIP_CATEGORIES, mode),
          full_product_name: fullProductName,
          product_reference: z.string(),
          relates_to_product_reference: z.string(),
        })
      )
      .optional(),
  });

  return { branch, branchNode, fullProductName, productTree };
}

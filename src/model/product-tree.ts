/**
 * csafkit - Product tree
 *
 * Branches form a strict tree: each node owns its children. Relationships and
 * groups point at products by ID only.
 */

import type { BranchCategory, Open, RelationshipCategory } from '../enums/index.js';

/**
 * Opaque product reference
 */
export type ProductId = string;
export type ProductGroupId = string;

export interface FileHash {
  algorithm: string;
  value: string;
}

export interface Hashes {
  file_hashes: FileHash[];
  filename: string;
}

export interface GenericUri {
  namespace: string;
  uri: string;
}

export interface ProductIdentificationHelper {
  cpe?: string;
  hashes?: Hashes[];
  model_numbers?: string[];
  purl?: string;
  sbom_urls?: string[];
  serial_numbers?: string[];
  skus?: string[];
  x_generic_uris?: GenericUri[];
}

export interface FullProductName {
  name: string;
  product_id: ProductId;
  product_identification_helper?: ProductIdentificationHelper;
}

export interface Branch {
  branches?: Branch[];
  category: Open<BranchCategory>;
  name: string;
  product?: FullProductName;
}

export interface ProductGroup {
  group_id: ProductGroupId;
  product_ids: ProductId[];
  summary?: string;
}

export interface Relationship {
  category: Open<RelationshipCategory>;
  full_product_name: FullProductName;
  product_reference: ProductId;
  relates_to_product_reference: ProductId;
}

export interface ProductTree {
  branches?: Branch[];
  full_product_names?: FullProductName[];
  product_groups?: ProductGroup[];
  relationships?: Relationship[];
}

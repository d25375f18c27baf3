/**
 * csafkit - Canonical form
 *
 * Normalizations that decoding applies and encoding relies on:
 * - an empty `vulnerabilities` list is the same as none and is dropped
 * - product status lists are sets; repeated IDs collapse to the first
 */

import { PRODUCT_STATUS_CATEGORIES } from '../enums/index.js';
import type { Csaf, ProductStatus, Vulnerability } from '../model/index.js';

function dedupeStatus(status: ProductStatus): ProductStatus {
  const result: ProductStatus = {};
  for (const category of PRODUCT_STATUS_CATEGORIES) {
    const ids = status[category];
    if (ids !== undefined) {
      result[category] = [...new Set(ids)];
    }
  }
  return result;
}

function canonicalVulnerability(vuln: Vulnerability): Vulnerability {
  return vuln.product_status ? { ...vuln, product_status: dedupeStatus(vuln.product_status) } : vuln;
}

/**
 * Return the canonical form of a value. The input is not modified.
 */
export function canonicalize(csaf: Csaf): Csaf {
  const { vulnerabilities, ...rest } = csaf;
  if (!vulnerabilities || vulnerabilities.length === 0) {
    return rest;
  }
  return { ...rest, vulnerabilities: vulnerabilities.map(canonicalVulnerability) };
}

/**
 * csafkit - Document Model
 */

import type { Document } from './document.js';
import type { Branch, FullProductName, ProductTree } from './product-tree.js';
import type { Vulnerability } from './vulnerability.js';

export type * from './document.js';
export type * from './product-tree.js';
export type * from './vulnerability.js';

/**
 * Top-level CSAF value. A missing `vulnerabilities` field is the canonical
 * form of "no vulnerabilities".
 */
export interface Csaf {
  document: Document;
  product_tree?: ProductTree;
  vulnerabilities?: Vulnerability[];
}

export interface BranchVisit {
  branch: Branch;
  /** Names from the root branch down to this one */
  readonly path: string[];
}

interface Trail {
  name: string;
  parent: Trail | undefined;
}

function trailNames(trail: Trail): string[] {
  const names: string[] = [];
  for (let link: Trail | undefined = trail; link; link = link.parent) {
    names.push(link.name);
  }
  return names.reverse();
}

function visitOf(branch: Branch, trail: Trail): BranchVisit {
  return {
    branch,
    get path() {
      return trailNames(trail);
    },
  };
}

/**
 * Depth-first, document-order walk over a branch forest. Uses an explicit
 * stack so arbitrarily deep trees do not exhaust the call stack. A visit's
 * path is built only when read.
 */
export function* walkBranches(branches: readonly Branch[]): Generator<BranchVisit> {
  const stack: Array<{ branch: Branch; trail: Trail }> = [];
  const pushAll = (children: readonly Branch[], parent: Trail | undefined): void => {
    for (let i = children.length - 1; i >= 0; i--) {
      stack.push({ branch: children[i], trail: { name: children[i].name, parent } });
    }
  };

  pushAll(branches, undefined);
  for (let item = stack.pop(); item; item = stack.pop()) {
    yield visitOf(item.branch, item.trail);
    pushAll(item.branch.branches ?? [], item.trail);
  }
}

/**
 * All full product names defined anywhere in the tree, in document order:
 * branch leaves first, then the flat list, then relationship products.
 */
export function collectProducts(tree: ProductTree): FullProductName[] {
  const products: FullProductName[] = [];

  for (const { branch } of walkBranches(tree.branches ?? [])) {
    if (branch.product) {
      products.push(branch.product);
    }
  }
  products.push(...(tree.full_product_names ?? []));
  for (const rel of tree.relationships ?? []) {
    products.push(rel.full_product_name);
  }

  return products;
}

/**
 * Look up a product definition by ID. The model never enforces that
 * referenced IDs exist, so a miss is a normal outcome.
 */
export function findProduct(tree: ProductTree, productId: string): FullProductName | undefined {
  return collectProducts(tree).find(p => p.product_id === productId);
}

/**
 * Model helpers and code sets
 */

import { describe, it, expect } from 'vitest';
import {
  isKnownVariant,
  isUnrecognized,
  toVariant,
  TRACKING_STATUSES,
  unrecognized,
  variantText,
} from '../enums/index.js';
import {
  collectProducts,
  findProduct,
  walkBranches,
  type Branch,
  type BranchVisit,
  type ProductTree,
} from '../model/index.js';
import { csafSchema } from '../schema/index.js';

const tree: ProductTree = {
  branches: [
    {
      category: 'vendor',
      name: 'Example Corp',
      branches: [
        {
          category: 'product_name',
          name: 'Widget',
          branches: [
            { category: 'product_version', name: '1.0', product: { name: 'Widget 1.0', product_id: 'W-1.0' } },
            { category: 'product_version', name: '2.0', product: { name: 'Widget 2.0', product_id: 'W-2.0' } },
          ],
        },
      ],
    },
    {
      category: 'vendor',
      name: 'Other Corp',
      product: { name: 'Gizmo', product_id: 'G' },
    },
  ],
  full_product_names: [{ name: 'Platform', product_id: 'PLAT' }],
  relationships: [
    {
      category: 'installed_on',
      full_product_name: { name: 'Widget 1.0 on Platform', product_id: 'PLAT:W-1.0' },
      product_reference: 'W-1.0',
      relates_to_product_reference: 'PLAT',
    },
  ],
};

describe('walkBranches', () => {
  it('visits branches depth-first in document order', () => {
    const visits = [...walkBranches(tree.branches ?? [])];

    expect(visits.map(visit => visit.path.join(' / '))).toEqual([
      'Example Corp',
      'Example Corp / Widget',
      'Example Corp / Widget / 1.0',
      'Example Corp / Widget / 2.0',
      'Other Corp',
    ]);
  });

  it('handles an empty forest', () => {
    expect([...walkBranches([])]).toEqual([]);
  });

  it('walks a long chain without recursion', () => {
    const depth = 10000;
    let branch: Branch = { category: 'product_version', name: 'leaf', product: { name: 'Leaf', product_id: 'LEAF' } };
    for (let i = 1; i < depth; i++) {
      branch = { branches: [branch], category: 'product_family', name: `level-${i}` };
    }

    let count = 0;
    let last: BranchVisit | undefined;
    for (const visit of walkBranches([branch])) {
      count++;
      last = visit;
    }

    expect(count).toBe(depth);
    expect(last?.path).toHaveLength(depth);
    expect(last?.path[0]).toBe(`level-${depth - 1}`);
    expect(last?.path[depth - 1]).toBe('leaf');
  });
});

describe('collectProducts', () => {
  it('lists branch leaves, flat products, then relationship products', () => {
    expect(collectProducts(tree).map(product => product.product_id)).toEqual([
      'W-1.0',
      'W-2.0',
      'G',
      'PLAT',
      'PLAT:W-1.0',
    ]);
  });

  it('returns nothing for an empty tree', () => {
    expect(collectProducts({})).toEqual([]);
  });
});

describe('findProduct', () => {
  it('finds a product anywhere in the tree', () => {
    expect(findProduct(tree, 'W-2.0')?.name).toBe('Widget 2.0');
    expect(findProduct(tree, 'PLAT:W-1.0')?.name).toBe('Widget 1.0 on Platform');
  });

  it('returns undefined for a dangling reference', () => {
    expect(findProduct(tree, 'MISSING')).toBeUndefined();
  });
});

describe('open code sets', () => {
  it('maps known text to the variant itself', () => {
    expect(toVariant(TRACKING_STATUSES, 'final')).toBe('final');
    expect(isKnownVariant(TRACKING_STATUSES, 'final')).toBe(true);
  });

  it('wraps unknown text', () => {
    const value = toVariant(TRACKING_STATUSES, 'archived');

    expect(value).toEqual({ unrecognized: 'archived' });
    expect(isUnrecognized(value)).toBe(true);
    expect(variantText(value)).toBe('archived');
  });

  it('compares case-sensitively', () => {
    expect(toVariant(TRACKING_STATUSES, 'Final')).toEqual(unrecognized('Final'));
  });

  it('only treats single-key objects as unrecognized values', () => {
    expect(isUnrecognized({ unrecognized: 'x', extra: 1 })).toBe(false);
    expect(isUnrecognized({ unrecognized: 1 })).toBe(false);
    expect(isUnrecognized('final')).toBe(false);
  });
});

describe('csafSchema', () => {
  it('builds each mode once', () => {
    expect(csafSchema({ strict: true })).toBe(csafSchema({ strict: true }));
    expect(csafSchema()).toBe(csafSchema({ strict: false }));
    expect(csafSchema({ strict: true })).not.toBe(csafSchema());
  });
});

/**
 * csafkit - Branch forest decoding
 *
 * Branches nest without limit, so the forest is decoded node by node on an
 * explicit stack instead of through the recursive schema.
 */

import { z } from 'zod';
import type { Branch } from '../model/index.js';
import { branchNodeSchema, type SchemaMode } from '../schema/index.js';
import { extendPath, pathSegments, type PathLink } from './errors.js';

export type BranchForestResult = { ok: true; branches: Branch[] } | { ok: false; issue: z.ZodIssue };

const childList = z.array(z.unknown());

interface Pending {
  raw: unknown;
  path: PathLink;
  /** Array the decoded branch is appended to */
  siblings: Branch[];
}

function relocate(issue: z.ZodIssue, at: PathLink): z.ZodIssue {
  return { ...issue, path: [...pathSegments(at), ...issue.path] };
}

function childrenOf(raw: unknown): unknown {
  return typeof raw === 'object' && raw !== null && 'branches' in raw ? raw.branches : undefined;
}

/**
 * Push a list's elements so they pop in document order
 */
function pushAll(stack: Pending[], items: unknown[], listPath: PathLink, siblings: Branch[]): void {
  for (let i = items.length - 1; i >= 0; i--) {
    stack.push({ raw: items[i], path: extendPath(listPath, i), siblings });
  }
}

/**
 * Decode a raw `branches` value found at `at`. Branches are checked in
 * document order, each before its children; the first issue is returned.
 */
export function decodeBranchForest(raw: unknown, at: PathLink, mode: SchemaMode): BranchForestResult {
  const forest = childList.safeParse(raw);
  if (!forest.success) {
    return { ok: false, issue: relocate(forest.error.issues[0], at) };
  }

  const node = branchNodeSchema(mode);
  const roots: Branch[] = [];
  const stack: Pending[] = [];
  pushAll(stack, forest.data, at, roots);

  for (let item = stack.pop(); item; item = stack.pop()) {
    const decoded = node.safeParse(item.raw);
    if (!decoded.success) {
      return { ok: false, issue: relocate(decoded.error.issues[0], item.path) };
    }
    const branch: Branch = { ...decoded.data };
    item.siblings.push(branch);

    const children = childrenOf(item.raw);
    if (children === undefined) {
      continue;
    }
    const childPath = extendPath(item.path, 'branches');
    const list = childList.safeParse(children);
    if (!list.success) {
      return { ok: false, issue: relocate(list.error.issues[0], childPath) };
    }
    branch.branches = [];
    pushAll(stack, list.data, childPath, branch.branches);
  }

  return { ok: true, branches: roots };
}

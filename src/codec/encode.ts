/**
 * csafkit - Ordered encoder
 *
 * Walks a value alongside its schema so keys come out in declared field
 * order regardless of how the in-memory object was assembled. Absent, null
 * and undefined fields are skipped; unrecognized enum values emit their
 * original text.
 *
 * Text is written straight from an explicit work stack, laid out exactly as
 * `JSON.stringify(tree, null, indent)` would lay it out.
 */

import { z } from 'zod';
import { isUnrecognized } from '../enums/index.js';
import { extendPath, formatPath, pathSegments, type PathLink } from './errors.js';

type Task =
  | { kind: 'node'; schema: z.ZodTypeAny; value: unknown; path: PathLink | undefined; depth: number }
  | { kind: 'text'; text: string };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAbsent(value: unknown): boolean {
  return value === undefined || value === null;
}

function unencodable(path: PathLink | undefined, expected: string, value: unknown): TypeError {
  const found = value === null ? 'null' : Array.isArray(value) ? 'array' : typeof value;
  return new TypeError(`Cannot encode ${found} at '${formatPath(pathSegments(path))}': expected ${expected}`);
}

/**
 * Strip optional, transform and lazy wrappers down to the structural schema
 */
function unwrap(schema: z.ZodTypeAny): z.ZodTypeAny {
  let current = schema;
  for (;;) {
    if (current instanceof z.ZodOptional) {
      current = current.unwrap();
    } else if (current instanceof z.ZodEffects) {
      current = current.innerType();
    } else if (current instanceof z.ZodLazy) {
      current = current.schema;
    } else {
      return current;
    }
  }
}

function leafText(schema: z.ZodTypeAny, value: unknown, path: PathLink | undefined): string {
  if (schema instanceof z.ZodString) {
    if (typeof value !== 'string') {
      throw unencodable(path, 'string', value);
    }
    return JSON.stringify(value);
  }
  if (schema instanceof z.ZodNumber) {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw unencodable(path, 'finite number', value);
    }
    return JSON.stringify(value);
  }
  if (schema instanceof z.ZodBoolean) {
    if (typeof value !== 'boolean') {
      throw unencodable(path, 'boolean', value);
    }
    return value ? 'true' : 'false';
  }
  throw new TypeError(`No encoder for schema at '${formatPath(pathSegments(path))}'`);
}

/**
 * Encode a value as JSON text ordered by the schema
 */
export function writeWithSchema(schema: z.ZodTypeAny, value: unknown, indent: number): string {
  if (isAbsent(value)) {
    throw unencodable(undefined, 'value', value);
  }

  const unit = ' '.repeat(indent);
  const newline = indent > 0 ? '\n' : '';
  const colon = indent > 0 ? ': ' : ':';
  const margin = (depth: number): string => unit.repeat(depth);

  const out: string[] = [];
  const stack: Task[] = [{ kind: 'node', schema, value, path: undefined, depth: 0 }];

  for (let task = stack.pop(); task; task = stack.pop()) {
    if (task.kind === 'text') {
      out.push(task.text);
      continue;
    }

    const { value: current, path, depth } = task;
    if (isUnrecognized(current)) {
      out.push(JSON.stringify(current.unrecognized));
      continue;
    }

    const node = unwrap(task.schema);

    if (node instanceof z.ZodObject) {
      if (!isRecord(current)) {
        throw unencodable(path, 'object', current);
      }
      const shape: Record<string, z.ZodTypeAny> = node.shape;
      const fields = Object.entries(shape).filter(([key]) => !isAbsent(current[key]));
      if (fields.length === 0) {
        out.push('{}');
        continue;
      }
      const inner = margin(depth + 1);
      stack.push({ kind: 'text', text: newline + margin(depth) + '}' });
      for (let i = fields.length - 1; i >= 0; i--) {
        const [key, field] = fields[i];
        stack.push({ kind: 'node', schema: field, value: current[key], path: extendPath(path, key), depth: depth + 1 });
        stack.push({ kind: 'text', text: (i === 0 ? '{' : ',') + newline + inner + JSON.stringify(key) + colon });
      }
      continue;
    }

    if (node instanceof z.ZodArray) {
      if (!Array.isArray(current)) {
        throw unencodable(path, 'array', current);
      }
      if (current.length === 0) {
        out.push('[]');
        continue;
      }
      const hole = current.findIndex(isAbsent);
      if (hole !== -1) {
        throw unencodable(extendPath(path, hole), 'array element', current[hole]);
      }
      const element: z.ZodTypeAny = node.element;
      const inner = margin(depth + 1);
      stack.push({ kind: 'text', text: newline + margin(depth) + ']' });
      for (let i = current.length - 1; i >= 0; i--) {
        const item: unknown = current[i];
        stack.push({ kind: 'node', schema: element, value: item, path: extendPath(path, i), depth: depth + 1 });
        stack.push({ kind: 'text', text: (i === 0 ? '[' : ',') + newline + inner });
      }
      continue;
    }

    out.push(leafText(node, current, path));
  }

  try {
    return out.join('');
  } catch (err) {
    if (err instanceof RangeError) {
      throw new Error('Encoded document exceeds the maximum string length', { cause: err });
    }
    throw err;
  }
}

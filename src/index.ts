/**
 * csafkit - CSAF 2.0 advisory model
 *
 * @example
 * ```typescript
 * import { parse, serialize, fromMinimalAdvisory } from 'csafkit';
 *
 * // Round trip
 * const result = parse(bytes);
 * if (result.ok) {
 *   result.value.document.tracking.version = '2';
 *   const text = serialize(result.value);
 * }
 *
 * // RustSec -> CSAF
 * const csaf = fromMinimalAdvisory(advisory, { interop: { publisher } });
 * ```
 */

// Serialization
export {
  parse,
  parseOrThrow,
  serialize,
  serializeToBytes,
  canonicalize,
  ParseError,
  formatPath,
  normalizeTimestamp,
  datePart,
} from './codec/index.js';
export type {
  ParseOptions,
  SerializeOptions,
  ParseResult,
  ParseWarning,
  ParseErrorDetail,
  ParseErrorKind,
} from './codec/index.js';

// Model
export { walkBranches, collectProducts, findProduct } from './model/index.js';
export type { Csaf, BranchVisit } from './model/index.js';
export type * from './model/document.js';
export type * from './model/product-tree.js';
export type * from './model/vulnerability.js';

// Code sets
export * from './enums/index.js';

// Interop
export {
  fromMinimalAdvisory,
  toMinimalAdvisory,
  toMinimalAdvisoryOrThrow,
  InteropError,
} from './interop/index.js';
export type {
  InteropResult,
  InteropErrorDetail,
  AdvisoryVersions,
  MinimalAdvisory,
} from './interop/index.js';

// CVSS
export {
  parseCvssV3Vector,
  cvssV3BaseScore,
  cvssV3Severity,
  cvssV3FromVector,
  CvssError,
} from './cvss/index.js';
export type { CvssV3Metrics } from './cvss/index.js';

// Configuration
export {
  ConfigError,
  DEFAULT_CONFIG,
  MAX_INDENT,
  mergeConfig,
  resolveConfig,
  validateConfig,
} from './config/index.js';
export type { CsafkitConfig, InteropConfig, ResolvedConfig } from './config/index.js';

// Schemas
export { csafSchema } from './schema/index.js';
export type { CsafSchema, SchemaMode } from './schema/index.js';

export { VERSION } from './version.js';

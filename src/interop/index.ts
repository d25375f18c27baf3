/**
 * csafkit - Interop Module
 */

export { fromMinimalAdvisory, toMinimalAdvisory, toMinimalAdvisoryOrThrow } from './rustsec.js';
export type { InteropResult } from './rustsec.js';
export { InteropError } from './errors.js';
export type { InteropErrorDetail } from './errors.js';
export type { AdvisoryVersions, MinimalAdvisory } from './types.js';

/**
 * CVSS v3.x base scoring
 *
 * Based on the FIRST CVSS v3.1 Specification Document, section 7
 * https://www.first.org/cvss/v3.1/specification-document
 */

import type { CvssSeverity, CvssV3Version } from '../enums/index.js';
import type { CvssV3 } from '../model/index.js';

// =============================================================================
// Base Metrics
// =============================================================================

/** Attack Vector (AV) */
export type AttackVector = 'N' | 'A' | 'L' | 'P';
/** Attack Complexity (AC) */
export type AttackComplexity = 'L' | 'H';
/** Privileges Required (PR) */
export type PrivilegesRequired = 'N' | 'L' | 'H';
/** User Interaction (UI) */
export type UserInteraction = 'N' | 'R';
/** Scope (S) */
export type Scope = 'U' | 'C';
/** Confidentiality / Integrity / Availability impact */
export type Impact = 'H' | 'L' | 'N';

export interface CvssV3Metrics {
  version: CvssV3Version;
  AV: AttackVector;
  AC: AttackComplexity;
  PR: PrivilegesRequired;
  UI: UserInteraction;
  S: Scope;
  C: Impact;
  I: Impact;
  A: Impact;
}

export class CvssError extends Error {
  readonly vector: string;

  constructor(vector: string, reason: string) {
    super(`Invalid CVSS v3 vector "${vector}": ${reason}`);
    this.name = 'CvssError';
    this.vector = vector;
  }
}

const ATTACK_VECTOR: Record<AttackVector, number> = { N: 0.85, A: 0.62, L: 0.55, P: 0.2 };
const ATTACK_COMPLEXITY: Record<AttackComplexity, number> = { L: 0.77, H: 0.44 };
const PRIVILEGES_UNCHANGED: Record<PrivilegesRequired, number> = { N: 0.85, L: 0.62, H: 0.27 };
const PRIVILEGES_CHANGED: Record<PrivilegesRequired, number> = { N: 0.85, L: 0.68, H: 0.5 };
const USER_INTERACTION: Record<UserInteraction, number> = { N: 0.85, R: 0.62 };
const IMPACT: Record<Impact, number> = { H: 0.56, L: 0.22, N: 0 };

const ATTACK_VECTOR_NAMES: Record<AttackVector, string> = {
  N: 'NETWORK',
  A: 'ADJACENT_NETWORK',
  L: 'LOCAL',
  P: 'PHYSICAL',
};

function isMetricValue<T extends string>(allowed: Record<T, number>, value: string): value is T {
  return Object.prototype.hasOwnProperty.call(allowed, value);
}

function pick<T extends string>(allowed: Record<T, number>, value: string | undefined): T | undefined {
  return value !== undefined && isMetricValue(allowed, value) ? value : undefined;
}

/**
 * Parse a `CVSS:3.x/AV:../AC:../...` vector. All eight base metrics must be
 * present exactly once; temporal and environmental metrics are ignored.
 */
export function parseCvssV3Vector(vector: string): CvssV3Metrics {
  const [prefix, ...parts] = vector.split('/');
  const version = prefix === 'CVSS:3.1' ? '3.1' : prefix === 'CVSS:3.0' ? '3.0' : undefined;
  if (!version) {
    throw new CvssError(vector, `unsupported prefix "${prefix}"`);
  }

  const seen = new Map<string, string>();
  for (const part of parts) {
    const [name, value, extra] = part.split(':');
    if (!name || value === undefined || extra !== undefined) {
      throw new CvssError(vector, `malformed component "${part}"`);
    }
    if (seen.has(name)) {
      throw new CvssError(vector, `duplicate metric ${name}`);
    }
    seen.set(name, value);
  }

  const AV = pick(ATTACK_VECTOR, seen.get('AV'));
  const AC = pick(ATTACK_COMPLEXITY, seen.get('AC'));
  const PR = pick(PRIVILEGES_UNCHANGED, seen.get('PR'));
  const UI = pick(USER_INTERACTION, seen.get('UI'));
  const S = pick({ U: 0, C: 1 }, seen.get('S'));
  const C = pick(IMPACT, seen.get('C'));
  const I = pick(IMPACT, seen.get('I'));
  const A = pick(IMPACT, seen.get('A'));

  if (!AV) throw new CvssError(vector, 'missing or invalid AV');
  if (!AC) throw new CvssError(vector, 'missing or invalid AC');
  if (!PR) throw new CvssError(vector, 'missing or invalid PR');
  if (!UI) throw new CvssError(vector, 'missing or invalid UI');
  if (!S) throw new CvssError(vector, 'missing or invalid S');
  if (!C) throw new CvssError(vector, 'missing or invalid C');
  if (!I) throw new CvssError(vector, 'missing or invalid I');
  if (!A) throw new CvssError(vector, 'missing or invalid A');

  return { version, AV, AC, PR, UI, S, C, I, A };
}

/**
 * v3.1 Roundup: smallest one-decimal number >= input, computed on integers
 * to avoid floating point artifacts
 */
function roundUp31(value: number): number {
  const intInput = Math.round(value * 100000);
  if (intInput % 10000 === 0) {
    return intInput / 100000;
  }
  return (Math.floor(intInput / 10000) + 1) / 10;
}

function roundUp30(value: number): number {
  return Math.ceil(value * 10) / 10;
}

export function cvssV3BaseScore(metrics: CvssV3Metrics): number {
  const roundUp = metrics.version === '3.1' ? roundUp31 : roundUp30;
  const changed = metrics.S === 'C';

  const iss = 1 - (1 - IMPACT[metrics.C]) * (1 - IMPACT[metrics.I]) * (1 - IMPACT[metrics.A]);
  const impact = changed ? 7.52 * (iss - 0.029) - 3.25 * Math.pow(iss - 0.02, 15) : 6.42 * iss;
  const privileges = (changed ? PRIVILEGES_CHANGED : PRIVILEGES_UNCHANGED)[metrics.PR];
  const exploitability =
    8.22 * ATTACK_VECTOR[metrics.AV] * ATTACK_COMPLEXITY[metrics.AC] * privileges * USER_INTERACTION[metrics.UI];

  if (impact <= 0) {
    return 0;
  }
  return changed
    ? roundUp(Math.min(1.08 * (impact + exploitability), 10))
    : roundUp(Math.min(impact + exploitability, 10));
}

/**
 * Qualitative severity rating scale
 */
export function cvssV3Severity(score: number): CvssSeverity {
  if (score === 0) return 'NONE';
  if (score < 4) return 'LOW';
  if (score < 7) return 'MEDIUM';
  if (score < 9) return 'HIGH';
  return 'CRITICAL';
}

function impactName(value: Impact): string {
  return value === 'N' ? 'NONE' : value === 'L' ? 'LOW' : 'HIGH';
}

/**
 * Build a CSAF `cvss_v3` object, base metrics spelled out, from a vector
 */
export function cvssV3FromVector(vector: string): CvssV3 {
  const metrics = parseCvssV3Vector(vector);
  const baseScore = cvssV3BaseScore(metrics);

  return {
    version: metrics.version,
    vectorString: vector,
    baseScore,
    baseSeverity: cvssV3Severity(baseScore),
    attackVector: ATTACK_VECTOR_NAMES[metrics.AV],
    attackComplexity: metrics.AC === 'L' ? 'LOW' : 'HIGH',
    privilegesRequired: metrics.PR === 'N' ? 'NONE' : metrics.PR === 'L' ? 'LOW' : 'HIGH',
    userInteraction: metrics.UI === 'N' ? 'NONE' : 'REQUIRED',
    scope: metrics.S === 'U' ? 'UNCHANGED' : 'CHANGED',
    confidentialityImpact: impactName(metrics.C),
    integrityImpact: impactName(metrics.I),
    availabilityImpact: impactName(metrics.A),
  };
}

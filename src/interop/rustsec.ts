/**
 * csafkit - RustSec <-> CSAF conversion
 *
 * The forward direction synthesizes the document scaffolding CSAF requires:
 * publisher and language from the interop config, a single revision, and a
 * `tracking.generator` naming this library on every converted document.
 * Aliases are kept in `ids` in their original order, and each keyword is its
 * own note, so both come back unchanged.
 *
 * The reverse direction is a projection: it recovers the advisory fields and
 * ignores everything else, so CSAF -> RustSec -> CSAF is not an identity.
 */

import { datePart, normalizeTimestamp } from '../codec/timestamp.js';
import { resolveConfig, type CsafkitConfig } from '../config/index.js';
import { CvssError, cvssV3FromVector } from '../cvss/index.js';
import { variantText } from '../enums/index.js';
import {
  collectProducts,
  walkBranches,
  type Branch,
  type Csaf,
  type Note,
  type ProductStatus,
  type Reference,
  type Remediation,
  type Score,
  type Vulnerability,
} from '../model/index.js';
import { NAME, VERSION } from '../version.js';
import { InteropError } from './errors.js';
import type { MinimalAdvisory } from './types.js';

export type InteropResult = { ok: true; value: MinimalAdvisory } | { ok: false; error: InteropError };

const KEYWORD_TITLE = 'Keyword';

// ============================================================
// Helpers
// ============================================================

function requireTimestamp(name: string, text: string): string {
  const normalized = normalizeTimestamp(text);
  if (normalized === undefined) {
    throw new InteropError({ kind: 'invalid_field', name, reason: `not a date: "${text}"` });
  }
  return normalized;
}

function rangeProductId(pkg: string, range: string): string {
  return `${pkg}@${range}`;
}

/**
 * Alias prefix used as the ID system name (GHSA-xxxx -> GHSA)
 */
function aliasSystem(alias: string): string {
  const dash = alias.indexOf('-');
  return dash > 0 ? alias.slice(0, dash) : 'alias';
}

function unique(values: readonly string[]): string[] {
  return [...new Set(values)];
}

// ============================================================
// RustSec -> CSAF
// ============================================================

function buildVulnerability(advisory: MinimalAdvisory): Vulnerability {
  const pkg = advisory.package;
  const aliases = advisory.aliases ?? [];
  const cve = aliases.find(alias => alias.startsWith('CVE-'));
  const patched = unique(advisory.versions.patched);
  const unaffected = unique(advisory.versions.unaffected);

  const notes: Note[] = [];
  if (advisory.description !== undefined) {
    notes.push({ category: 'description', text: advisory.description, title: 'Description' });
  }
  for (const keyword of advisory.keywords ?? []) {
    notes.push({ category: 'other', text: keyword, title: KEYWORD_TITLE });
  }

  const references: Reference[] = (advisory.references ?? []).map((url): Reference => ({
    category: 'external',
    summary: url,
    url,
  }));

  const productStatus: ProductStatus = {
    known_affected: [pkg],
    ...(patched.length > 0 ? { fixed: patched.map(range => rangeProductId(pkg, range)) } : {}),
    ...(unaffected.length > 0 ? { known_not_affected: unaffected.map(range => rangeProductId(pkg, range)) } : {}),
  };

  const remediations: Remediation[] = [];
  if (patched.length > 0) {
    remediations.push({
      category: 'vendor_fix',
      details: `Upgrade ${pkg} to a version matching ${patched.join(' or ')}`,
      product_ids: [pkg],
    });
  }

  const scores: Score[] = [];
  if (advisory.cvss !== undefined) {
    try {
      scores.push({ cvss_v3: cvssV3FromVector(advisory.cvss), products: [pkg] });
    } catch (err) {
      if (err instanceof CvssError) {
        throw new InteropError({ kind: 'invalid_field', name: 'cvss', reason: err.message });
      }
      throw err;
    }
  }

  return {
    ...(cve !== undefined ? { cve } : {}),
    ...(aliases.length > 0 ? { ids: aliases.map(alias => ({ system_name: aliasSystem(alias), text: alias })) } : {}),
    ...(notes.length > 0 ? { notes } : {}),
    product_status: productStatus,
    ...(references.length > 0 ? { references } : {}),
    ...(remediations.length > 0 ? { remediations } : {}),
    ...(scores.length > 0 ? { scores } : {}),
    title: advisory.title,
  };
}

function buildBranches(advisory: MinimalAdvisory): Branch[] {
  const pkg = advisory.package;
  const ranges = unique([...advisory.versions.patched, ...advisory.versions.unaffected]);

  const rangeBranches: Branch[] = ranges.map((range): Branch => ({
    category: 'product_version_range',
    name: range,
    product: { name: `${pkg} ${range}`, product_id: rangeProductId(pkg, range) },
  }));

  return [
    {
      ...(rangeBranches.length > 0 ? { branches: rangeBranches } : {}),
      category: 'product_name',
      name: pkg,
      product: { name: pkg, product_id: pkg },
    },
  ];
}

/**
 * Convert a RustSec advisory into a CSAF security advisory. The publisher
 * comes from `config.interop.publisher`, which must be set.
 */
export function fromMinimalAdvisory(advisory: MinimalAdvisory, config: CsafkitConfig = {}): Csaf {
  const { interop } = resolveConfig(config);
  const publisher = interop.publisher;
  if (publisher === undefined) {
    throw new InteropError({ kind: 'invalid_field', name: 'interop.publisher', reason: 'no publisher configured' });
  }

  const date = requireTimestamp('date', advisory.date);
  const withdrawn = advisory.withdrawn !== undefined ? requireTimestamp('withdrawn', advisory.withdrawn) : undefined;

  const references: Reference[] =
    advisory.url !== undefined ? [{ category: 'self', summary: 'Canonical advisory URL', url: advisory.url }] : [];

  return {
    document: {
      category: 'csaf_security_advisory',
      csaf_version: '2.0',
      ...(interop.lang !== undefined ? { lang: interop.lang } : {}),
      publisher: { ...publisher },
      ...(references.length > 0 ? { references } : {}),
      title: advisory.title,
      tracking: {
        ...(advisory.related && advisory.related.length > 0 ? { aliases: unique(advisory.related) } : {}),
        current_release_date: withdrawn ?? date,
        generator: { engine: { name: NAME, version: VERSION } },
        id: advisory.id,
        initial_release_date: date,
        revision_history: [{ date, number: '1', summary: 'Initial version.' }],
        status: withdrawn !== undefined ? 'withdrawn' : 'final',
        version: '1',
      },
    },
    product_tree: { branches: buildBranches(advisory) },
    vulnerabilities: [buildVulnerability(advisory)],
  };
}

// ============================================================
// CSAF -> RustSec
// ============================================================

function missing(name: string): InteropError {
  return new InteropError({ kind: 'missing_required_field', name });
}

function findPackageBranch(csaf: Csaf): Branch | undefined {
  for (const { branch } of walkBranches(csaf.product_tree?.branches ?? [])) {
    if (variantText(branch.category) === 'product_name') {
      return branch;
    }
  }
  return undefined;
}

function recoverVersions(branch: Branch | undefined, status: ProductStatus | undefined): MinimalAdvisory['versions'] {
  const patched: string[] = [];
  const unaffected: string[] = [];
  const fixed = new Set(status?.fixed ?? []);
  const notAffected = new Set(status?.known_not_affected ?? []);

  for (const { branch: child } of walkBranches(branch?.branches ?? [])) {
    if (variantText(child.category) !== 'product_version_range' || !child.product) {
      continue;
    }
    if (fixed.has(child.product.product_id)) {
      patched.push(child.name);
    }
    if (notAffected.has(child.product.product_id)) {
      unaffected.push(child.name);
    }
  }

  return { patched, unaffected };
}

function findNote(notes: readonly Note[] | undefined, match: (note: Note) => boolean): Note | undefined {
  return notes?.find(match);
}

function extract(csaf: Csaf): MinimalAdvisory {
  const vulnerabilities = csaf.vulnerabilities ?? [];
  if (vulnerabilities.length > 1) {
    throw new InteropError({ kind: 'multiple_vulnerabilities', count: vulnerabilities.length });
  }
  const [vuln] = vulnerabilities;
  if (!vuln) {
    throw missing('vulnerabilities');
  }

  const { document } = csaf;
  const id = document.tracking.id.trim();
  if (id === '') throw missing('id');
  const title = document.title.trim();
  if (title === '') throw missing('title');

  const rawDate = document.tracking.revision_history[0]?.date ?? document.tracking.initial_release_date;
  const date = normalizeTimestamp(rawDate);
  if (date === undefined) throw missing('date');

  const packageBranch = findPackageBranch(csaf);
  const pkg = packageBranch?.name ?? collectProducts(csaf.product_tree ?? {})[0]?.name;
  if (pkg === undefined || pkg.trim() === '') throw missing('package');

  const related = document.tracking.aliases ?? [];
  const ids = (vuln.ids ?? []).map(entry => entry.text);
  const aliases = vuln.cve !== undefined && !ids.includes(vuln.cve) ? [vuln.cve, ...ids] : ids;
  const references = (vuln.references ?? [])
    .filter(ref => ref.category === undefined || variantText(ref.category) === 'external')
    .map(ref => ref.url);
  const url = document.references?.find(ref => ref.category !== undefined && variantText(ref.category) === 'self')?.url;

  const description =
    findNote(vuln.notes, note => variantText(note.category) === 'description') ??
    findNote(document.notes, note => variantText(note.category) === 'description');
  const keywords = (vuln.notes ?? []).filter(note => note.title === KEYWORD_TITLE).map(note => note.text);
  const cvss = vuln.scores?.find(score => score.cvss_v3 !== undefined)?.cvss_v3?.vectorString;

  const status = variantText(document.tracking.status);
  const withdrawnAt = normalizeTimestamp(document.tracking.current_release_date);
  const withdrawn = status === 'withdrawn' && withdrawnAt !== undefined ? datePart(withdrawnAt) : undefined;

  return {
    id,
    package: pkg,
    title,
    ...(description !== undefined ? { description: description.text } : {}),
    date: datePart(date),
    ...(aliases.length > 0 ? { aliases } : {}),
    ...(related.length > 0 ? { related: [...related] } : {}),
    ...(references.length > 0 ? { references } : {}),
    ...(url !== undefined ? { url } : {}),
    ...(cvss !== undefined ? { cvss } : {}),
    ...(keywords.length > 0 ? { keywords } : {}),
    ...(withdrawn !== undefined ? { withdrawn } : {}),
    versions: recoverVersions(packageBranch, vuln.product_status),
  };
}

/**
 * Project a single-vulnerability CSAF document onto a RustSec advisory
 */
export function toMinimalAdvisory(csaf: Csaf): InteropResult {
  try {
    return { ok: true, value: extract(csaf) };
  } catch (err) {
    if (err instanceof InteropError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}

export function toMinimalAdvisoryOrThrow(csaf: Csaf): MinimalAdvisory {
  const result = toMinimalAdvisory(csaf);
  if (!result.ok) {
    throw result.error;
  }
  return result.value;
}

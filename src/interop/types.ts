/**
 * RustSec advisory shape
 * https://github.com/rustsec/advisory-db
 */

/**
 * Semver requirement lists from the advisory's `[versions]` table
 */
export interface AdvisoryVersions {
  patched: string[];
  unaffected: string[];
}

export interface MinimalAdvisory {
  id: string;                // RUSTSEC-2021-0001
  package: string;           // crate name
  title: string;
  description?: string;
  date: string;              // YYYY-MM-DD
  aliases?: string[];        // CVE / GHSA IDs
  related?: string[];        // advisories for the same issue elsewhere
  references?: string[];     // URLs
  url?: string;              // canonical advisory URL
  cvss?: string;             // CVSS v3 vector, the advisory's severity
  keywords?: string[];
  withdrawn?: string;        // YYYY-MM-DD
  versions: AdvisoryVersions;
}


/**
 * csafkit - Code Sets
 *
 * Every CSAF enumeration is open: texts outside the known list decode to an
 * `Unrecognized` value that keeps the original text, so documents written
 * against a newer schema revision still load and re-serialize unchanged.
 */

// ============================================================
// Open enum machinery
// ============================================================

/**
 * Catch-all arm for enum text that is not in the known list
 */
export interface Unrecognized {
  readonly unrecognized: string;
}

/**
 * A known variant or the verbatim unrecognized text
 */
export type Open<K extends string> = K | Unrecognized;

export function unrecognized(text: string): Unrecognized {
  return { unrecognized: text };
}

export function isUnrecognized(value: unknown): value is Unrecognized {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.keys(value).length === 1 &&
    'unrecognized' in value &&
    typeof value.unrecognized === 'string'
  );
}

/**
 * Wire text of an open enum value
 */
export function variantText<K extends string>(value: Open<K>): string {
  return typeof value === 'string' ? value : value.unrecognized;
}

export function isKnownVariant<K extends string>(values: readonly K[], text: string): text is K {
  const known: readonly string[] = values;
  return known.includes(text);
}

/**
 * Map wire text to a known variant or wrap it as unrecognized
 */
export function toVariant<K extends string>(values: readonly K[], text: string): Open<K> {
  return isKnownVariant(values, text) ? text : unrecognized(text);
}

// ============================================================
// Document
// ============================================================

export const DOCUMENT_CATEGORIES = [
  'csaf_base',
  'csaf_security_advisory',
  'csaf_vex',
  'csaf_informational_advisory',
  'csaf_security_incident_response',
  'generic_csaf',
] as const;
export type DocumentCategory = (typeof DOCUMENT_CATEGORIES)[number];

export const CSAF_VERSIONS = ['2.0'] as const;
export type CsafVersion = (typeof CSAF_VERSIONS)[number];

export const PUBLISHER_CATEGORIES = [
  'coordinator',
  'discoverer',
  'other',
  'translator',
  'user',
  'vendor',
] as const;
export type PublisherCategory = (typeof PUBLISHER_CATEGORIES)[number];

// `withdrawn` marks advisories converted from withdrawn RustSec entries
export const TRACKING_STATUSES = ['draft', 'final', 'interim', 'withdrawn'] as const;
export type TrackingStatus = (typeof TRACKING_STATUSES)[number];

export const TLP_LABELS = ['AMBER', 'GREEN', 'RED', 'WHITE'] as const;
export type TlpLabel = (typeof TLP_LABELS)[number];

export const NOTE_CATEGORIES = [
  'description',
  'details',
  'faq',
  'general',
  'legal_disclaimer',
  'other',
  'summary',
] as const;
export type NoteCategory = (typeof NOTE_CATEGORIES)[number];

export const REFERENCE_CATEGORIES = ['external', 'self'] as const;
export type ReferenceCategory = (typeof REFERENCE_CATEGORIES)[number];

// ============================================================
// Product tree
// ============================================================

export const BRANCH_CATEGORIES = [
  'architecture',
  'host_name',
  'language',
  'legacy',
  'patch_level',
  'product_family',
  'product_name',
  'product_version',
  'product_version_range',
  'service_pack',
  'specification',
  'vendor',
] as const;
export type BranchCategory = (typeof BRANCH_CATEGORIES)[number];

export const RELATIONSHIP_CATEGORIES = [
  'default_component_of',
  'external_component_of',
  'installed_on',
  'installed_with',
  'optional_component_of',
] as const;
export type RelationshipCategory = (typeof RELATIONSHIP_CATEGORIES)[number];

// ============================================================
// Vulnerabilities
// ============================================================

export const PRODUCT_STATUS_CATEGORIES = [
  'first_affected',
  'first_fixed',
  'fixed',
  'known_affected',
  'known_not_affected',
  'last_affected',
  'recommended',
  'under_investigation',
] as const;
export type ProductStatusCategory = (typeof PRODUCT_STATUS_CATEGORIES)[number];

export const REMEDIATION_CATEGORIES = [
  'mitigation',
  'no_fix_planned',
  'none_available',
  'vendor_fix',
  'workaround',
] as const;
export type RemediationCategory = (typeof REMEDIATION_CATEGORIES)[number];

export const RESTART_CATEGORIES = [
  'connected',
  'dependencies',
  'machine',
  'none',
  'parent',
  'service',
  'system',
  'vulnerable_service',
  'zone',
] as const;
export type RestartCategory = (typeof RESTART_CATEGORIES)[number];

export const FLAG_LABELS = [
  'component_not_present',
  'inline_mitigations_already_exist',
  'vulnerable_code_cannot_be_controlled_by_adversary',
  'vulnerable_code_not_in_execute_path',
  'vulnerable_code_not_present',
] as const;
export type FlagLabel = (typeof FLAG_LABELS)[number];

export const INVOLVEMENT_PARTIES = ['coordinator', 'discoverer', 'other', 'user', 'vendor'] as const;
export type InvolvementParty = (typeof INVOLVEMENT_PARTIES)[number];

export const INVOLVEMENT_STATUSES = [
  'completed',
  'contact_attempted',
  'disputed',
  'in_progress',
  'not_contacted',
  'open',
] as const;
export type InvolvementStatus = (typeof INVOLVEMENT_STATUSES)[number];

export const THREAT_CATEGORIES = ['exploit_status', 'impact', 'target_set'] as const;
export type ThreatCategory = (typeof THREAT_CATEGORIES)[number];

// ============================================================
// Scores
// ============================================================

export const CVSS_SEVERITIES = ['NONE', 'LOW', 'MEDIUM', 'HIGH', 'CRITICAL'] as const;
export type CvssSeverity = (typeof CVSS_SEVERITIES)[number];

export const CVSS_V3_VERSIONS = ['3.0', '3.1'] as const;
export type CvssV3Version = (typeof CVSS_V3_VERSIONS)[number];

export const CVSS_V2_VERSIONS = ['2.0'] as const;
export type CvssV2Version = (typeof CVSS_V2_VERSIONS)[number];

/**
 * csafkit - Vulnerabilities
 */

import type {
  CvssSeverity,
  CvssV2Version,
  CvssV3Version,
  FlagLabel,
  InvolvementParty,
  InvolvementStatus,
  Open,
  RemediationCategory,
  RestartCategory,
  ThreatCategory,
} from '../enums/index.js';
import type { Acknowledgment, Note, Reference, Timestamp } from './document.js';
import type { ProductGroupId, ProductId } from './product-tree.js';

export interface Cwe {
  id: string;
  name: string;
}

export interface Flag {
  date?: Timestamp;
  group_ids?: ProductGroupId[];
  label: Open<FlagLabel>;
  product_ids?: ProductId[];
}

export interface VulnerabilityId {
  system_name: string;
  text: string;
}

export interface Involvement {
  date?: Timestamp;
  party: Open<InvolvementParty>;
  status: Open<InvolvementStatus>;
  summary?: string;
}

/**
 * Status category -> product IDs. Each list is a set: duplicates collapse on
 * decode and its order carries no meaning.
 */
export interface ProductStatus {
  first_affected?: ProductId[];
  first_fixed?: ProductId[];
  fixed?: ProductId[];
  known_affected?: ProductId[];
  known_not_affected?: ProductId[];
  last_affected?: ProductId[];
  recommended?: ProductId[];
  under_investigation?: ProductId[];
}

export interface RestartRequired {
  category: Open<RestartCategory>;
  details?: string;
}

export interface Remediation {
  category: Open<RemediationCategory>;
  date?: Timestamp;
  details: string;
  entitlements?: string[];
  group_ids?: ProductGroupId[];
  product_ids?: ProductId[];
  restart_required?: RestartRequired;
  url?: string;
}

export interface CvssV2 {
  version: Open<CvssV2Version>;
  vectorString: string;
  baseScore: number;
  accessVector?: string;
  accessComplexity?: string;
  authentication?: string;
  confidentialityImpact?: string;
  integrityImpact?: string;
  availabilityImpact?: string;
  temporalScore?: number;
  environmentalScore?: number;
}

export interface CvssV3 {
  version: Open<CvssV3Version>;
  vectorString: string;
  baseScore: number;
  baseSeverity: Open<CvssSeverity>;
  attackVector?: string;
  attackComplexity?: string;
  privilegesRequired?: string;
  userInteraction?: string;
  scope?: string;
  confidentialityImpact?: string;
  integrityImpact?: string;
  availabilityImpact?: string;
  temporalScore?: number;
  temporalSeverity?: Open<CvssSeverity>;
  environmentalScore?: number;
  environmentalSeverity?: Open<CvssSeverity>;
}

export interface Score {
  cvss_v2?: CvssV2;
  cvss_v3?: CvssV3;
  products: ProductId[];
}

export interface Threat {
  category: Open<ThreatCategory>;
  date?: Timestamp;
  details: string;
  group_ids?: ProductGroupId[];
  product_ids?: ProductId[];
}

export interface Vulnerability {
  acknowledgments?: Acknowledgment[];
  cve?: string;
  cwe?: Cwe;
  discovery_date?: Timestamp;
  flags?: Flag[];
  ids?: VulnerabilityId[];
  involvements?: Involvement[];
  notes?: Note[];
  product_status?: ProductStatus;
  references?: Reference[];
  release_date?: Timestamp;
  remediations?: Remediation[];
  scores?: Score[];
  threats?: Threat[];
  title?: string;
}

/**
 * csafkit - Vulnerability schemas
 */

import { z } from 'zod';
import {
  CVSS_SEVERITIES,
  CVSS_V2_VERSIONS,
  CVSS_V3_VERSIONS,
  FLAG_LABELS,
  INVOLVEMENT_PARTIES,
  INVOLVEMENT_STATUSES,
  REMEDIATION_CATEGORIES,
  RESTART_CATEGORIES,
  THREAT_CATEGORIES,
} from '../enums/index.js';
import { documentSchemas } from './document.js';
import { openEnum, productIdSet, strings, timestamp, type SchemaMode } from './primitives.js';

export function vulnerabilitySchemas(mode: SchemaMode) {
  const { acknowledgment, note, reference } = documentSchemas(mode);
  const severity = openEnum(CVSS_SEVERITIES, mode);

  const cvssV2 = z.object({
    version: openEnum(CVSS_V2_VERSIONS, mode),
    vectorString: z.string(),
    baseScore: z.number().finite(),
    accessVector: z.string().optional(),
    accessComplexity: z.string().optional(),
    authentication: z.string().optional(),
    confidentialityImpact: z.string().optional(),
    integrityImpact: z.string().optional(),
    availabilityImpact: z.string().optional(),
    temporalScore: z.number().finite().optional(),
    environmentalScore: z.number().finite().optional(),
  });

  const cvssV3 = z.object({
    version: openEnum(CVSS_V3_VERSIONS, mode),
    vectorString: z.string(),
    baseScore: z.number().finite(),
    baseSeverity: severity,
    attackVector: z.string().optional(),
    attackComplexity: z.string().optional(),
    privilegesRequired: z.string().optional(),
    userInteraction: z.string().optional(),
    scope: z.string().optional(),
    confidentialityImpact: z.string().optional(),
    integrityImpact: z.string().optional(),
    availabilityImpact: z.string().optional(),
    temporalScore: z.number().finite().optional(),
    temporalSeverity: severity.optional(),
    environmentalScore: z.number().finite().optional(),
    environmentalSeverity: severity.optional(),
  });

  const productStatus = z.object({
    first_affected: productIdSet.optional(),
    first_fixed: productIdSet.optional(),
    fixed: productIdSet.optional(),
    known_affected: productIdSet.optional(),
    known_not_affected: productIdSet.optional(),
    last_affected: productIdSet.optional(),
    recommended: productIdSet.optional(),
    under_investigation: productIdSet.optional(),
  });

  const remediation = z.object({
    category: openEnum(REMEDIATION_CATEGORIES, mode),
    date: timestamp.optional(),
    details: z.string(),
    entitlements: strings.optional(),
    group_ids: strings.optional(),
    product_ids: strings.optional(),
    restart_required: z
      .object({
        category: openEnum(RESTART_CATEGORIES, mode),
        details: z.string().optional(),
      })
      .optional(),
    url: z.string().optional(),
  });

  const vulnerability = z.object({
    acknowledgments: z.array(acknowledgment).optional(),
    cve: z.string().optional(),
    cwe: z.object({ id: z.string(), name: z.string() }).optional(),
    discovery_date: timestamp.optional(),
    flags: z
      .array(
        z.object({
          date: timestamp.optional(),
          group_ids: strings.optional(),
          label: openEnum(FLAG_LABELS, mode),
          product_ids: strings.optional(),
        })
      )
      .optional(),
    ids: z.array(z.object({ system_name: z.string(), text: z.string() })).optional(),
    involvements: z
      .array(
        z.object({
          date: timestamp.optional(),
          party: openEnum(INVOLVEMENT_PARTIES, mode),
          status: openEnum(INVOLVEMENT_STATUSES, mode),
          summary: z.string().optional(),
        })
      )
      .optional(),
    notes: z.array(note).optional(),
    product_status: productStatus.optional(),
    references: z.array(reference).optional(),
    release_date: timestamp.optional(),
    remediations: z.array(remediation).optional(),
    scores: z
      .array(
        z.object({
          cvss_v2: cvssV2.optional(),
          cvss_v3: cvssV3.optional(),
          products: strings,
        })
      )
      .optional(),
    threats: z
      .array(
        z.object({
          category: openEnum(THREAT_CATEGORIES, mode),
          date: timestamp.optional(),
          details: z.string(),
          group_ids: strings.optional(),
          product_ids: strings.optional(),
        })
      )
      .optional(),
    title: z.string().optional(),
  });

  return { vulnerability };
}

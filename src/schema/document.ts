/**
 * csafkit - Document schemas
 */

import { z } from 'zod';
import {
  CSAF_VERSIONS,
  DOCUMENT_CATEGORIES,
  NOTE_CATEGORIES,
  PUBLISHER_CATEGORIES,
  REFERENCE_CATEGORIES,
  TLP_LABELS,
  TRACKING_STATUSES,
} from '../enums/index.js';
import { openEnum, strings, timestamp, type SchemaMode } from './primitives.js';

export function documentSchemas(mode: SchemaMode) {
  const acknowledgment = z.object({
    names: strings.optional(),
    organization: z.string().optional(),
    summary: z.string().optional(),
    urls: strings.optional(),
  });

  const note = z.object({
    audience: z.string().optional(),
    category: openEnum(NOTE_CATEGORIES, mode),
    text: z.string(),
    title: z.string().optional(),
  });

  const reference = z.object({
    category: openEnum(REFERENCE_CATEGORIES, mode).optional(),
    summary: z.string(),
    url: z.string(),
  });

  const publisher = z.object({
    category: openEnum(PUBLISHER_CATEGORIES, mode),
    contact_details: z.string().optional(),
    issuing_authority: z.string().optional(),
    name: z.string(),
    namespace: z.string(),
  });

  const revision = z.object({
    date: timestamp,
    legacy_version: z.string().optional(),
    number: z.string(),
    summary: z.string(),
  });

  const tracking = z.object({
    aliases: strings.optional(),
    current_release_date: timestamp,
    generator: z
      .object({
        date: timestamp.optional(),
        engine: z.object({
          name: z.string(),
          version: z.string().optional(),
        }),
      })
      .optional(),
    id: z.string(),
    initial_release_date: timestamp,
    revision_history: z.array(revision),
    status: openEnum(TRACKING_STATUSES, mode),
    version: z.string(),
  });

  const document = z.object({
    acknowledgments: z.array(acknowledgment).optional(),
    aggregate_severity: z
      .object({
        namespace: z.string().optional(),
        text: z.string(),
      })
      .optional(),
    category: openEnum(DOCUMENT_CATEGORIES, mode),
    csaf_version: openEnum(CSAF_VERSIONS, mode),
    distribution: z
      .object({
        text: z.string().optional(),
        tlp: z
          .object({
            label: openEnum(TLP_LABELS, mode),
            url: z.string().optional(),
          })
          .optional(),
      })
      .optional(),
    lang: z.string().optional(),
    notes: z.array(note).optional(),
    publisher,
    references: z.array(reference).optional(),
    source_lang: z.string().optional(),
    title: z.string(),
    tracking,
  });

  return { acknowledgment, note, reference, document };
}

/**
 * csafkit - Document metadata
 */

import type {
  CsafVersion,
  DocumentCategory,
  NoteCategory,
  Open,
  PublisherCategory,
  ReferenceCategory,
  TlpLabel,
  TrackingStatus,
} from '../enums/index.js';

/**
 * RFC 3339 timestamp, normalized to `YYYY-MM-DDTHH:mm:ss.sssZ` on decode
 */
export type Timestamp = string;

export interface Acknowledgment {
  names?: string[];
  organization?: string;
  summary?: string;
  urls?: string[];
}

export interface AggregateSeverity {
  namespace?: string;
  text: string;
}

export interface Tlp {
  label: Open<TlpLabel>;
  url?: string;
}

export interface Distribution {
  text?: string;
  tlp?: Tlp;
}

export interface Note {
  audience?: string;
  category: Open<NoteCategory>;
  text: string;
  title?: string;
}

export interface Reference {
  category?: Open<ReferenceCategory>;
  summary: string;
  url: string;
}

export interface Publisher {
  category: Open<PublisherCategory>;
  contact_details?: string;
  issuing_authority?: string;
  name: string;
  namespace: string;
}

export interface Engine {
  name: string;
  version?: string;
}

export interface Generator {
  date?: Timestamp;
  engine: Engine;
}

/**
 * One published revision. The history keeps the order it was written in.
 */
export interface Revision {
  date: Timestamp;
  legacy_version?: string;
  number: string;
  summary: string;
}

export interface Tracking {
  aliases?: string[];
  current_release_date: Timestamp;
  generator?: Generator;
  id: string;
  initial_release_date: Timestamp;
  revision_history: Revision[];
  status: Open<TrackingStatus>;
  version: string;
}

export interface Document {
  acknowledgments?: Acknowledgment[];
  aggregate_severity?: AggregateSeverity;
  category: Open<DocumentCategory>;
  csaf_version: Open<CsafVersion>;
  distribution?: Distribution;
  lang?: string;
  notes?: Note[];
  publisher: Publisher;
  references?: Reference[];
  source_lang?: string;
  title: string;
  tracking: Tracking;
}

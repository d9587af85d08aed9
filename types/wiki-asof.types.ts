export type ContentFormat = 'html' | 'text';

export type Provenance = 'temporal' | 'pinned';

export interface DocumentReference {
  title: string | null;
  pinnedRevisionId: number | null;
}

export interface AsOfQuery {
  /** `null` when the instant was defaulted rather than supplied. */
  rawTimestamp: string | null;
  normalizedInstant: string;
}

export interface ResolvedRevision {
  revisionId: number;
  /** `null` when the revision was pinned by the caller instead of resolved. */
  revisionTimestamp: string | null;
  canonicalTitle: string;
  permalink: string;
}

export interface SectionRef {
  index: string;
  level: string;
  line: string;
  anchor: string;
  byteOffset: number | null;
}

export interface ContentPayload {
  format: ContentFormat;
  body: string;
  truncated: boolean;
  sections: SectionRef[];
  originalChars: number;
  extractChars: number;
}

export interface AsOfResult {
  input: {
    queryOrUrl: string;
    asOfTimestamp: string | null;
  };
  provenance: Provenance;
  reference: DocumentReference;
  query: AsOfQuery | null;
  revision: ResolvedRevision;
  content: ContentPayload;
}

export interface ToolResult {
  output: string | null;
  error: string | null;
}

// Capabilities consumed from upstream.

export interface RevisionLookupRequest {
  title: string;
  upperBoundInstant: string;
}

export interface RevisionLookupResult {
  revisionId: number;
  revisionTimestamp: string;
  canonicalTitle: string;
}

export interface RevisionLookup {
  lookup(request: RevisionLookupRequest): Promise<RevisionLookupResult>;
}

export interface RevisionContent {
  title: string | null;
  html: string;
  sections: SectionRef[];
}

export interface ContentSource {
  fetchRevision(revisionId: number, format: ContentFormat): Promise<RevisionContent>;
}

import type { MarcRecord, OutputFormat } from '../utils/marc';

export type SourceName = 'gazetteer' | 'loc' | 'thesaurus';

export const SOURCE_NAMES: readonly SourceName[] = ['gazetteer', 'loc', 'thesaurus'];

export interface ItemReference {
  readonly id: string;
  readonly url: string;
  readonly changedAt?: string;
}

export interface AuthorityHeading {
  label: string;
  language?: string;
  kind?: 'pref label' | 'alt label';
}

export interface AncestorEntry<TItem> {
  id: string;
  item: TItem;
  heading: AuthorityHeading;
  order: number;
}

export type ChainStop = 'root' | 'access-denied' | 'top-concept' | 'cycle' | 'unresolvable';

export interface AncestorChain<TItem> {
  entries: AncestorEntry<TItem>[];
  stop: ChainStop;
}

export type HeadingType =
  | 'personal'
  | 'corporate'
  | 'meeting'
  | 'uniform-title'
  | 'topical'
  | 'geographic'
  | 'genre';

export interface SourceConstants {
  sourceCode: string;
  controlNumberPrefix: string;
  organizationCode: string;
  cataloguingAgency: string;
}

export interface BroaderReference {
  id: string;
  uri?: string;
  heading: AuthorityHeading;
  order: number;
}

/** Logical authority record, before any MARC tag is chosen. */
export interface AuthorityRecord {
  id: string;
  localId: string;
  headingType: HeadingType;
  preferredHeading: AuthorityHeading;
  variantHeadings: AuthorityHeading[];
  broaderReferences: BroaderReference[];
  notes: AuthorityHeading[];
  source: SourceConstants;
}

/** How a source's detail payloads are located, decoded and cleaned up. */
export interface FetchAdapter<TItem> {
  detailUrl(id: string): string;
  /** Decodes a detail payload; throws on a malformed body. */
  parse(body: string, id: string): TItem;
  sanitize(item: TItem): TItem;
  /** Parent plus any further ancestors the payload already names, for prefetching. */
  prefetchIdsOf(item: TItem): string[];
}

/**
 * Source-specific view of a resolved payload. Everything the resolver and the
 * assembler need to know about an item goes through here.
 */
export interface ItemAdapter<TItem> extends FetchAdapter<TItem> {
  idOf(item: TItem): string;
  localIdOf(item: TItem): string;
  parentOf(item: TItem): string | undefined;
  preferredHeadingOf(item: TItem): AuthorityHeading | undefined;
  /** Heading used when the item appears as someone's ancestor; defaults to the preferred heading. */
  ancestorHeadingOf?(item: TItem): AuthorityHeading | undefined;
  variantHeadingsOf(item: TItem): AuthorityHeading[];
  notesOf(item: TItem): AuthorityHeading[];
  isAccessDenied(item: TItem): boolean;
  isTopConcept(item: TItem): boolean;
  uriOf(item: TItem): string | undefined;
  readonly headingType: HeadingType;
  readonly constants: SourceConstants;
}

export interface RecordSink {
  readonly path: string;
  readonly written: number;
  write(record: MarcRecord): Promise<void>;
  close(): Promise<void>;
}

export type SinkFactory = (fileStem: string, format: OutputFormat) => Promise<RecordSink>;

export type HarvestState =
  | 'START'
  | 'READING_FEED'
  | 'FETCHING_BATCH'
  | 'RESOLVING'
  | 'ASSEMBLING'
  | 'WRITING'
  | 'DONE'
  | 'FAILED';

export interface HarvestSummary {
  source: SourceName;
  runId: string;
  state: HarvestState;
  batches: number;
  referencesRead: number;
  recordsWritten: number;
  recordsSkipped: number;
  failedItems: number;
  files: string[];
  error?: string;
}

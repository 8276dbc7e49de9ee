import type { GazetteerSettings } from '../config';
import type { OffsetPage, ScrollPage } from '../services/changeFeedReader';
import type { AuthorityHeading, ItemAdapter, ItemReference, SourceConstants } from '../types';
import { isRecord, optionalString } from './json';

export interface GazetteerName {
  title: string;
  language?: string;
}

export type GazetteerLocation = Record<string, unknown>;

export interface GazetteerPlace {
  /** Canonical place URI, e.g. `https://gazetteer.dainst.org/place/2048575`. */
  uri: string;
  gazId: string;
  prefName?: GazetteerName;
  names: GazetteerName[];
  parent?: string;
  ancestors: string[];
  accessDenied: boolean;
  prefLocation?: GazetteerLocation;
  locations: GazetteerLocation[];
}

export const GAZETTEER_CONSTANTS: SourceConstants = {
  sourceCode: 'iDAI.gazetteer',
  controlNumberPrefix: 'iDAI.gazetteer',
  organizationCode: 'DE-2553',
  cataloguingAgency: 'iDAI.gazetteer',
};

export const GAZETTEER_OUTPUT_STEM = 'gazetteer_authority';

const PLACE_ID = /\/place\/(\d+)\/?$/;

/** Numeric gazetteer id of a place URI; anything else falls back to its last path segment. */
export const gazIdOf = (uri: string): string => {
  const match = PLACE_ID.exec(uri);
  if (match) return match[1];
  const segments = uri.split('/').filter(Boolean);
  return segments[segments.length - 1] ?? uri;
};

const toName = (raw: unknown): GazetteerName | undefined => {
  if (!isRecord(raw)) return undefined;
  const title = optionalString(raw.title);
  if (!title) return undefined;
  return { title, language: optionalString(raw.language) };
};

const toLocation = (raw: unknown): GazetteerLocation | undefined => (isRecord(raw) ? { ...raw } : undefined);

const toStringList = (raw: unknown): string[] =>
  Array.isArray(raw) ? raw.map(optionalString).filter((entry): entry is string => !!entry) : [];

/** Decodes a `doc/{gazId}.json` payload. */
export const parsePlace = (body: string): GazetteerPlace => {
  const raw: unknown = JSON.parse(body);
  if (!isRecord(raw)) {
    throw new Error('Place document is not a JSON object');
  }

  const uri = optionalString(raw['@id']);
  if (!uri) {
    throw new Error('Place document has no @id');
  }

  const names = Array.isArray(raw.names)
    ? raw.names.map(toName).filter((name): name is GazetteerName => !!name)
    : [];
  const locations = Array.isArray(raw.locations)
    ? raw.locations.map(toLocation).filter((location): location is GazetteerLocation => !!location)
    : [];

  return {
    uri,
    gazId: optionalString(raw.gazId) ?? gazIdOf(uri),
    prefName: toName(raw.prefName),
    names,
    parent: optionalString(raw.parent),
    ancestors: toStringList(raw.ancestors),
    accessDenied: raw.accessDenied === true,
    prefLocation: toLocation(raw.prefLocation),
    locations,
  };
};

const withoutShape = (location: GazetteerLocation): GazetteerLocation => {
  const { shape: _shape, ...rest } = location;
  return rest;
};

/** Drops polygon geometry, which can run to megabytes and is never transcribed. */
export const sanitizePlace = (place: GazetteerPlace): GazetteerPlace => ({
  ...place,
  prefLocation: place.prefLocation ? withoutShape(place.prefLocation) : undefined,
  locations: place.locations.map(withoutShape),
});

const toHeading = (name: GazetteerName): AuthorityHeading =>
  name.language ? { label: name.title, language: name.language } : { label: name.title };

export const createGazetteerAdapter = (settings: Pick<GazetteerSettings, 'baseUrl'>): ItemAdapter<GazetteerPlace> => ({
  headingType: 'geographic',
  constants: GAZETTEER_CONSTANTS,
  detailUrl: (id) => `${settings.baseUrl}doc/${gazIdOf(id)}.json`,
  parse: (body) => parsePlace(body),
  sanitize: sanitizePlace,
  prefetchIdsOf: (place) => (place.parent ? [place.parent, ...place.ancestors] : place.ancestors),
  idOf: (place) => place.uri,
  localIdOf: (place) => place.gazId,
  parentOf: (place) => place.parent,
  preferredHeadingOf: (place) => (place.prefName ? toHeading(place.prefName) : undefined),
  variantHeadingsOf: (place) => place.names.map(toHeading),
  notesOf: () => [],
  isAccessDenied: (place) => place.accessDenied,
  isTopConcept: () => false,
  uriOf: (place) => place.uri,
});

const formatQueryDate = (date: Date): string => date.toISOString().slice(0, 10);

/** Lucene-style query for places changed between `since` and `until`, or all places. */
export const buildChangeQuery = (since: Date | undefined, until: Date): string =>
  since ? `lastChangeDate:[${formatQueryDate(since)} TO ${formatQueryDate(until)}]` : '*';

export const buildOffsetSearchUrl = (baseUrl: string, query: string, offset: number, limit: number): string => {
  const url = new URL('search.json', baseUrl);
  url.searchParams.set('limit', String(limit));
  url.searchParams.set('offset', String(offset));
  url.searchParams.set('q', query);
  return url.toString();
};

export const buildScrollSearchUrl = (baseUrl: string, query: string, limit: number): string => {
  const url = new URL('search.json', baseUrl);
  url.searchParams.set('q', query);
  url.searchParams.set('limit', String(limit));
  url.searchParams.set('scroll', 'true');
  return url.toString();
};

export const buildScrollContinueUrl = (baseUrl: string, scrollId: string): string => {
  const url = new URL('search.json', baseUrl);
  url.searchParams.set('scrollId', scrollId);
  return url.toString();
};

const toReference = (raw: unknown, adapter: ItemAdapter<GazetteerPlace>): ItemReference | undefined => {
  if (!isRecord(raw)) return undefined;
  const id = optionalString(raw['@id']);
  if (!id) return undefined;
  return { id, url: adapter.detailUrl(id) };
};

/**
 * Decodes a `search.json` page. The same shape serves offset and scroll
 * requests; the scroll cursor is only present on the latter.
 */
export const parseSearchPage = (body: string, adapter: ItemAdapter<GazetteerPlace>): OffsetPage & ScrollPage => {
  const raw: unknown = JSON.parse(body);
  if (!isRecord(raw)) {
    throw new Error('Search response is not a JSON object');
  }
  const results = Array.isArray(raw.result) ? raw.result : [];
  const total = typeof raw.total === 'number' && Number.isFinite(raw.total) ? raw.total : undefined;

  return {
    items: results
      .map((entry) => toReference(entry, adapter))
      .filter((ref): ref is ItemReference => !!ref),
    total,
    cursor: optionalString(raw.scrollId),
  };
};

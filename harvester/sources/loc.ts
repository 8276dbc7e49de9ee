import { logger } from '../../utils/logger';
import { decodeMarcXml, getDataFields, type MarcRecord } from '../../utils/marc';
import { ATOM_NS, children, descendants, firstChild, parseXml, textOf } from '../../utils/xml';
import type { FetchAdapter, HeadingType, ItemReference } from '../types';

export const LOC_FEED_HEADERS: Record<string, string> = { Accept: 'application/xml' };

const MARCXML_LINK_TYPE = 'application/marc+xml';

/** 1XX tag → heading type, in the order the tags are checked. */
export const LOC_HEADING_TAGS: ReadonlyArray<readonly [string, HeadingType]> = [
  ['100', 'personal'],
  ['110', 'corporate'],
  ['111', 'meeting'],
  ['130', 'uniform-title'],
  ['150', 'topical'],
  ['151', 'geographic'],
  ['155', 'genre'],
];

/** Name heading types whose files exist after every run, even when empty. */
export const LOC_PREOPENED_TYPES: readonly HeadingType[] = LOC_HEADING_TAGS.slice(0, 4).map(
  ([, headingType]) => headingType,
);

export const LOC_OUTPUT_STEMS: Record<HeadingType, string> = {
  personal: 'loc_personal_names',
  corporate: 'loc_corporate_names',
  meeting: 'loc_meeting_names',
  'uniform-title': 'loc_uniform_titles',
  topical: 'loc_topical_terms',
  geographic: 'loc_geographic_names',
  genre: 'loc_genre_forms',
};

export const headingTypeOf = (record: MarcRecord): HeadingType | undefined =>
  LOC_HEADING_TAGS.find(([tag]) => getDataFields(record, tag).length > 0)?.[1];

const marcXmlLinkOf = (entry: Element): string | undefined => {
  const link = children(entry, ATOM_NS, 'link').find(
    (element) => element.getAttribute('rel') === 'alternate' && element.getAttribute('type') === MARCXML_LINK_TYPE,
  );
  const href = (link?.getAttribute('href') || '').trim();
  return href || undefined;
};

/**
 * Reads the entries of one Atom feed page. Each reference points at the
 * entry's MARCXML serialization; entries without one are skipped.
 */
export const parseAtomPage = (body: string): ItemReference[] => {
  const document = parseXml(body);
  const refs: ItemReference[] = [];

  for (const entry of descendants(document, ATOM_NS, 'entry')) {
    const href = marcXmlLinkOf(entry);
    if (!href) {
      logger.debug(`Feed entry ${textOf(firstChild(entry, ATOM_NS, 'id'))} has no MARCXML link`, { source: 'loc' });
      continue;
    }
    const updated = textOf(firstChild(entry, ATOM_NS, 'updated'));
    refs.push(updated ? { id: href, url: href, changedAt: updated } : { id: href, url: href });
  }

  return refs;
};

export const parseMarcXmlRecord = (body: string): MarcRecord => {
  const [record] = decodeMarcXml(body);
  if (!record) {
    throw new Error('MARCXML document contains no record');
  }
  return record;
};

/** LoC references already carry the record URL, which doubles as the identifier. */
export const LOC_ADAPTER: FetchAdapter<MarcRecord> = {
  detailUrl: (id) => id,
  parse: (body) => parseMarcXmlRecord(body),
  sanitize: (record) => record,
  prefetchIdsOf: () => [],
};

export const feedPageUrl = (feed: string, index: number): string => `${feed}${index}`;

import {
  DCT_NS,
  RDF_NS,
  SKOS_NS,
  children,
  descendants,
  firstChild,
  languageOf,
  parseXml,
  textOf,
} from '../../utils/xml';
import type { ThesaurusSettings } from '../config';
import type { AuthorityHeading, ItemAdapter, SourceConstants } from '../types';

export interface LocalizedText {
  text: string;
  language?: string;
}

export interface ThesaurusConcept {
  uri: string;
  conceptId: string;
  prefLabels: LocalizedText[];
  altLabels: LocalizedText[];
  definitions: LocalizedText[];
  broader?: string;
  narrower: string[];
  isTopConcept: boolean;
  modified: string[];
  created: string[];
}

export const THESAURUS_CONSTANTS: SourceConstants = {
  sourceCode: 'iDAI.thesauri',
  controlNumberPrefix: 'iDAI.thesauri',
  organizationCode: 'DE-2553',
  cataloguingAgency: 'Deutsches Archäologisches Institut',
};

export const THESAURUS_OUTPUT_STEM = 'thesaurus_authority';

export const conceptIdOf = (uri: string): string => {
  const segments = uri.split('/').filter(Boolean);
  return segments[segments.length - 1] ?? uri;
};

/** Root ids may be given bare (`_fe65f286`) or as full URIs. */
export const toConceptUri = (baseUrl: string, id: string): string =>
  /^https?:\/\//i.test(id) ? id : `${baseUrl}${id.replace(/^\/+/, '')}`;

const localized = (elements: Element[]): LocalizedText[] =>
  elements
    .map((element) => ({ text: textOf(element), language: languageOf(element) }))
    .filter((entry) => entry.text.length > 0);

const resourceOf = (element: Element | undefined): string | undefined => {
  const value = element?.getAttributeNS(RDF_NS, 'resource') || '';
  return value.trim() || undefined;
};

/**
 * Decodes the RDF/XML of one concept. The document may describe related
 * resources too; only the `rdf:Description` about `uri` is read.
 */
export const parseConcept = (body: string, uri: string): ThesaurusConcept => {
  const document = parseXml(body);
  const description = descendants(document, RDF_NS, 'Description').find(
    (element) => element.getAttributeNS(RDF_NS, 'about') === uri,
  );
  if (!description) {
    throw new Error(`No rdf:Description about ${uri}`);
  }

  const dates = (localName: string): string[] =>
    children(description, SKOS_NS, 'changeNote')
      .flatMap((note) => descendants(note, DCT_NS, localName))
      .map((element) => textOf(element))
      .filter(Boolean);

  return {
    uri,
    conceptId: conceptIdOf(uri),
    prefLabels: localized(children(description, SKOS_NS, 'prefLabel')),
    altLabels: localized(children(description, SKOS_NS, 'altLabel')),
    definitions: localized(children(description, SKOS_NS, 'definition')),
    broader: resourceOf(firstChild(description, SKOS_NS, 'broader')),
    narrower: children(description, SKOS_NS, 'narrower')
      .map((element) => resourceOf(element))
      .filter((resource): resource is string => !!resource),
    isTopConcept: children(description, SKOS_NS, 'topConceptOf').length > 0,
    modified: dates('modified'),
    created: dates('created'),
  };
};

const toHeading = (entry: LocalizedText, kind?: AuthorityHeading['kind']): AuthorityHeading => ({
  label: entry.text,
  ...(entry.language ? { language: entry.language } : {}),
  ...(kind ? { kind } : {}),
});

const isPreferred = (entry: LocalizedText, language: string): boolean =>
  (entry.language ?? '').toLowerCase() === language;

export const createThesaurusAdapter = (
  settings: Pick<ThesaurusSettings, 'baseUrl' | 'rootIds' | 'preferredLanguage'>,
): ItemAdapter<ThesaurusConcept> => {
  const roots = new Set(settings.rootIds.map((id) => toConceptUri(settings.baseUrl, id)));

  return {
    headingType: 'topical',
    constants: THESAURUS_CONSTANTS,
    detailUrl: (id) => `${id}.rdf`,
    parse: (body, id) => parseConcept(body, id),
    sanitize: (concept) => concept,
    prefetchIdsOf: (concept) => (concept.broader ? [concept.broader] : []),
    idOf: (concept) => concept.uri,
    localIdOf: (concept) => concept.conceptId,
    parentOf: (concept) => concept.broader,
    preferredHeadingOf: (concept) => {
      const preferred = concept.prefLabels.find((entry) => isPreferred(entry, settings.preferredLanguage));
      return preferred ? toHeading(preferred) : undefined;
    },
    // Broader references fall back to the first label in any language.
    ancestorHeadingOf: (concept) => {
      const label =
        concept.prefLabels.find((entry) => isPreferred(entry, settings.preferredLanguage)) ?? concept.prefLabels[0];
      return label ? toHeading(label) : undefined;
    },
    variantHeadingsOf: (concept) => [
      ...concept.prefLabels
        .filter((entry) => !isPreferred(entry, settings.preferredLanguage))
        .map((entry) => toHeading(entry, 'pref label')),
      ...concept.altLabels.map((entry) => toHeading(entry, 'alt label')),
    ],
    notesOf: (concept) => concept.definitions.map((entry) => toHeading(entry)),
    isAccessDenied: () => false,
    isTopConcept: (concept) => concept.isTopConcept || roots.has(concept.uri),
    uriOf: (concept) => concept.uri,
  };
};

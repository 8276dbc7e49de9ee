import { loadHarvestConfig, type HarvestConfig } from '../harvester/config';
import type { HttpTransport, TransportResponse } from '../harvester/services/retryingFetcher';
import type { ItemAdapter, RecordSink, SinkFactory } from '../harvester/types';
import { encodeRecord, type MarcRecord, type OutputFormat } from '../utils/marc';

/** Keeps written records in memory; each one is still encoded, as a file sink would. */
export class MemoryRecordSink implements RecordSink {
  readonly records: MarcRecord[] = [];
  closed = false;

  constructor(
    readonly path: string,
    private readonly format: OutputFormat = 'marc',
    private readonly onWrite?: (record: MarcRecord) => void,
  ) {}

  get written(): number {
    return this.records.length;
  }

  async write(record: MarcRecord): Promise<void> {
    encodeRecord(record, this.format);
    this.records.push(record);
    this.onWrite?.(record);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export const memorySinkFactory = (
  onWrite?: (record: MarcRecord) => void,
): { factory: SinkFactory; sinks: Map<string, MemoryRecordSink> } => {
  const sinks = new Map<string, MemoryRecordSink>();
  const factory: SinkFactory = async (fileStem: string, format: OutputFormat) => {
    const sink = new MemoryRecordSink(`${fileStem}.${format}`, format, onWrite);
    sinks.set(fileStem, sink);
    return sink;
  };
  return { factory, sinks };
};

export const makeTextResponse = (body: string, status = 200): TransportResponse => ({
  status,
  ok: status >= 200 && status < 300,
  text: async () => body,
});

export const makeJsonResponse = (payload: unknown, status = 200): TransportResponse =>
  makeTextResponse(JSON.stringify(payload), status);

/** Global-fetch shaped response, for tests that replace `global.fetch`. */
export const makeFetchResponse = (body: string, status = 200) =>
  ({
    ok: status >= 200 && status < 300,
    status,
    headers: {
      get: (name: string) => (name.toLowerCase() === 'content-type' ? 'application/json' : null),
    },
    json: async () => JSON.parse(body),
    text: async () => body,
  } as Response);

export type Route = string | TransportResponse | (() => TransportResponse | Promise<TransportResponse>);

/**
 * In-process transport answering from a URL → response table. Unknown URLs
 * get a 404; every call is recorded.
 */
export const routeTransport = (routes: Record<string, Route>) => {
  const calls: string[] = [];
  const transport: HttpTransport = async (url) => {
    calls.push(url);
    const route = routes[url];
    if (route === undefined) return makeTextResponse(`no route for ${url}`, 404);
    if (typeof route === 'string') return makeTextResponse(route);
    if (typeof route === 'function') return route();
    return route;
  };
  return { transport, calls };
};

export const noSleep = async (): Promise<void> => undefined;

export const testConfig = (env: Record<string, string> = {}): HarvestConfig =>
  loadHarvestConfig({
    HARVEST_MAX_RETRIES: '1',
    HARVEST_RETRY_BACKOFF_MS: '0',
    HARVEST_CONCURRENCY: '4',
    ...env,
  });

export const FIXED_NOW = new Date('2024-06-01T12:00:00Z');

export interface TestNode {
  id: string;
  label?: string;
  parent?: string;
  ancestors?: string[];
  children?: string[];
  accessDenied?: boolean;
  top?: boolean;
}

export const NODE_BASE = 'https://nodes.test/';

export const nodeUrl = (id: string): string => `${NODE_BASE}${id}`;

/** Minimal hierarchical source whose detail payloads are TestNode JSON. */
export const nodeAdapter: ItemAdapter<TestNode> = {
  headingType: 'geographic',
  constants: { sourceCode: 'test', controlNumberPrefix: 'test', organizationCode: 'XX-0000', cataloguingAgency: 'test' },
  detailUrl: nodeUrl,
  parse: (body) => JSON.parse(body),
  sanitize: (node) => node,
  prefetchIdsOf: (node) => (node.parent ? [node.parent, ...(node.ancestors ?? [])] : []),
  idOf: (node) => node.id,
  localIdOf: (node) => node.id,
  parentOf: (node) => node.parent,
  preferredHeadingOf: (node) => (node.label ? { label: node.label } : undefined),
  variantHeadingsOf: () => [],
  notesOf: () => [],
  isAccessDenied: (node) => node.accessDenied === true,
  isTopConcept: (node) => node.top === true,
  uriOf: (node) => nodeUrl(node.id),
};

/** Routes serving each node's JSON under its node URL. */
export const nodeRoutes = (nodes: TestNode[]): Record<string, Route> =>
  Object.fromEntries(nodes.map((node) => [nodeUrl(node.id), JSON.stringify(node)]));

export interface RdfConceptFixture {
  uri: string;
  prefLabels?: Record<string, string>;
  altLabels?: Array<[string, string]>;
  definitions?: Record<string, string>;
  broader?: string;
  narrower?: string[];
  topConceptOf?: string;
  modified?: string[];
  created?: string[];
}

const escapeXml = (value: string): string =>
  value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');

/** RDF/XML as the thesaurus serves it for one concept. */
export const rdfConcept = (fixture: RdfConceptFixture): string => {
  const literal = (element: string, language: string, text: string) =>
    `<skos:${element} xml:lang="${language}">${escapeXml(text)}</skos:${element}>`;
  const resource = (element: string, uri: string) => `<skos:${element} rdf:resource="${escapeXml(uri)}"/>`;
  const changeNote = (element: string, value: string) =>
    `<skos:changeNote><rdf:Description><dct:${element}>${value}</dct:${element}></rdf:Description></skos:changeNote>`;

  const body = [
    '<rdf:type rdf:resource="http://www.w3.org/2004/02/skos/core#Concept"/>',
    ...Object.entries(fixture.prefLabels ?? {}).map(([language, text]) => literal('prefLabel', language, text)),
    ...(fixture.altLabels ?? []).map(([language, text]) => literal('altLabel', language, text)),
    ...Object.entries(fixture.definitions ?? {}).map(([language, text]) => literal('definition', language, text)),
    ...(fixture.broader ? [resource('broader', fixture.broader)] : []),
    ...(fixture.narrower ?? []).map((uri) => resource('narrower', uri)),
    ...(fixture.topConceptOf ? [resource('topConceptOf', fixture.topConceptOf)] : []),
    ...(fixture.modified ?? []).map((value) => changeNote('modified', value)),
    ...(fixture.created ?? []).map((value) => changeNote('created', value)),
  ].join('\n    ');

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#"',
    '         xmlns:skos="http://www.w3.org/2004/02/skos/core#"',
    '         xmlns:dct="http://purl.org/dc/terms/">',
    `  <rdf:Description rdf:about="${escapeXml(fixture.uri)}">`,
    `    ${body}`,
    '  </rdf:Description>',
    '</rdf:RDF>',
  ].join('\n');
};

export interface AtomEntryFixture {
  id: string;
  updated: string;
  marcXmlUrl?: string;
}

export const atomFeed = (entries: AtomEntryFixture[]): string =>
  [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<feed xmlns="http://www.w3.org/2005/Atom">',
    '  <title>Changes</title>',
    ...entries.map((entry) =>
      [
        '  <entry>',
        `    <id>${entry.id}</id>`,
        `    <updated>${entry.updated}</updated>`,
        `    <link rel="alternate" type="text/html" href="${entry.id}.html"/>`,
        ...(entry.marcXmlUrl ? [`    <link rel="alternate" type="application/marc+xml" href="${entry.marcXmlUrl}"/>`] : []),
        '  </entry>',
      ].join('\n'),
    ),
    '</feed>',
  ].join('\n');

/** A single-heading MARCXML authority record as served by id.loc.gov. */
export const locMarcXml = (controlNumber: string, tag: string, heading: string): string =>
  [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<marcxml:collection xmlns:marcxml="http://www.loc.gov/MARC21/slim">',
    '  <marcxml:record>',
    '    <marcxml:leader>00000nz  a2200000n  4500</marcxml:leader>',
    `    <marcxml:controlfield tag="001">${controlNumber}</marcxml:controlfield>`,
    `    <marcxml:datafield tag="${tag}" ind1="1" ind2=" ">`,
    `      <marcxml:subfield code="a">${escapeXml(heading)}</marcxml:subfield>`,
    '    </marcxml:datafield>',
    '  </marcxml:record>',
    '</marcxml:collection>',
  ].join('\n');

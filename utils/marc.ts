import { DOMImplementation, XMLSerializer } from '@xmldom/xmldom';
import { children, descendants, parseXml } from './xml';

export const MARC_NS = 'http://www.loc.gov/MARC21/slim';

export type OutputFormat = 'marc' | 'marcxml';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['marc', 'marcxml'];

export const FILE_SUFFIX: Record<OutputFormat, string> = {
  marc: '.mrc',
  marcxml: '.marcxml',
};

export const MARCXML_OPENING_ELEMENTS =
  '<?xml version="1.0" encoding="UTF-8" ?>' +
  `<collection xmlns="${MARC_NS}" xmlns:xsi="http://www.w3.org/2001/XMLSchema-instance" ` +
  `xsi:schemaLocation="${MARC_NS} http://www.loc.gov/standards/marcxml/schema/MARC21slim.xsd">`;

export const MARCXML_CLOSING_ELEMENTS = '</collection>';

export interface MarcSubfield {
  code: string;
  value: string;
}

export interface MarcControlField {
  tag: string;
  value: string;
}

export interface MarcDataField {
  tag: string;
  ind1: string;
  ind2: string;
  subfields: MarcSubfield[];
}

export interface MarcRecord {
  leader: string;
  controlFields: MarcControlField[];
  dataFields: MarcDataField[];
}

// Record length and base address are filled in on encode.
export const AUTHORITY_LEADER = '00000nz  a2200000n  4500';

const FIELD_TERMINATOR = 0x1e;
const SUBFIELD_DELIMITER = 0x1f;
const RECORD_TERMINATOR = 0x1d;
const LEADER_LENGTH = 24;
const DIRECTORY_ENTRY_LENGTH = 12;

export class MarcDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MarcDecodeError';
  }
}

/** A record that cannot be expressed in the transmission format, such as an oversized field. */
export class MarcEncodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MarcEncodeError';
  }
}

export const isControlTag = (tag: string): boolean => tag.startsWith('00');

export const dataField = (
  tag: string,
  indicators: [string, string],
  subfields: Array<[string, string]>,
): MarcDataField => ({
  tag,
  ind1: indicators[0],
  ind2: indicators[1],
  subfields: subfields.map(([code, value]) => ({ code, value })),
});

export const getDataFields = (record: MarcRecord, tag: string): MarcDataField[] =>
  record.dataFields.filter((field) => field.tag === tag);

export const getControlField = (record: MarcRecord, tag: string): string | undefined =>
  record.controlFields.find((field) => field.tag === tag)?.value;

export const subfieldValues = (field: MarcDataField, code: string): string[] =>
  field.subfields.filter((subfield) => subfield.code === code).map((subfield) => subfield.value);

const padNumber = (value: number, width: number): string => {
  const text = String(value);
  if (text.length > width) {
    throw new MarcEncodeError(`MARC record too large: ${value} does not fit in ${width} digits`);
  }
  return text.padStart(width, '0');
};

const normalizeLeader = (leader: string): string => {
  const base = leader.length >= LEADER_LENGTH ? leader.slice(0, LEADER_LENGTH) : leader.padEnd(LEADER_LENGTH, ' ');
  return `${base.slice(0, 9)}a22${base.slice(12, 20)}4500`;
};

/**
 * Serializes a record as ISO 2709 (MARC21 transmission format), UTF-8 encoded.
 */
export const encodeIso2709 = (record: MarcRecord): Buffer => {
  const bodies: Array<{ tag: string; data: Buffer }> = [
    ...record.controlFields.map((field) => ({
      tag: field.tag,
      data: Buffer.concat([Buffer.from(field.value, 'utf8'), Buffer.from([FIELD_TERMINATOR])]),
    })),
    ...record.dataFields.map((field) => ({
      tag: field.tag,
      data: Buffer.concat([
        Buffer.from(`${field.ind1 || ' '}${field.ind2 || ' '}`, 'utf8'),
        ...field.subfields.map((subfield) =>
          Buffer.concat([Buffer.from([SUBFIELD_DELIMITER]), Buffer.from(`${subfield.code}${subfield.value}`, 'utf8')]),
        ),
        Buffer.from([FIELD_TERMINATOR]),
      ]),
    })),
  ];

  let offset = 0;
  const directory = bodies
    .map(({ tag, data }) => {
      const entry = `${tag}${padNumber(data.length, 4)}${padNumber(offset, 5)}`;
      offset += data.length;
      return entry;
    })
    .join('');

  const baseAddress = LEADER_LENGTH + directory.length + 1;
  const recordLength = baseAddress + offset + 1;
  const leader = normalizeLeader(record.leader);
  const finalLeader = `${padNumber(recordLength, 5)}${leader.slice(5, 12)}${padNumber(baseAddress, 5)}${leader.slice(17)}`;

  return Buffer.concat([
    Buffer.from(finalLeader, 'ascii'),
    Buffer.from(directory, 'ascii'),
    Buffer.from([FIELD_TERMINATOR]),
    ...bodies.map(({ data }) => data),
    Buffer.from([RECORD_TERMINATOR]),
  ]);
};

const decodeOne = (bytes: Buffer): MarcRecord => {
  const leader = bytes.subarray(0, LEADER_LENGTH).toString('ascii');
  const baseAddress = parseInt(leader.slice(12, 17), 10);
  if (!Number.isFinite(baseAddress) || baseAddress <= LEADER_LENGTH || baseAddress > bytes.length) {
    throw new MarcDecodeError(`Invalid base address in leader "${leader}"`);
  }

  const directory = bytes.subarray(LEADER_LENGTH, baseAddress - 1).toString('ascii');
  if (directory.length % DIRECTORY_ENTRY_LENGTH !== 0) {
    throw new MarcDecodeError('Directory length is not a multiple of 12');
  }

  const record: MarcRecord = { leader, controlFields: [], dataFields: [] };
  for (let i = 0; i < directory.length; i += DIRECTORY_ENTRY_LENGTH) {
    const tag = directory.slice(i, i + 3);
    const length = parseInt(directory.slice(i + 3, i + 7), 10);
    const start = parseInt(directory.slice(i + 7, i + 12), 10);
    const raw = bytes.subarray(baseAddress + start, baseAddress + start + length);
    const content = raw[raw.length - 1] === FIELD_TERMINATOR ? raw.subarray(0, raw.length - 1) : raw;

    if (isControlTag(tag)) {
      record.controlFields.push({ tag, value: content.toString('utf8') });
      continue;
    }

    const indicators = content.subarray(0, 2).toString('utf8');
    const subfields: MarcSubfield[] = [];
    let cursor = 2;
    while (cursor < content.length) {
      if (content[cursor] !== SUBFIELD_DELIMITER) {
        throw new MarcDecodeError(`Expected subfield delimiter in field ${tag}`);
      }
      let end = cursor + 1;
      while (end < content.length && content[end] !== SUBFIELD_DELIMITER) end += 1;
      const chunk = content.subarray(cursor + 1, end).toString('utf8');
      subfields.push({ code: chunk.slice(0, 1), value: chunk.slice(1) });
      cursor = end;
    }
    record.dataFields.push({ tag, ind1: indicators[0] ?? ' ', ind2: indicators[1] ?? ' ', subfields });
  }
  return record;
};

/**
 * Reads every record from an ISO 2709 byte stream.
 */
export const decodeIso2709 = (bytes: Buffer): MarcRecord[] => {
  const records: MarcRecord[] = [];
  let offset = 0;
  while (offset < bytes.length) {
    const length = parseInt(bytes.subarray(offset, offset + 5).toString('ascii'), 10);
    if (!Number.isFinite(length) || length < LEADER_LENGTH || offset + length > bytes.length) {
      throw new MarcDecodeError(`Invalid record length at byte ${offset}`);
    }
    records.push(decodeOne(bytes.subarray(offset, offset + length)));
    offset += length;
  }
  return records;
};

export const encodeMarcXml = (record: MarcRecord): string => {
  const document = new DOMImplementation().createDocument(MARC_NS, 'record', null);
  const root = document.documentElement;

  const append = (name: string, text: string, attributes: Record<string, string>) => {
    const element = document.createElementNS(MARC_NS, name);
    for (const [key, value] of Object.entries(attributes)) {
      element.setAttribute(key, value);
    }
    element.appendChild(document.createTextNode(text));
    return element;
  };

  root.appendChild(append('leader', record.leader, {}));
  for (const field of record.controlFields) {
    root.appendChild(append('controlfield', field.value, { tag: field.tag }));
  }
  for (const field of record.dataFields) {
    const element = document.createElementNS(MARC_NS, 'datafield');
    element.setAttribute('tag', field.tag);
    element.setAttribute('ind1', field.ind1 || ' ');
    element.setAttribute('ind2', field.ind2 || ' ');
    for (const subfield of field.subfields) {
      element.appendChild(append('subfield', subfield.value, { code: subfield.code }));
    }
    root.appendChild(element);
  }

  return new XMLSerializer().serializeToString(root);
};

const elementChildren = (parent: Element, localName: string): Element[] => children(parent, MARC_NS, localName);

/**
 * Reads every MARC21 slim record in a document, whether it is a single
 * <record> or a <collection>.
 */
export const decodeMarcXml = (source: string): MarcRecord[] => {
  const document = parseXml(source);
  return descendants(document, MARC_NS, 'record').map((element) => ({
    leader: elementChildren(element, 'leader')[0]?.textContent ?? AUTHORITY_LEADER,
    controlFields: elementChildren(element, 'controlfield').map((field) => ({
      tag: field.getAttribute('tag') || '',
      value: field.textContent ?? '',
    })),
    dataFields: elementChildren(element, 'datafield').map((field) => ({
      tag: field.getAttribute('tag') || '',
      ind1: field.getAttribute('ind1') || ' ',
      ind2: field.getAttribute('ind2') || ' ',
      subfields: elementChildren(field, 'subfield').map((subfield) => ({
        code: subfield.getAttribute('code') || '',
        value: subfield.textContent ?? '',
      })),
    })),
  }));
};

export const encodeRecord = (record: MarcRecord, format: OutputFormat): Buffer =>
  format === 'marc' ? encodeIso2709(record) : Buffer.from(encodeMarcXml(record), 'utf8');

import { AUTHORITY_LEADER, dataField, type MarcDataField, type MarcRecord } from '../../utils/marc';
import type { AuthorityHeading, AuthorityRecord, BroaderReference, HeadingType } from '../types';

type Subfields = Array<[string, string]>;

interface TagSet {
  heading: string;
  variant: string;
  broader: string;
}

export const HEADING_TAGS: Record<HeadingType, TagSet> = {
  personal: { heading: '100', variant: '400', broader: '500' },
  corporate: { heading: '110', variant: '410', broader: '510' },
  meeting: { heading: '111', variant: '411', broader: '511' },
  'uniform-title': { heading: '130', variant: '430', broader: '530' },
  topical: { heading: '150', variant: '450', broader: '550' },
  geographic: { heading: '151', variant: '451', broader: '551' },
  genre: { heading: '155', variant: '455', broader: '555' },
};

/**
 * Source-specific subfield choices. Tags come from the heading type; the
 * profile only decides what goes inside them.
 */
export interface MarcMappingProfile {
  identifierIndicators: [string, string];
  identifierSubfields(record: AuthorityRecord): Subfields;
  variantSubfields(heading: AuthorityHeading): Subfields;
  broaderSubfields(reference: BroaderReference, record: AuthorityRecord): Subfields;
  noteSubfields?(note: AuthorityHeading, record: AuthorityRecord): Subfields;
}

const headingSubfields = (heading: AuthorityHeading): Subfields =>
  heading.language ? [['a', heading.label], ['l', heading.language]] : [['a', heading.label]];

export const GAZETTEER_MAPPING: MarcMappingProfile = {
  identifierIndicators: [' ', '7'],
  identifierSubfields: (record) => [
    ['a', record.localId],
    ['2', record.source.sourceCode],
  ],
  variantSubfields: headingSubfields,
  broaderSubfields: (reference) => [
    ...headingSubfields(reference.heading),
    ['x', 'part of'],
    ['i', `ancestor of order ${reference.order}`],
  ],
};

export const THESAURUS_MAPPING: MarcMappingProfile = {
  identifierIndicators: ['7', ' '],
  identifierSubfields: (record) => [
    ['a', record.localId],
    ['2', record.source.sourceCode],
    ['9', `${record.source.controlNumberPrefix}${record.localId}`],
  ],
  variantSubfields: (heading) => [
    ...headingSubfields(heading),
    ...(heading.kind ? ([['i', heading.kind]] satisfies Subfields) : []),
  ],
  broaderSubfields: (reference, record) => [
    ...headingSubfields(reference.heading),
    ['0', `${record.source.controlNumberPrefix}${reference.id}`],
    ...(reference.uri ? ([['1', reference.uri]] satisfies Subfields) : []),
    ['i', `broader concept of order ${reference.order}`],
  ],
  noteSubfields: (note, record) => [...headingSubfields(note), ['v', record.source.sourceCode]],
};

const twoDigits = (value: number): string => String(value).padStart(2, '0');

/** 008 fixed-length data elements for an authority record entered on `createdOn`. */
export const fixedLengthData = (createdOn: Date): string => {
  const enteredOn =
    twoDigits(createdOn.getUTCFullYear() % 100) +
    twoDigits(createdOn.getUTCMonth() + 1) +
    twoDigits(createdOn.getUTCDate());
  return `${enteredOn}||||zzz||||d${' '.repeat(10)}|| bn|${' '.repeat(6)}`;
};

/**
 * Transcribes a logical record into MARC21 authority fields.
 */
export const toMarcRecord = (
  record: AuthorityRecord,
  profile: MarcMappingProfile,
  createdOn: Date,
): MarcRecord => {
  const tags = HEADING_TAGS[record.headingType];
  const dataFields: MarcDataField[] = [
    dataField('024', profile.identifierIndicators, profile.identifierSubfields(record)),
    dataField('040', [' ', ' '], [['a', record.source.cataloguingAgency]]),
    dataField(tags.heading, [' ', ' '], headingSubfields(record.preferredHeading)),
    ...record.variantHeadings.map((heading) => dataField(tags.variant, [' ', ' '], profile.variantSubfields(heading))),
    ...record.broaderReferences.map((reference) =>
      dataField(tags.broader, [' ', ' '], profile.broaderSubfields(reference, record)),
    ),
  ];

  const noteSubfields = profile.noteSubfields;
  if (noteSubfields) {
    dataFields.push(...record.notes.map((note) => dataField('677', [' ', ' '], noteSubfields(note, record))));
  }

  return {
    leader: AUTHORITY_LEADER,
    controlFields: [
      { tag: '001', value: `${record.source.controlNumberPrefix}${record.localId}` },
      { tag: '003', value: record.source.organizationCode },
      { tag: '008', value: fixedLengthData(createdOn) },
    ],
    dataFields,
  };
};

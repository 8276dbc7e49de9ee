import { logger } from '../../utils/logger';
import type { AncestorChain, AuthorityRecord, ItemAdapter } from '../types';

/**
 * Builds the logical authority record for one resolved item and its chain.
 * Returns undefined (and logs) when the item has no preferred label; a
 * partial record is never produced.
 */
export const assembleRecord = <TItem>(
  item: TItem,
  chain: AncestorChain<TItem>,
  adapter: ItemAdapter<TItem>,
): AuthorityRecord | undefined => {
  const id = adapter.idOf(item);
  const preferredHeading = adapter.preferredHeadingOf(item);
  if (!preferredHeading) {
    logger.warn(`No preferred label for ${adapter.detailUrl(id)}; record skipped`, {
      source: adapter.constants.sourceCode,
    });
    return undefined;
  }

  return {
    id,
    localId: adapter.localIdOf(item),
    headingType: adapter.headingType,
    preferredHeading,
    variantHeadings: adapter.variantHeadingsOf(item),
    broaderReferences: chain.entries.map((entry) => ({
      id: adapter.localIdOf(entry.item),
      uri: adapter.uriOf(entry.item),
      heading: entry.heading,
      order: entry.order,
    })),
    notes: adapter.notesOf(item),
    source: adapter.constants,
  };
};

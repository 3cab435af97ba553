/**
 * @file packages/core/src/document/index.ts
 * @description Document-structuring engine entry point
 */

export * from './nodes';
export { flattenText, listToText, listItemTexts } from './text';
export {
  cellTexts,
  tableHeaders,
  tableToRecords,
  tableToText,
  QUOTE_HEADER_LABEL,
  type QuoteEntry,
  type TableRecordOptions,
} from './tables';
export {
  segmentSections,
  MAJOR_HEADING_LEVEL,
  type SectionMap,
  type SegmentOptions,
} from './segment';
export { groupByLevel, type GroupOptions, type Section } from './outline';
export {
  blockToText,
  flattenContent,
  flattenNodesToText,
  type ContentItem,
  type FlattenContentOptions,
  type SubBlock,
} from './content';
export {
  extractProfile,
  extractRelationNames,
  filterRelationNames,
  DEFAULT_PROFILE_HEADERS,
  RELATION_KEY,
  type Profile,
  type ProfileExtraction,
  type ProfileOptions,
} from './profile';
export {
  parseQuoteSection,
  parseVersionedSection,
  GAME_DATA_SECTION_TITLE,
  QUOTE_SECTION_TITLE,
  type QuoteSectionOptions,
  type VersionedSectionOptions,
} from './versions';

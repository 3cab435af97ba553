/**
 * @file packages/core/src/entities/records.ts
 * @description Assembles one canonical record per document from its sections, profile table and
 *              quote tables, following the entity's field table.
 */

import { flattenContent, type ContentItem } from '../document/content';
import type { BlockNode } from '../document/nodes';
import { groupByLevel, type Section } from '../document/outline';
import { extractProfile } from '../document/profile';
import { segmentSections } from '../document/segment';
import type { QuoteEntry } from '../document/tables';
import { parseQuoteSection } from '../document/versions';
import type { EntityKind } from '../shared/paths';
import {
  ENTITY_PROFILES,
  type EntityProfile,
  type FieldDefault,
  type SectionShape,
} from './field-tables';

export type RecordList = Array<ContentItem | Section>;

export type RecordMap = Record<string, string | string[] | QuoteEntry[]>;

export type RecordValue = RecordList | RecordMap;

export type EntityRecord = Record<string, RecordValue>;

export interface FieldTable {
  fieldMap: Readonly<Record<string, string>>;
  fields: Readonly<Record<string, FieldDefault>>;
}

const shapeSection = (nodes: BlockNode[], shape: SectionShape): RecordList => {
  if (shape.mode === 'outline') {
    return groupByLevel(nodes, shape.level);
  }
  return flattenContent(nodes, shape.minorLevel, { splitListItems: shape.splitListItems });
};

/**
 * Renames keys through the field map, concatenates lists that land on the same canonical key
 * (in source order), and fills every canonical key that is still missing with its default.
 */
export const canonicalizeRecord = (raw: EntityRecord, table: FieldTable): EntityRecord => {
  const unified: EntityRecord = {};
  for (const [key, value] of Object.entries(raw)) {
    const canonical = table.fieldMap[key] ?? key;
    const existing = unified[canonical];
    if (Array.isArray(existing) && Array.isArray(value)) {
      unified[canonical] = [...existing, ...value];
    } else {
      unified[canonical] = value;
    }
  }
  for (const [key, fallback] of Object.entries(table.fields)) {
    if (!(key in unified)) {
      unified[key] = fallback === 'map' ? {} : [];
    }
  }
  return unified;
};

export const buildEntityRecord = (nodes: BlockNode[], profile: EntityProfile): EntityRecord => {
  const raw: EntityRecord = {};
  const sections = segmentSections(nodes, profile.sections, { level: profile.majorLevel });
  for (const [title, sectionNodes] of Object.entries(sections)) {
    const shape = profile.shapes?.[title] ?? profile.defaultShape;
    raw[title] = shapeSection(sectionNodes, shape);
  }

  if (profile.profileTable) {
    const { key, headerLabels, relationKey, minCells } = profile.profileTable;
    const extracted = extractProfile(nodes, { headerLabels, relationKey, minCells });
    const table: RecordMap = { ...extracted.profile };
    if (relationKey && relationKey in extracted.profile) {
      table[`${relationKey}_list`] = extracted.relations;
    }
    raw[key] = table;
  }

  if (profile.quotes) {
    const { key, sectionTitle, versionLevel } = profile.quotes;
    raw[key] = parseQuoteSection(nodes, sectionTitle, {
      majorLevel: profile.majorLevel,
      versionLevel,
    });
  }

  return canonicalizeRecord(raw, profile);
};

export const buildRecord = (kind: EntityKind, nodes: BlockNode[]): EntityRecord =>
  buildEntityRecord(nodes, ENTITY_PROFILES[kind]);

export const buildGameRecord = (nodes: BlockNode[]): EntityRecord => buildRecord('game', nodes);

export const buildSchoolRecord = (nodes: BlockNode[]): EntityRecord =>
  buildRecord('school', nodes);

export const buildStudentRecord = (nodes: BlockNode[]): EntityRecord =>
  buildRecord('student', nodes);

/**
 * @file packages/core/src/entities/field-tables.ts
 * @description Per-entity configuration: which wiki sections are read, how each one is shaped,
 *              and how synonymous section titles collapse onto canonical record keys.
 */

import type { EntityKind } from '../shared/paths';

export type SectionShape =
  | { mode: 'flat'; minorLevel: number; splitListItems?: boolean }
  | { mode: 'outline'; level: number };

export type FieldDefault = 'list' | 'map';

export interface ProfileTableSpec {
  key: string;
  headerLabels: readonly string[];
  relationKey?: string;
  minCells?: number;
}

export interface QuoteSpec {
  key: string;
  sectionTitle: string;
  versionLevel: number;
}

export interface EntityProfile {
  kind: EntityKind;
  majorLevel: number;
  /** Section titles of interest, as they appear on the page. */
  sections: readonly string[];
  defaultShape: SectionShape;
  shapes?: Readonly<Record<string, SectionShape>>;
  profileTable?: ProfileTableSpec;
  quotes?: QuoteSpec;
  /** Synonym → canonical key. Titles missing here keep their own name. */
  fieldMap: Readonly<Record<string, string>>;
  /** Every canonical key of the record and the value it defaults to when absent. */
  fields: Readonly<Record<string, FieldDefault>>;
  /** Page names that are listed with the entity kind but are not built. */
  excluded?: readonly string[];
}

export const GAME_PROFILE: EntityProfile = {
  kind: 'game',
  majorLevel: 2,
  sections: ['背景设定（世界观）', '游戏系统'],
  defaultShape: { mode: 'flat', minorLevel: 4 },
  shapes: {
    游戏系统: { mode: 'outline', level: 3 },
  },
  fieldMap: {},
  fields: {
    '背景设定（世界观）': 'list',
    游戏系统: 'list',
  },
};

export const SCHOOL_PROFILE: EntityProfile = {
  kind: 'school',
  majorLevel: 2,
  sections: [
    '简介',
    '校内设施',
    '社团及学生',
    '学生',
    '历史',
    '概况',
    '学校设施',
    '社团、学生与其他势力',
  ],
  defaultShape: { mode: 'flat', minorLevel: 3, splitListItems: true },
  profileTable: { key: '基本资料', headerLabels: ['基本资料'], minCells: 2 },
  fieldMap: {
    简介: '简介',
    校内设施: '校内设施',
    学校设施: '校内设施',
    学生: '学生与社团',
    社团及学生: '学生与社团',
    '社团、学生与其他势力': '学生与社团',
    历史: '历史',
    概况: '概况',
    基本资料: '基本资料',
  },
  fields: {
    简介: 'list',
    校内设施: 'list',
    学生与社团: 'list',
    历史: 'list',
    概况: 'list',
    基本资料: 'map',
  },
};

export const STUDENT_PROFILE: EntityProfile = {
  kind: 'student',
  majorLevel: 2,
  sections: ['简介', '人物设定', '人物经历', '角色相关'],
  defaultShape: { mode: 'flat', minorLevel: 3 },
  profileTable: {
    key: '学生档案',
    headerLabels: ['学生档案', '基本资料'],
    relationKey: '相关人物',
  },
  quotes: { key: '角色台词', sectionTitle: '角色台词', versionLevel: 3 },
  fieldMap: {},
  fields: {
    简介: 'list',
    人物设定: 'list',
    人物经历: 'list',
    角色相关: 'list',
    学生档案: 'map',
    角色台词: 'map',
  },
  excluded: ['初音未来'],
};

export const ENTITY_PROFILES: Readonly<Record<EntityKind, EntityProfile>> = {
  game: GAME_PROFILE,
  school: SCHOOL_PROFILE,
  student: STUDENT_PROFILE,
};

/**
 * @file packages/core/src/shared/paths.ts
 * @description Helper for resolving canonical directories used by the kivotos CLI.
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export type EntityKind = 'game' | 'school' | 'student';

export const ENTITY_KINDS: readonly EntityKind[] = ['game', 'school', 'student'];

const ROOT = process.env.KIVOTOS_HOME ?? path.join(os.homedir(), '.kivotos');
const DATA_DIR = path.join(ROOT, 'data');

const KIND_DIRS: Record<EntityKind, string> = {
  game: path.join(DATA_DIR, 'games'),
  school: path.join(DATA_DIR, 'schools'),
  student: path.join(DATA_DIR, 'students'),
};

const ensureDir = (target: string): void => {
  fs.mkdirSync(target, { recursive: true });
};

const kindDir = (kind: EntityKind): string => KIND_DIRS[kind];

const markdownDir = (kind: EntityKind): string => path.join(KIND_DIRS[kind], 'markdown');

const jsonDir = (kind: EntityKind): string => path.join(KIND_DIRS[kind], 'json');

export const paths = {
  ROOT,
  DATA_DIR,
  CONFIG: path.join(ROOT, '.kivotosrc.json'),
  kindDir,
  markdownDir,
  jsonDir,
  ensureDir,
};

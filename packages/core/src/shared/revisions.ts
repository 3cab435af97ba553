/**
 * @file packages/core/src/shared/revisions.ts
 * @description Picks the newest snapshot per page from `<name>_<revid>.<ext>` file names.
 *              Revision ids are assumed unique per name; if two files share one, the later
 *              file in the input wins.
 */

import { silentLogger, type Logger } from './logger';

export interface RevisionFile {
  name: string;
  revision: number;
  extension: string;
}

export interface SelectLatestOptions {
  /** Only accept this extension (without the dot). */
  extension?: string;
  logger?: Logger;
}

const REVISION_FILE_PATTERN = /^(?<name>.+)_(?<revision>\d+)\.(?<extension>[^.]+)$/;

export const parseRevisionFilename = (filename: string): RevisionFile | null => {
  const match = REVISION_FILE_PATTERN.exec(filename);
  if (!match?.groups) return null;
  return {
    name: match.groups.name,
    revision: Number.parseInt(match.groups.revision, 10),
    extension: match.groups.extension,
  };
};

export const revisionFilename = (name: string, revision: number, extension = 'md'): string =>
  `${name}_${revision}.${extension}`;

export const selectLatest = (
  filenames: Iterable<string>,
  options: SelectLatestOptions = {},
): Record<string, string> => {
  const { extension, logger = silentLogger } = options;
  const latest = new Map<string, { revision: number; filename: string }>();

  for (const filename of filenames) {
    const parsed = parseRevisionFilename(filename);
    if (!parsed) {
      logger.warn(`ignoring ${filename}: expected <name>_<revision>.<ext>`);
      continue;
    }
    if (extension && parsed.extension !== extension) {
      logger.warn(`ignoring ${filename}: expected a .${extension} file`);
      continue;
    }
    const previous = latest.get(parsed.name);
    if (!previous || parsed.revision >= previous.revision) {
      latest.set(parsed.name, { revision: parsed.revision, filename });
    }
  }

  return Object.fromEntries(
    Array.from(latest.entries(), ([name, entry]) => [name, entry.filename]),
  );
};

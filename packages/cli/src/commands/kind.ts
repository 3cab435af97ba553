/**
 * @file packages/cli/src/commands/kind.ts
 * @description Shared `<kind>` argument for commands that operate on one entity kind.
 */

import { Argument, InvalidArgumentError } from 'commander';
import { ENTITY_KINDS, type EntityKind } from '@kivotos-codex/core';

export const parseKind = (value: string): EntityKind => {
  const kind = ENTITY_KINDS.find((candidate) => candidate === value);
  if (!kind) {
    throw new InvalidArgumentError(`Expected one of: ${ENTITY_KINDS.join(', ')}.`);
  }
  return kind;
};

export const kindArgument = (): Argument =>
  new Argument('<kind>', 'Entity kind').choices(ENTITY_KINDS).argParser(parseKind);

import { Block, DEFAULT_TARGET, ENTRY_POINT_CATEGORIES } from '../builder/types';
import { SchemaStore } from '../schema/store';
import { SchemaTag } from '../schema/types';
import { renderValue } from '../values/items';
import { TypedValue, WireItem } from '../values/types';
import { AssembledTemplate, AssemblyWarning, DocumentBlock, DocumentCodeBlock } from './types';

export const MAX_ITEMS = 27;
export const TAG_SLOT_LIMIT = 26;
export const UNNAMED_TEMPLATE = 'Unnamed';

const DATA_BLOCK_NAMES = {
  func: 'function',
  process: 'process',
  call_func: 'call_func',
  start_process: 'start_process',
} as const;

const renderItems = (args: readonly TypedValue[]): WireItem[] => {
  return args.map((value, slot) => renderValue(value, slot));
};

export const attachTags = (items: WireItem[], tags: readonly SchemaTag[]): WireItem[] => {
  if (items.length + tags.length <= MAX_ITEMS) {
    return [...items, ...tags];
  }
  const keep = Math.max(0, TAG_SLOT_LIMIT - tags.length);
  return [...items.slice(0, keep), ...tags];
};

const resolveTags = (
  category: string,
  name: string,
  schema: SchemaStore,
  warnings: AssemblyWarning[]
): readonly SchemaTag[] => {
  const lookup = schema.lookup(category, name);
  switch (lookup.status) {
    case 'found':
      return lookup.tags;
    case 'unrecognized':
      warnings.push({
        code: 'unrecognized-action',
        category,
        action: name,
        suggestion: lookup.suggestion,
      });
      return [];
    case 'none':
    case 'absent':
      return [];
    default: {
      const exhaustive: never = lookup;
      return exhaustive;
    }
  }
};

const toDocumentBlock = (
  block: Block,
  schema: SchemaStore,
  warnings: AssemblyWarning[]
): DocumentBlock => {
  switch (block.kind) {
    case 'bracket':
      return { id: 'bracket', direct: block.direction, type: block.flavor, args: { items: [] } };
    case 'else': {
      const tags = resolveTags('else', 'else', schema, warnings);
      return { id: 'block', block: 'else', args: { items: attachTags([], tags) } };
    }
    case 'data': {
      const tags = resolveTags(block.category, DATA_BLOCK_NAMES[block.category], schema, warnings);
      return {
        id: 'block',
        block: block.category,
        data: block.data,
        args: { items: attachTags(renderItems(block.args), tags) },
      };
    }
    case 'action': {
      const tags = resolveTags(block.category, block.action, schema, warnings);
      const result: DocumentCodeBlock = {
        id: 'block',
        block: block.category,
        action: block.action,
        args: { items: attachTags(renderItems(block.args), tags) },
      };
      if (block.subAction !== undefined) {
        result.subAction = block.subAction;
      }
      if (block.inverted) {
        result.attribute = 'NOT';
      }
      if (block.target !== DEFAULT_TARGET) {
        result.target = block.target;
      }
      return result;
    }
    default: {
      const exhaustive: never = block;
      return exhaustive;
    }
  }
};

const categoryOf = (block: Block): string => {
  if (block.kind === 'action' || block.kind === 'data') return block.category;
  return block.kind;
};

const deriveName = (first: Block | undefined): string | undefined => {
  if (!first || (first.kind !== 'action' && first.kind !== 'data')) {
    return undefined;
  }
  if (!ENTRY_POINT_CATEGORIES.includes(first.category)) {
    return undefined;
  }
  return first.kind === 'action' ? `${first.category}_${first.action}` : first.data;
};

const countOpenBrackets = (blocks: readonly Block[]): number => {
  return blocks.reduce((open, block) => {
    if (block.kind !== 'bracket') return open;
    return block.direction === 'open' ? open + 1 : open - 1;
  }, 0);
};

export const assembleTemplate = (blocks: readonly Block[], schema: SchemaStore): AssembledTemplate => {
  const warnings: AssemblyWarning[] = [];
  const documentBlocks = blocks.map((block) => toDocumentBlock(block, schema, warnings));

  const first: Block | undefined = blocks[0];
  const name = deriveName(first);
  if (name === undefined) {
    warnings.push({
      code: 'missing-entry-point',
      category: first && categoryOf(first),
    });
  }

  const open = countOpenBrackets(blocks);
  if (open > 0) {
    warnings.push({ code: 'unclosed-bracket', open });
  }

  return {
    document: { blocks: documentBlocks },
    name: name ?? UNNAMED_TEMPLATE,
    warnings,
  };
};

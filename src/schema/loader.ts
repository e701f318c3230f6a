import fs from 'node:fs/promises';
import { EventLogger } from '../logging/event-logger';
import {
  formatValidationIssues,
  hasErrors,
  isPlainObject,
  parseYamlStrict,
  pushIssue,
  ValidationIssue,
} from '../utils/validation';
import { SchemaStore } from './store';
import { SchemaTable, SchemaTag } from './types';

export const EXTRAS_KEY = 'extras';
export const DEFAULT_SCHEMA_PATH = 'data/schema.json';

const MAX_SLOT = 26;

export class SchemaLoadError extends Error {
  readonly issues: ValidationIssue[];

  constructor(issues: ValidationIssue[]) {
    super(formatValidationIssues(issues));
    this.name = 'SchemaLoadError';
    this.issues = issues;
  }
}

const isMissingFileError = (error: unknown): boolean => {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
};

const isSchemaTag = (
  value: unknown,
  file: string,
  pathKey: string,
  issues: ValidationIssue[]
): value is SchemaTag => {
  if (!isPlainObject(value)) {
    pushIssue(issues, file, pathKey, 'Tag must be an object');
    return false;
  }

  const before = issues.length;
  if (!isPlainObject(value.item)) {
    pushIssue(issues, file, `${pathKey}.item`, 'item must be an object');
  } else {
    if (typeof value.item.id !== 'string' || value.item.id.length === 0) {
      pushIssue(issues, file, `${pathKey}.item.id`, 'id must be a non-empty string');
    }
    if (!isPlainObject(value.item.data)) {
      pushIssue(issues, file, `${pathKey}.item.data`, 'data must be an object');
    }
  }

  if (typeof value.slot !== 'number' || !Number.isInteger(value.slot)) {
    pushIssue(issues, file, `${pathKey}.slot`, 'slot must be an integer');
  } else if (value.slot < 0 || value.slot > MAX_SLOT) {
    pushIssue(issues, file, `${pathKey}.slot`, `slot must be between 0 and ${MAX_SLOT}`);
  }

  return issues.length === before;
};

const readTagList = (
  value: unknown,
  file: string,
  pathKey: string,
  issues: ValidationIssue[]
): SchemaTag[] => {
  if (!Array.isArray(value)) {
    pushIssue(issues, file, pathKey, 'Tags must be an array');
    return [];
  }

  const tags: SchemaTag[] = [];
  value.forEach((entry: unknown, index) => {
    if (isSchemaTag(entry, file, `${pathKey}[${index}]`, issues)) {
      tags.push(entry);
    }
  });
  return tags;
};

export const parseSchemaTable = (
  data: unknown,
  file: string
): { table?: SchemaTable; issues: ValidationIssue[] } => {
  const issues: ValidationIssue[] = [];

  if (!isPlainObject(data)) {
    pushIssue(issues, file, '', 'Root document must be an object');
    return { issues };
  }

  const table: SchemaTable = { actions: {}, extras: {} };

  for (const [category, entry] of Object.entries(data)) {
    if (!isPlainObject(entry)) {
      pushIssue(issues, file, category, `"${category}" must map names to tag lists`);
      continue;
    }

    const target: Record<string, SchemaTag[]> = {};
    for (const [name, tags] of Object.entries(entry)) {
      target[name] = readTagList(tags, file, `${category}.${name}`, issues);
    }

    if (category === EXTRAS_KEY) {
      table.extras = target;
    } else {
      table.actions[category] = target;
    }
  }

  if (hasErrors(issues)) {
    return { issues };
  }

  return { table, issues };
};

/**
 * Reads the tag table. A missing file is reported once and yields a store
 * without a table; a malformed one throws.
 */
export const loadSchemaStore = async (
  filePath: string = DEFAULT_SCHEMA_PATH,
  eventLogger?: EventLogger
): Promise<SchemaStore> => {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      eventLogger?.emitEvent({ event: 'schema-missing', file: filePath });
      return SchemaStore.empty();
    }
    throw error;
  }

  const parsed = parseYamlStrict(filePath, content);
  const result = parsed.data === undefined ? undefined : parseSchemaTable(parsed.data, filePath);

  if (!result?.table) {
    const issues = [...parsed.issues, ...(result?.issues ?? [])];
    throw new SchemaLoadError(issues.filter((issue) => issue.severity === 'error'));
  }

  const store = SchemaStore.fromTable(result.table);
  eventLogger?.emitEvent({
    event: 'schema-loaded',
    file: filePath,
    categories: store.categories,
  });
  return store;
};

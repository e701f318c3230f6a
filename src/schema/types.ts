import type { WireItem } from '../values/types';

export type SchemaTag = WireItem;

export type SchemaTable = {
  actions: Record<string, Record<string, SchemaTag[]>>;
  extras: Record<string, SchemaTag[]>;
};

export type SchemaLookup =
  | { status: 'found'; tags: SchemaTag[] }
  | { status: 'unrecognized'; suggestion?: string }
  | { status: 'none' }
  | { status: 'absent' };

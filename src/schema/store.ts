import { findClosestMatch } from './similarity';
import { SchemaLookup, SchemaTable } from './types';

/**
 * Read-only index of the tags each code block carries after its arguments.
 * A store built without a table answers every lookup with `absent`.
 */
export class SchemaStore {
  private readonly table?: SchemaTable;

  private constructor(table?: SchemaTable) {
    this.table = table;
  }

  public static empty(): SchemaStore {
    return new SchemaStore();
  }

  public static fromTable(table: SchemaTable): SchemaStore {
    return new SchemaStore(table);
  }

  public get isLoaded(): boolean {
    return this.table !== undefined;
  }

  public get categories(): string[] {
    if (!this.table) return [];
    return [...new Set([...Object.keys(this.table.actions), ...Object.keys(this.table.extras)])].sort();
  }

  public lookup(category: string, action: string): SchemaLookup {
    if (!this.table) {
      return { status: 'absent' };
    }

    if (Object.hasOwn(this.table.extras, category)) {
      return { status: 'found', tags: this.table.extras[category] };
    }

    if (!Object.hasOwn(this.table.actions, category)) {
      return { status: 'none' };
    }

    const actions = this.table.actions[category];
    if (Object.hasOwn(actions, action)) {
      return { status: 'found', tags: actions[action] };
    }

    return { status: 'unrecognized', suggestion: findClosestMatch(action, Object.keys(actions)) };
  }
}

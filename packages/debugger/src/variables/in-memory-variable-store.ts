import type { VariableRecord, VariableStore } from '@flowscope/models';

const VARIABLE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type VariableType =
  | 'boolean'
  | 'integer'
  | 'number'
  | 'list'
  | 'dict'
  | 'string'
  | 'null';

export interface StoredVariable extends VariableRecord {
  type: VariableType;
  description: string;
}

/**
 * Flow variables held in a Map, for executors without a store of their own
 * and for tests.
 */
export class InMemoryVariableStore implements VariableStore {
  private readonly variables = new Map<string, StoredVariable>();

  /**
   * Creates or overwrites a variable. An overwrite without a description
   * keeps the previous one.
   * @returns false when the name is not an identifier
   */
  public setVariable(name: string, value: unknown, description?: string): boolean {
    if (!VARIABLE_NAME.test(name)) {
      return false;
    }
    const previous = this.variables.get(name);
    this.variables.set(name, {
      value,
      type: inferType(value),
      description: description ?? previous?.description ?? '',
    });
    return true;
  }

  public deleteVariable(name: string): boolean {
    return this.variables.delete(name);
  }

  public hasVariable(name: string): boolean {
    return this.variables.has(name);
  }

  public getVariable(name: string): unknown {
    return this.variables.get(name)?.value;
  }

  public getAllVariables(): Record<string, StoredVariable> {
    const snapshot: Record<string, StoredVariable> = {};
    for (const [name, record] of this.variables) {
      snapshot[name] = { ...record };
    }
    return snapshot;
  }

  public clear(): void {
    this.variables.clear();
  }
}

export function inferType(value: unknown): VariableType {
  if (value === null || value === undefined) {
    return 'null';
  }
  if (typeof value === 'boolean') {
    return 'boolean';
  }
  if (typeof value === 'number') {
    return Number.isInteger(value) ? 'integer' : 'number';
  }
  if (Array.isArray(value)) {
    return 'list';
  }
  if (typeof value === 'object') {
    return 'dict';
  }
  return 'string';
}

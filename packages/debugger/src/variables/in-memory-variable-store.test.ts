import { describe, it, expect, beforeEach } from 'vitest';
import { InMemoryVariableStore, inferType } from './in-memory-variable-store.js';

describe('InMemoryVariableStore', () => {
  let store: InMemoryVariableStore;

  beforeEach(() => {
    store = new InMemoryVariableStore();
  });

  it('stores values with their inferred type and description', () => {
    expect(store.setVariable('retries', 3, 'attempts so far')).toBe(true);

    expect(store.getVariable('retries')).toBe(3);
    expect(store.getAllVariables()).toEqual({
      retries: { value: 3, type: 'integer', description: 'attempts so far' },
    });
  });

  it('keeps the description when a value is overwritten without one', () => {
    store.setVariable('url', 'https://example.test', 'start page');
    store.setVariable('url', 'https://example.test/next');

    expect(store.getAllVariables().url).toEqual({
      value: 'https://example.test/next',
      type: 'string',
      description: 'start page',
    });
  });

  it.each(['', '1st', 'first-name', 'a b'])('refuses the name %j', (name) => {
    expect(store.setVariable(name, 1)).toBe(false);
    expect(store.hasVariable(name)).toBe(false);
  });

  it('returns undefined for unknown variables', () => {
    expect(store.getVariable('nothing')).toBeUndefined();
  });

  it('deletes and clears', () => {
    store.setVariable('a', 1);
    store.setVariable('b', 2);

    expect(store.deleteVariable('a')).toBe(true);
    expect(store.deleteVariable('a')).toBe(false);
    store.clear();
    expect(store.getAllVariables()).toEqual({});
  });

  it('hands out snapshots that do not alias the store', () => {
    store.setVariable('a', 1);

    const snapshot = store.getAllVariables();
    snapshot.a.value = 99;

    expect(store.getVariable('a')).toBe(1);
  });
});

describe('inferType', () => {
  it.each([
    [true, 'boolean'],
    [4, 'integer'],
    [4.5, 'number'],
    [[1], 'list'],
    [{ a: 1 }, 'dict'],
    ['text', 'string'],
    [null, 'null'],
  ])('classifies %j as %s', (value, expected) => {
    expect(inferType(value)).toBe(expected);
  });
});

import { describe, expect, it } from 'vitest';

import { UndefinedVariableError } from '../../src/errors.js';
import {
  createVariableStore,
  formatVariableValue,
  getSubstitutionList,
  lookupVariable,
  setVariable,
  substituteVariables,
} from '../../src/script/variables.js';

describe('createVariableStore', () => {
  it('creates empty store', () => {
    const store = createVariableStore();

    expect(store.values).toEqual({});
  });

  it('copies initial values', () => {
    const initial = { name: 'Ada' };
    const store = createVariableStore(initial);
    setVariable(store, 'name', 'Grace');

    expect(initial.name).toBe('Ada');
    expect(store.values['name']).toBe('Grace');
  });
});

describe('lookupVariable', () => {
  it('resolves dotted paths into nested values', () => {
    const store = createVariableStore({ llm: { description: 'fast', limits: { out: 10 } } });

    expect(lookupVariable(store, 'llm.description')).toBe('fast');
    expect(lookupVariable(store, 'llm.limits.out')).toBe(10);
  });

  it('throws for a missing segment', () => {
    const store = createVariableStore({ llm: { description: 'fast' } });

    expect(() => lookupVariable(store, 'llm.missing')).toThrow(UndefinedVariableError);
    expect(() => lookupVariable(store, 'nope')).toThrow("Variable 'nope' is not defined");
  });

  it('does not resolve inherited properties', () => {
    const store = createVariableStore();

    expect(() => lookupVariable(store, 'toString')).toThrow(UndefinedVariableError);
  });
});

describe('formatVariableValue', () => {
  it('formats scalars and objects', () => {
    expect(formatVariableValue('text')).toBe('text');
    expect(formatVariableValue(42)).toBe('42');
    expect(formatVariableValue(true)).toBe('true');
    expect(formatVariableValue(null)).toBe('');
    expect(formatVariableValue({ a: 1 })).toBe('{"a":1}');
  });
});

describe('substituteVariables', () => {
  it('returns text without placeholders unchanged', () => {
    const store = createVariableStore();

    expect(substituteVariables('Plain text', store)).toBe('Plain text');
  });

  it('replaces adjacent placeholders', () => {
    const store = createVariableStore({ a: '1', b: '2' });

    expect(substituteVariables('<[a]><[b]>', store)).toBe('12');
  });

  it('replaces dotted placeholders', () => {
    const store = createVariableStore({ llm: { company: 'Stub Inc' } });

    expect(substituteVariables('Made by <[llm.company]>.', store)).toBe(
      'Made by Stub Inc.'
    );
  });

  it('does not rescan inserted values', () => {
    const store = createVariableStore({ a: '<[b]>', b: 'never' });

    expect(substituteVariables('<[a]>', store)).toBe('<[b]>');
  });

  it('throws for an undefined variable', () => {
    const store = createVariableStore();

    expect(() => substituteVariables('Hi <[who]>', store)).toThrow(
      "Variable 'who' is not defined"
    );
  });

  it('rejects nested placeholders', () => {
    const store = createVariableStore({ a: '1', b: '2' });

    expect(() => substituteVariables('<[a<[b]>]>', store)).toThrow(
      UndefinedVariableError
    );
  });

  it('matches placeholders spanning lines', () => {
    const store = createVariableStore({ 'a\nb': 'x' });

    expect(substituteVariables('<[a\nb]>', store)).toBe('x');
  });
});

describe('getSubstitutionList', () => {
  it('lists unique placeholder names in order', () => {
    expect(getSubstitutionList('<[b]> <[a]> <[b]>')).toEqual(['b', 'a']);
  });

  it('returns empty list without placeholders', () => {
    expect(getSubstitutionList('none here')).toEqual([]);
  });
});

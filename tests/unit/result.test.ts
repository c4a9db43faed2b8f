import { describe, it, expect } from 'vitest';
import { Result } from '../../src/result/result.js';
import { Row } from '../../src/result/row.js';
import { AmbiguousResultError, EmptyResultError, ResultKindError } from '../../src/errors.js';
import { makeRows } from './helpers.js';

const columns = ['id', 'username'];

function resultOf(n: number): Result {
  return Result.fromRows(columns, makeRows(columns, Array.from({ length: n }, (_, i) => [i + 1, `user_${i}`])));
}

describe('Result normalization', () => {
  it('stores a row set as-is', () => {
    const rows = makeRows(columns, [[1, 'a'], [2, 'b']]);
    const result = Result.fromRows(columns, rows);
    expect(result.kind).toBe('rows');
    expect(result.all()).toEqual(rows);
    expect(result.all()[1]).toBe(rows[1]);
  });

  it('wraps a scalar as a one-element sequence', () => {
    const result = Result.fromScalar(42);
    expect(result.kind).toBe('scalar');
    expect(result.all()).toHaveLength(1);
    expect(result.scalar()).toBe(42);
    expect(result.columns).toEqual(['value']);
  });

  it('treats a null or undefined scalar as absence', () => {
    expect(Result.fromScalar(null).kind).toBe('empty');
    expect(Result.fromScalar(undefined).all()).toEqual([]);
  });

  it('keeps a falsy scalar', () => {
    expect(Result.fromScalar(0).scalar()).toBe(0);
    expect(Result.fromScalar(false).scalar()).toBe(false);
  });

  it('wraps an affected count as a one-element sequence', () => {
    const result = Result.fromAffected(3);
    expect(result.kind).toBe('affected');
    expect(result.all()).toHaveLength(1);
    expect(result.scalar()).toBe(3);
    expect(result.rowCount).toBe(3);
  });

  it('stores absence as an empty sequence', () => {
    const result = Result.empty();
    expect(result.all()).toEqual([]);
    expect(result.rowCount).toBe(0);
    expect(result.columns).toEqual([]);
  });

  it('is not affected by later changes to the input array', () => {
    const rows = makeRows(columns, [[1, 'a']]);
    const result = Result.fromRows(columns, rows);
    rows.push(new Row(columns, [2, 'b']));
    expect(result.all()).toHaveLength(1);
    expect(Object.isFrozen(result.all())).toBe(true);
  });
});

describe('Result.first()', () => {
  it('returns the first row', () => {
    expect(resultOf(3).first()?.get('username')).toBe('user_0');
  });

  it('returns null when empty, without throwing', () => {
    expect(resultOf(0).first()).toBeNull();
  });
});

describe('Result.one() / oneOrNone()', () => {
  it('one() throws EmptyResultError for 0 rows', () => {
    expect(() => resultOf(0).one()).toThrow(EmptyResultError);
  });

  it('one() returns the only row for 1 row', () => {
    expect(resultOf(1).one().get('id')).toBe(1);
  });

  it.each([2, 3, 10])('one() throws AmbiguousResultError carrying the count for %i rows', (n) => {
    try {
      resultOf(n).one();
      expect.unreachable('one() should have thrown');
    } catch (err) {
      expect(err).toBeInstanceOf(AmbiguousResultError);
      expect((err as AmbiguousResultError).count).toBe(n);
    }
  });

  it('oneOrNone() returns null for 0 rows', () => {
    expect(resultOf(0).oneOrNone()).toBeNull();
  });

  it('oneOrNone() returns the only row for 1 row', () => {
    expect(resultOf(1).oneOrNone()?.get('username')).toBe('user_0');
  });

  it.each([2, 5])('oneOrNone() throws AmbiguousResultError for %i rows', (n) => {
    expect(() => resultOf(n).oneOrNone()).toThrow(`Expected at most one result, got ${n}`);
  });
});

describe('Result.scalar() / scalarOneOrNone()', () => {
  it('scalar() returns the first column of the first row', () => {
    expect(resultOf(3).scalar()).toBe(1);
  });

  it('scalar() returns null when there are no rows', () => {
    expect(resultOf(0).scalar()).toBeNull();
  });

  it('scalar() returns null when the first row has no columns', () => {
    expect(Result.fromRows([], [new Row([], [])]).scalar()).toBeNull();
  });

  it('scalarOneOrNone() returns the first column of the only row', () => {
    expect(resultOf(1).scalarOneOrNone()).toBe(1);
  });

  it('scalarOneOrNone() returns null for no rows', () => {
    expect(resultOf(0).scalarOneOrNone()).toBeNull();
  });

  it('scalarOneOrNone() still throws AmbiguousResultError for 2 rows', () => {
    expect(() => resultOf(2).scalarOneOrNone()).toThrow(AmbiguousResultError);
  });
});

describe('Result.scalars()', () => {
  it('drops every row to its first column, in row order', () => {
    const scalars = resultOf(3).scalars();
    expect(scalars.all()).toEqual([1, 2, 3]);
    expect(scalars.first()).toBe(1);
    expect([...scalars]).toEqual([1, 2, 3]);
  });

  it('first() is null when empty', () => {
    expect(resultOf(0).scalars().first()).toBeNull();
    expect(resultOf(0).scalars().all()).toEqual([]);
  });
});

describe('Result.mappings()', () => {
  it('converts rows to objects with keys in column order', () => {
    const mappings = resultOf(2).mappings();
    expect(mappings).toEqual([
      { id: 1, username: 'user_0' },
      { id: 2, username: 'user_1' },
    ]);
    expect(Object.keys(mappings[0]!)).toEqual(['id', 'username']);
  });

  it('is empty when there are no rows', () => {
    expect(resultOf(0).mappings()).toEqual([]);
  });

  it('exposes a scalar under the value column', () => {
    expect(Result.fromScalar('x').mappings()).toEqual([{ value: 'x' }]);
  });

  it('throws ResultKindError for an affected-row count', () => {
    expect(() => Result.fromAffected(1).mappings()).toThrow(ResultKindError);
  });
});

describe('Result iteration', () => {
  it('yields rows in original order', () => {
    const result = resultOf(3);
    expect([...result].map((r) => r.get('id'))).toEqual([1, 2, 3]);
  });

  it('can be iterated more than once', () => {
    const result = resultOf(2);
    const firstPass = [...result];
    const secondPass = [...result];
    expect(secondPass).toEqual(firstPass);
    expect(secondPass).toHaveLength(2);
  });

  it('reports column names from the row set', () => {
    expect(resultOf(0).columns).toEqual(['id', 'username']);
  });
});

describe('Result.from()', () => {
  it('takes an array of rows as a row set with the first row\'s columns', () => {
    const rows = makeRows(columns, [[1, 'a'], [2, 'b']]);
    const result = Result.from(rows);
    expect(result.kind).toBe('rows');
    expect(result.columns).toEqual(['id', 'username']);
    expect(result.all()).toEqual(rows);
  });

  it('takes an empty array as an empty row set', () => {
    const result = Result.from([]);
    expect(result.kind).toBe('rows');
    expect(result.all()).toEqual([]);
    expect(result.first()).toBeNull();
  });

  it('takes any other value as a scalar', () => {
    const result = Result.from('25');
    expect(result.kind).toBe('scalar');
    expect(result.scalar()).toBe('25');
    expect(Result.from([1, 2]).scalar()).toEqual([1, 2]);
  });

  it('takes null or undefined as absence', () => {
    expect(Result.from(null).kind).toBe('empty');
    expect(Result.from(undefined).all()).toEqual([]);
  });
});

describe('Result.mappings() with unusual column names', () => {
  it('keeps a __proto__ column as an own key', () => {
    const result = Result.fromRows(['__proto__', 'a'], [new Row(['__proto__', 'a'], [{ id: 1 }, 2])]);
    const [mapping] = result.mappings();
    expect(Object.keys(mapping ?? {})).toEqual(['__proto__', 'a']);
    expect(Object.getPrototypeOf(mapping)).toBe(Object.prototype);
    expect(Object.prototype.hasOwnProperty.call(mapping, 'id')).toBe(false);
  });
});

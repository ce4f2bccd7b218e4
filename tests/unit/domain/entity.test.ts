/**
 * @fileoverview Unit tests for entity definitions and value equality
 */

import { deepFreeze, defineEntity, EntityValidationError, valueEquals } from '../../../src';

interface Book {
  readonly id: string;
  readonly title: string;
  readonly tags: readonly string[];
  readonly published?: Date;
}

const Books = defineEntity<Book>('Book', (props) => {
  const problems: string[] = [];
  if (props.id === '') problems.push('id must not be empty');
  if (props.title.trim() === '') problems.push('title must not be empty');
  return problems;
});

describe('defineEntity', () => {
  it('should create a frozen copy', () => {
    const tags = ['fiction'];
    const book = Books.create({ id: '1', title: 'Dune', tags });

    tags.push('mutated');

    expect(book.tags).toEqual(['fiction']);
    expect(Object.isFrozen(book)).toBe(true);
    expect(Object.isFrozen(book.tags)).toBe(true);
  });

  it('should reject props that fail validation', () => {
    expect(() => Books.create({ id: '', title: ' ', tags: [] })).toThrowErrorType(
      EntityValidationError,
    );
    expect(() => Books.create({ id: '', title: ' ', tags: [] })).toThrow(
      'Invalid Book: id must not be empty; title must not be empty',
    );
  });

  it('should list the problems on the error', () => {
    try {
      Books.create({ id: '2', title: '', tags: [] });
    } catch (error) {
      expect(error).toBeInstanceOf(EntityValidationError);
      expect(error).toMatchObject({ entityName: 'Book', problems: ['title must not be empty'] });
    }
    expect.assertions(2);
  });

  it('should compare by value', () => {
    const a = Books.create({ id: '1', title: 'Dune', tags: ['a', 'b'] });
    const b = Books.create({ id: '1', title: 'Dune', tags: ['a', 'b'] });
    const c = Books.create({ id: '1', title: 'Dune', tags: ['b', 'a'] });

    expect(Books.equals(a, b)).toBe(true);
    expect(Books.equals(a, c)).toBe(false);
  });

  it('should copy with a patch, leaving the original untouched', () => {
    const original = Books.create({ id: '1', title: 'Dune', tags: [] });
    const copy = Books.copyWith(original, { title: 'Dune Messiah' });

    expect(copy.title).toBe('Dune Messiah');
    expect(original.title).toBe('Dune');
    expect(() => Books.copyWith(original, { title: '' })).toThrow(
      'Invalid Book: title must not be empty',
    );
  });

  it('should recognise its own entities', () => {
    const book = Books.create({ id: '1', title: 'Dune', tags: [] });

    expect(Books.isEntity(book)).toBe(true);
    expect(Books.isEntity({ id: '1', title: 'Dune', tags: [] })).toBe(false);
    expect(Books.isEntity(null)).toBe(false);
  });

  it('should keep dates as dates', () => {
    const book = Books.create({ id: '1', title: 'Dune', tags: [], published: new Date(0) });

    expect(book.published).toBeInstanceOf(Date);
    expect(book.published?.getTime()).toBe(0);
  });
});

describe('deepFreeze', () => {
  it('should freeze nested objects', () => {
    const value = deepFreeze({ a: { b: [1, { c: 2 }] } });

    expect(Object.isFrozen(value.a)).toBe(true);
    expect(Object.isFrozen(value.a.b)).toBe(true);
    expect(Object.isFrozen(value.a.b[1])).toBe(true);
  });

  it('should return primitives unchanged', () => {
    expect(deepFreeze(5)).toBe(5);
    expect(deepFreeze(null)).toBeNull();
  });
});

describe('valueEquals', () => {
  it('should ignore key order', () => {
    expect(valueEquals({ id: '1', tags: ['a'] }, { tags: ['a'], id: '1' })).toBe(true);
  });

  it('should compare primitives with Object.is', () => {
    expect(valueEquals(NaN, NaN)).toBe(true);
    expect(valueEquals(0, -0)).toBe(false);
    expect(valueEquals('1', 1)).toBe(false);
  });

  it('should compare dates by time', () => {
    expect(valueEquals(new Date(5), new Date(5))).toBe(true);
    expect(valueEquals(new Date(5), new Date(6))).toBe(false);
    expect(valueEquals(new Date(5), 5)).toBe(false);
  });

  it('should compare arrays in order', () => {
    expect(valueEquals([1, [2]], [1, [2]])).toBe(true);
    expect(valueEquals([1, 2], [2, 1])).toBe(false);
    expect(valueEquals([1], { 0: 1 })).toBe(false);
  });

  it('should compare maps and sets by membership', () => {
    expect(valueEquals(new Map([['a', 1], ['b', 2]]), new Map([['b', 2], ['a', 1]]))).toBe(true);
    expect(valueEquals(new Map([['a', 1]]), new Map([['a', 2]]))).toBe(false);
    expect(valueEquals(new Set([{ x: 1 }, 2]), new Set([2, { x: 1 }]))).toBe(true);
    expect(valueEquals(new Set([1]), new Set([2]))).toBe(false);  });

  it('should pair each set item with one item on the other side', () => {
    expect(valueEquals(new Set([{ a: 1 }, { a: 1 }]), new Set([{ a: 1 }, { a: 2 }]))).toBe(false);
    expect(valueEquals(new Set([{ a: 1 }, { a: 2 }]), new Set([{ a: 1 }, { a: 1 }]))).toBe(false);
    expect(valueEquals(new Set([{ a: 1 }, { a: 1 }]), new Set([{ a: 1 }, { a: 1 }]))).toBe(true);
  });

  it('should tell objects with extra keys apart', () => {
    expect(valueEquals({ a: 1 }, { a: 1, b: undefined })).toBe(false);
    expect(valueEquals({ a: 1, b: undefined }, { a: 1, c: undefined })).toBe(false);
  });
});

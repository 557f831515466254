import { describe, expect, it } from 'vitest';
import { isIntegrityViolation } from '../src/errors.js';
import { createMemoryStore } from './helpers/memory-store.js';

describe('isIntegrityViolation', () => {
  it('accepts constraint error codes', () => {
    expect(isIntegrityViolation({ code: 'SQLITE_CONSTRAINT_UNIQUE' })).toBe(true);
    expect(isIntegrityViolation({ code: 'SQLITE_CONSTRAINT_FOREIGNKEY' })).toBe(true);
  });

  it('rejects other error codes', () => {
    expect(isIntegrityViolation({ code: 'SQLITE_BUSY' })).toBe(false);
    expect(isIntegrityViolation({ code: 19 })).toBe(false);
    expect(isIntegrityViolation(new Error('no code'))).toBe(false);
  });

  it('rejects values that are not objects', () => {
    expect(isIntegrityViolation('SQLITE_CONSTRAINT_UNIQUE')).toBe(false);
    expect(isIntegrityViolation(null)).toBe(false);
    expect(isIntegrityViolation(undefined)).toBe(false);
  });

  it('recognises a duplicate name raised by the store', () => {
    const db = createMemoryStore();
    const insert = db.prepare<[string]>('insert into products (product_name) values (?)');
    insert.run('Widget');

    let caught: unknown;
    try {
      insert.run('Widget');
    } catch (error) {
      caught = error;
    }
    db.close();

    expect(caught).toBeInstanceOf(Error);
    expect(isIntegrityViolation(caught)).toBe(true);
  });
});

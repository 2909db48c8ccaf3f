import { describe, it, expect } from 'vitest';
import {
  MAX_COMPLETIONS,
  aliasMap,
  complete,
  completionContext,
  completionItems,
  fromTables,
  tokenBeforeCursor,
} from './completion';
import type { QuerySchema } from '../events/types';

const schema: QuerySchema = {
  tables: ['orders', 'order_items', 'users'],
  columns: {
    users: ['id', 'name', 'email'],
    orders: ['id', 'user_id', 'total'],
    order_items: ['order_id', 'sku'],
  },
};

describe('tokenBeforeCursor', () => {
  it('takes the letters and underscores left of the cursor', () => {
    expect(tokenBeforeCursor('select us', 9)).toBe('us');
    expect(tokenBeforeCursor('a.b_c', 5)).toBe('b_c');
    expect(tokenBeforeCursor('select us', 8)).toBe('u');
    expect(tokenBeforeCursor('id1', 3)).toBe('');
  });
});

describe('fromTables and aliasMap', () => {
  const sql = 'select * from public.users u join orders as o on true';

  it('lists the tables after FROM and JOIN without schema qualifiers', () => {
    expect(fromTables(sql)).toEqual(['users', 'orders']);
    expect(fromTables('select 1')).toEqual([]);
  });

  it('maps aliases with and without AS', () => {
    expect([...aliasMap(sql)]).toEqual([['u', 'users'], ['o', 'orders']]);
    expect(aliasMap('select * from users where id = 1').size).toBe(0);
  });
});

describe('completionContext', () => {
  it('offers tables after FROM', () => {
    expect(completionContext(['SELECT * FROM or'], 0, 16)).toEqual({ type: 'table' });
  });

  it('offers the columns of the table an alias names', () => {
    const lines = ['SELECT *', 'FROM orders o', 'JOIN users AS u ON u.id = o.user_id', 'WHERE o.t'];
    expect(completionContext(lines, 3, 9)).toEqual({ type: 'table-column', table: 'orders' });
    expect(completionContext(['SELECT u. FROM users u'], 0, 9)).toEqual({ type: 'table-column', table: 'users' });
  });

  it('offers the FROM tables\' columns after SELECT', () => {
    expect(completionContext(['SELECT i FROM users'], 0, 8)).toEqual({ type: 'column', tables: ['users'] });
  });

  it('falls back to keywords', () => {
    expect(completionContext(['sel'], 0, 3)).toEqual({ type: 'keyword' });
  });
});

describe('completionItems', () => {
  it('needs a prefix before offering keywords', () => {
    expect(completionItems({ type: 'keyword' }, 'sel', schema)).toEqual(['SELECT']);
    expect(completionItems({ type: 'keyword' }, '', schema)).toEqual([]);
  });

  it('matches table and column names ignoring case', () => {
    expect(completionItems({ type: 'table' }, 'OR', schema)).toEqual(['orders', 'order_items']);
    expect(completionItems({ type: 'table-column', table: 'Orders' }, 't', schema)).toEqual(['total']);
    expect(completionItems({ type: 'table-column', table: 'missing' }, '', schema)).toEqual([]);
  });

  it('puts columns before keywords and stops at the limit', () => {
    expect(completionItems({ type: 'column', tables: ['users'] }, 'na', schema)).toEqual(['name', 'NATURAL']);
    expect(completionItems({ type: 'column', tables: ['users'] }, 'i', schema)).toEqual([
      'id', 'ILIKE', 'IMMUTABLE', 'IN', 'INDEX', 'INNER', 'INSERT', 'INTERSECT',
    ]);
  });

  it('lists a column shared by two tables once', () => {
    expect(completionItems({ type: 'column', tables: ['users', 'orders'] }, '', schema)).toEqual([
      'id', 'name', 'email', 'user_id', 'total',
    ]);
  });
});

describe('complete', () => {
  it('returns the prefix with the candidates', () => {
    expect(complete(['SELECT * FROM us'], 0, 16, schema)).toEqual({ items: ['users'], prefix: 'us' });
  });

  it('returns null when nothing matches', () => {
    expect(complete(['SELECT * FROM zz'], 0, 16, schema)).toBeNull();
  });

  it('caps the candidates', () => {
    const many: QuerySchema = { tables: Array.from({ length: 12 }, (_, i) => `t${i}`), columns: {} };
    expect(complete(['select * from '], 0, 14, many)?.items).toHaveLength(MAX_COMPLETIONS);
  });
});

import { describe, it, expect } from 'vitest';

import { CardinalityError, QueryError } from '../../errors';
import { createTestTable, NO_SIGNAL, postsSchema } from '../../__tests__/helpers';

import type { QueryCompletedEvent, QueryStartedEvent } from '../../events';

describe('AggregateBuilder', () => {
  describe('render', () => {
    const { table: posts } = createTestTable('postgresql', postsSchema);

    it('should count rows matching the WHERE chain', () => {
      expect(posts.count().where('user_id', '=', 'user_id').mustRender()).toEqual({
        sql: 'SELECT COUNT(*) AS "result" FROM "posts" WHERE "user_id" = :user_id',
        requiredParams: ['user_id'],
      });
    });

    it('should render each function over its field', () => {
      expect(posts.sum('views').mustRender().sql).toBe('SELECT SUM("views") AS "result" FROM "posts"');
      expect(posts.avg('views').mustRender().sql).toBe('SELECT AVG("views") AS "result" FROM "posts"');
      expect(posts.min('created_at').mustRender().sql).toBe('SELECT MIN("created_at") AS "result" FROM "posts"');
      expect(posts.max('created_at').mustRender().sql).toBe('SELECT MAX("created_at") AS "result" FROM "posts"');
    });

    it('should validate the field', () => {
      expect(() => posts.sum('score').mustRender()).toThrow('invalid field "score"');
    });

    it('should build from specs', () => {
      expect(posts.countFromSpec({ where: [{ field: 'views', operator: '>', param: 'min_views' }] }).mustRender().sql).toBe(
        'SELECT COUNT(*) AS "result" FROM "posts" WHERE "views" > :min_views',
      );
      expect(posts.maxFromSpec({ field: 'views' }).mustRender().sql).toBe('SELECT MAX("views") AS "result" FROM "posts"');
      expect(() => posts.avgFromSpec({}).mustRender()).toThrow('invalid field ""');
    });
  });

  describe('exec', () => {
    it('should return the count as a number', async () => {
      const { table, query } = createTestTable();
      query.mockResolvedValue({ rows: [{ result: 2 }], rowCount: 1 });

      const adults = await table.count().where('age', '>=', 'min_age').exec({ min_age: 18 });

      expect(adults).toBe(2);
      expect(query).toHaveBeenCalledWith(
        'SELECT COUNT(*) AS "result" FROM "users" WHERE "age" >= $1',
        [18],
        NO_SIGNAL,
      );
    });

    it('should convert numeric strings', async () => {
      const { table, query } = createTestTable();
      query.mockResolvedValue({ rows: [{ result: '36.5000' }], rowCount: 1 });

      await expect(table.avg('age').exec()).resolves.toBe(36.5);
    });

    it('should return 0 when there is nothing to aggregate', async () => {
      const { table, query } = createTestTable();
      query.mockResolvedValue({ rows: [{ result: null }], rowCount: 1 });

      await expect(table.sum('age').exec()).resolves.toBe(0);
    });

    it('should reject a non-numeric result', async () => {
      const { table, query } = createTestTable();
      query.mockResolvedValue({ rows: [{ result: 'n/a' }], rowCount: 1 });

      const result = table.max('age').exec();

      await expect(result).rejects.toBeInstanceOf(QueryError);
      await expect(result).rejects.toThrow('MAX returned a non-numeric value: n/a');
    });

    it('should fail when the driver returns no row', async () => {
      const { table, query } = createTestTable();
      query.mockResolvedValue({ rows: [], rowCount: 0 });

      const result = table.count().exec();

      await expect(result).rejects.toBeInstanceOf(CardinalityError);
      await expect(result).rejects.toThrow('COUNT query returned no rows');
    });

    it('should report the function, field and value in events', async () => {
      const { table, query, events } = createTestTable();
      const started: QueryStartedEvent[] = [];
      const completed: QueryCompletedEvent[] = [];
      events.on('query:started', (event) => started.push(event));
      events.on('query:completed', (event) => completed.push(event));
      query.mockResolvedValue({ rows: [{ result: 18 }], rowCount: 1 });

      await table.min('age').exec();

      expect(started).toEqual([
        { table: 'users', operation: 'MIN', sql: 'SELECT MIN("age") AS "result" FROM "users"', field: 'age' },
      ]);
      expect(completed[0]).toMatchObject({ operation: 'MIN', field: 'age', resultValue: 18 });
    });
  });
});

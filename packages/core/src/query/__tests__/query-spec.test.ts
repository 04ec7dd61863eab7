import { describe, it, expect } from 'vitest';

import { ValidationError } from '../../errors';
import { createTestTable, postsSchema } from '../../__tests__/helpers';

import type { QuerySpec } from '../query-spec';

describe('query specs', () => {
  const { table: users } = createTestTable();
  const { table: posts } = createTestTable('postgresql', postsSchema);

  it('should apply every query key', () => {
    const spec: QuerySpec = {
      fields: ['user_id'],
      where: [
        { field: 'views', operator: '>=', param: 'min_views' },
        {
          logic: 'OR',
          group: [
            { field: 'title', operator: 'like', param: 'pattern' },
            { field: 'updated_at', is_null: true },
          ],
        },
      ],
      group_by: ['user_id'],
      having: [{ field: 'user_id', operator: '!=', param: 'excluded' }],
      having_agg: [{ func: 'count', operator: '>', param: 'min_posts' }],
      order_by: [{ field: 'user_id', direction: 'desc', nulls: 'last' }],
      limit: 20,
      offset: 40,
      distinct: true,
    };

    expect(posts.queryFromSpec(spec).mustRender()).toEqual({
      sql: 'SELECT DISTINCT "user_id" FROM "posts" WHERE "views" >= :min_views AND ("title" LIKE :pattern OR "updated_at" IS NULL) GROUP BY "user_id" HAVING "user_id" != :excluded AND COUNT(*) > :min_posts ORDER BY "user_id" DESC NULLS LAST LIMIT 20 OFFSET 40',
      requiredParams: ['min_views', 'pattern', 'excluded', 'min_posts'],
    });
  });

  it('should order by a distance expression and lock rows', () => {
    const { sql } = posts
      .selectFromSpec({
        fields: ['id'],
        distinct_on: ['user_id'],
        order_by: [{ field: 'embedding', direction: 'asc', operator: '<->', param: 'query_vec' }],
        for_locking: 'no_key_update',
      })
      .mustRender();

    expect(sql).toBe(
      'SELECT DISTINCT ON ("user_id") "id" FROM "posts" ORDER BY "embedding" <-> :query_vec ASC FOR NO KEY UPDATE',
    );
  });

  it('should render IS NOT NULL specs', () => {
    expect(users.queryFromSpec({ where: [{ field: 'age', operator: 'IS NOT NULL', is_null: true }] }).mustRender().sql).toBe(
      'SELECT * FROM "users" WHERE "age" IS NOT NULL',
    );
  });

  it('should nest groups', () => {
    const { sql } = users
      .queryFromSpec({
        where: [
          {
            logic: 'and',
            group: [
              { field: 'age', operator: '>', param: 'min_age' },
              {
                logic: 'OR',
                group: [
                  { field: 'status', operator: '=', param: 'first' },
                  { field: 'status', operator: '=', param: 'second' },
                ],
              },
            ],
          },
        ],
      })
      .mustRender();

    expect(sql).toBe('SELECT * FROM "users" WHERE ("age" > :min_age AND ("status" = :first OR "status" = :second))');
  });

  it('should skip a group without members', () => {
    expect(users.queryFromSpec({ where: [{ logic: 'OR', group: [] }] }).mustRender().sql).toBe('SELECT * FROM "users"');
  });

  it('should reject unknown group logic', () => {
    const outcome = users
      .queryFromSpec({ where: [{ logic: 'XOR', group: [{ field: 'age', operator: '>', param: 'n' }] }] })
      .render();

    expect(!outcome.ok && outcome.error).toBeInstanceOf(ValidationError);
    expect(!outcome.ok && outcome.error.message).toBe('invalid group logic "XOR": must be AND or OR');
  });

  it('should reject an unknown lock', () => {
    expect(() => users.queryFromSpec({ for_locking: 'exclusive' }).mustRender()).toThrow('invalid lock "exclusive"');
  });

  it('should treat empty lists as absent', () => {
    expect(users.queryFromSpec({ fields: [], group_by: [], distinct_on: [] }).mustRender().sql).toBe('SELECT * FROM "users"');
  });

  it('should build compound queries', () => {
    const rendered = users
      .compoundFromSpec({
        base: { fields: ['email'], where: [{ field: 'status', operator: '=', param: 'status' }] },
        operands: [{ operation: 'union_all', query: { fields: ['email'], where: [{ field: 'age', operator: '>', param: 'min_age' }] } }],
        order_by: [{ field: 'email', direction: 'asc' }],
        limit: 5,
      })
      .mustRender();

    expect(rendered).toEqual({
      sql: '(SELECT "email" FROM "users" WHERE "status" = :q0_status) UNION ALL (SELECT "email" FROM "users" WHERE "age" > :q1_min_age) ORDER BY "email" ASC LIMIT 5',
      requiredParams: ['q0_status', 'q1_min_age'],
    });
  });

  it('should report an unknown set operation from a compound spec', () => {
    const outcome = users.compoundFromSpec({ base: {}, operands: [{ operation: 'zip', query: {} }] }).render();

    expect(!outcome.ok && outcome.error.message).toBe('invalid set operation "zip"');
  });
});

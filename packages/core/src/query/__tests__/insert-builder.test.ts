import { describe, it, expect } from 'vitest';

import { CardinalityError, ConditionError, QueryError } from '../../errors';
import { createTestTable, NO_SIGNAL } from '../../__tests__/helpers';

const ada = { email: 'ada@example.com', age: 36, status: 'active' };
const alan = { email: 'alan@example.com', age: 41, status: 'pending' };

describe('InsertBuilder', () => {
  describe('render', () => {
    const { table: users } = createTestTable();

    it('should insert every non-generated column and return every column', () => {
      expect(users.insert().mustRender()).toEqual({
        sql: 'INSERT INTO "users" ("email", "age", "status") VALUES (:email, :age, :status) RETURNING "id", "email", "age", "status"',
        requiredParams: ['email', 'age', 'status'],
      });
    });

    it('should render ON CONFLICT DO NOTHING', () => {
      expect(users.insert().onConflict('email').doNothing().mustRender().sql).toBe(
        'INSERT INTO "users" ("email", "age", "status") VALUES (:email, :age, :status) ON CONFLICT ("email") DO NOTHING RETURNING "id", "email", "age", "status"',
      );
    });

    it('should render ON CONFLICT DO UPDATE', () => {
      const { sql } = users.insert().onConflict('email').doUpdate().set('age', 'age').set('status', 'status').build().mustRender();

      expect(sql).toBe(
        'INSERT INTO "users" ("email", "age", "status") VALUES (:email, :age, :status) ON CONFLICT ("email") DO UPDATE SET "age" = :age, "status" = :status RETURNING "id", "email", "age", "status"',
      );
    });

    it('should drop RETURNING on MySQL', () => {
      const { table } = createTestTable('mysql');

      expect(table.insert().onConflict('email').doUpdate().set('age', 'age').build().mustRender().sql).toBe(
        'INSERT INTO `users` (`email`, `age`, `status`) VALUES (:email, :age, :status) ON DUPLICATE KEY UPDATE `age` = :age',
      );
    });

    it('should require a SET clause for DO UPDATE', () => {
      const outcome = users.insert().onConflict('email').doUpdate().build().render();

      expect(!outcome.ok && outcome.error).toBeInstanceOf(ConditionError);
      expect(!outcome.ok && outcome.error.message).toBe('ON CONFLICT DO UPDATE requires at least one SET clause');
    });

    it('should validate conflict columns', () => {
      expect(() => users.insert().onConflict('mail').doNothing().mustRender()).toThrow('invalid field "mail"');
      expect(() => users.insert().onConflict('mail').doUpdate().set('age', 'age').build().mustRender()).toThrow(
        'invalid field "mail"',
      );
    });

    it('should apply a create spec', () => {
      const fromSpec = users.insertFromSpec({
        on_conflict: ['email'],
        conflict_action: 'update',
        conflict_set: { age: 'age' },
      });

      expect(fromSpec.mustRender().sql).toBe(
        users.insert().onConflict('email').doUpdate().set('age', 'age').build().mustRender().sql,
      );
    });

    it('should leave the insert plain for a spec without a conflict target', () => {
      expect(users.insertFromSpec({}).mustRender().sql).toBe(users.insert().mustRender().sql);
    });

    it('should reject an unknown conflict action', () => {
      expect(() => users.insertFromSpec({ on_conflict: ['email'], conflict_action: 'replace' }).mustRender()).toThrow(
        'invalid conflict action "replace": must be nothing or update',
      );
    });
  });

  describe('exec with RETURNING', () => {
    it('should return the inserted row', async () => {
      const { table, query } = createTestTable();
      query.mockResolvedValue({ rows: [{ id: 1, ...ada }], rowCount: 1 });

      const user = await table.insert().exec(ada);

      expect(user).toEqual({ id: 1, ...ada });
      expect(query).toHaveBeenCalledWith(
        'INSERT INTO "users" ("email", "age", "status") VALUES ($1, $2, $3) RETURNING "id", "email", "age", "status"',
        ['ada@example.com', 36, 'active'],
        NO_SIGNAL,
      );
    });

    it('should fail when a conflict skipped the row', async () => {
      const { table, query } = createTestTable();
      query.mockResolvedValue({ rows: [], rowCount: 0 });

      const result = table.insert().onConflict('email').doNothing().exec(ada);

      await expect(result).rejects.toBeInstanceOf(CardinalityError);
      await expect(result).rejects.toThrow('INSERT returned no rows');
    });

    it('should run through the conflict update builder', async () => {
      const { table, query } = createTestTable();
      query.mockResolvedValue({ rows: [{ id: 3, ...ada }], rowCount: 1 });

      await table.insert().onConflict('email').doUpdate().set('age', 'age').exec(ada);

      expect(query.mock.calls[0]?.[0]).toBe(
        'INSERT INTO "users" ("email", "age", "status") VALUES ($1, $2, $3) ON CONFLICT ("email") DO UPDATE SET "age" = $2 RETURNING "id", "email", "age", "status"',
      );
    });

    it('should bind NULL for a column the record omits', async () => {
      const { table, query } = createTestTable();
      query.mockResolvedValue({ rows: [{ id: 2, email: 'grace@example.com', age: null, status: 'active' }], rowCount: 1 });

      await table.insert().exec({ email: 'grace@example.com', status: 'active' });

      expect(query).toHaveBeenCalledWith(
        'INSERT INTO "users" ("email", "age", "status") VALUES ($1, $2, $3) RETURNING "id", "email", "age", "status"',
        ['grace@example.com', null, 'active'],
        NO_SIGNAL,
      );
    });
  });

  describe('exec without RETURNING', () => {
    it('should read the row back by insert id', async () => {
      const { table, query, execute } = createTestTable('mysql');
      execute.mockResolvedValue({ affectedRows: 1, insertId: 42 });
      query.mockResolvedValue({ rows: [{ id: 42, ...ada }], rowCount: 1 });

      const user = await table.insert().exec(ada);

      expect(user).toEqual({ id: 42, ...ada });
      expect(execute).toHaveBeenCalledWith(
        'INSERT INTO `users` (`email`, `age`, `status`) VALUES (?, ?, ?)',
        ['ada@example.com', 36, 'active'],
        NO_SIGNAL,
      );
      expect(query).toHaveBeenCalledWith(
        'SELECT `id`, `email`, `age`, `status` FROM `users` WHERE `id` = ?',
        [42],
        NO_SIGNAL,
      );
    });

    it('should fall back to the record\'s primary key', async () => {
      const { table, query, execute } = createTestTable('mysql');
      execute.mockResolvedValue({ affectedRows: 1, insertId: 0 });
      query.mockResolvedValue({ rows: [{ id: 9, ...ada }], rowCount: 1 });

      await table.insert().exec({ id: 9, ...ada });

      expect(query.mock.calls[0]?.[1]).toEqual([9]);
    });

    it('should read back a primary key of 0', async () => {
      const { table, query, execute } = createTestTable('mysql');
      execute.mockResolvedValue({ affectedRows: 1, insertId: 0 });
      query.mockResolvedValue({ rows: [{ id: 0, ...ada }], rowCount: 1 });

      await expect(table.insert().exec({ id: 0, ...ada })).resolves.toEqual({ id: 0, ...ada });
      expect(query).toHaveBeenCalledWith(
        'SELECT `id`, `email`, `age`, `status` FROM `users` WHERE `id` = ?',
        [0],
        NO_SIGNAL,
      );
    });

    it('should fail when no key is known', async () => {
      const { table, query, execute } = createTestTable('mysql');
      execute.mockResolvedValue({ affectedRows: 1, insertId: 0 });

      const result = table.insert().exec(ada);

      await expect(result).rejects.toBeInstanceOf(QueryError);
      await expect(result).rejects.toThrow('INSERT on users cannot read back the row: no value for primary key "id"');
      expect(query).not.toHaveBeenCalled();
    });

    it('should fail when the insert was ignored', async () => {
      const { table, query, execute } = createTestTable('mysql');
      execute.mockResolvedValue({ affectedRows: 0, insertId: 0 });

      await expect(table.insert().onConflict('email').doNothing().exec(ada)).rejects.toMatchObject({
        code: 'NO_ROWS',
        message: 'INSERT returned no rows',
      });
      expect(execute.mock.calls[0]?.[0]).toBe('INSERT IGNORE INTO `users` (`email`, `age`, `status`) VALUES (?, ?, ?)');
      expect(query).not.toHaveBeenCalled();
    });

    it('should accept two affected rows from ON DUPLICATE KEY UPDATE', async () => {
      const { table, query, execute } = createTestTable('mysql');
      execute.mockResolvedValue({ affectedRows: 2, insertId: 5 });
      query.mockResolvedValue({ rows: [{ id: 5, ...ada }], rowCount: 1 });

      await expect(table.insert().onConflict('email').doUpdate().set('age', 'age').exec(ada)).resolves.toEqual({
        id: 5,
        ...ada,
      });
    });
  });

  describe('execBatch', () => {
    it('should insert all records in one statement', async () => {
      const { table, execute } = createTestTable();
      execute.mockResolvedValue({ affectedRows: 2 });

      const count = await table.insert().execBatch([ada, alan]);

      expect(count).toBe(2);
      expect(execute).toHaveBeenCalledTimes(1);
      expect(execute).toHaveBeenCalledWith(
        'INSERT INTO "users" ("email", "age", "status") VALUES ($1, $2, $3), ($4, $5, $6)',
        ['ada@example.com', 36, 'active', 'alan@example.com', 41, 'pending'],
        NO_SIGNAL,
      );
    });

    it('should keep the conflict clause', async () => {
      const { table, execute } = createTestTable('mysql');
      execute.mockResolvedValue({ affectedRows: 1 });

      await table.insert().onConflict('email').doNothing().execBatch([ada, alan]);

      expect(execute.mock.calls[0]?.[0]).toBe(
        'INSERT IGNORE INTO `users` (`email`, `age`, `status`) VALUES (?, ?, ?), (?, ?, ?)',
      );
    });

    it('should run nothing for an empty list', async () => {
      const { table, query, execute } = createTestTable();

      await expect(table.insert().execBatch([])).resolves.toBe(0);
      expect(query).not.toHaveBeenCalled();
      expect(execute).not.toHaveBeenCalled();
    });

    it('should bind NULL for columns a record omits', async () => {
      const { table, execute } = createTestTable();
      execute.mockResolvedValue({ affectedRows: 2 });

      await table.insert().execBatch([ada, { email: 'alan@example.com', status: 'pending' }]);

      expect(execute.mock.calls[0]?.[1]).toEqual(['ada@example.com', 36, 'active', 'alan@example.com', null, 'pending']);
    });

    it('should report a stored error before anything else', async () => {
      const { table } = createTestTable();

      await expect(table.insert().onConflict('mail').doNothing().execBatch([])).rejects.toThrow('invalid field "mail"');
    });
  });
});

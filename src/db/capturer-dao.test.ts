import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, type CapturerDatabase } from './database.js';
import { CapturerDao } from './capturer-dao.js';
import { ConflictError, NotFoundError, ValidationError } from '../errors/index.js';

describe('CapturerDao', () => {
  let db: CapturerDatabase;
  let dao: CapturerDao;
  const clock = () => new Date('2025-06-01T08:00:00.000Z');

  beforeEach(() => {
    db = openDatabase(':memory:');
    dao = new CapturerDao(db, clock);
  });

  afterEach(() => {
    db.close();
  });

  describe('accounts', () => {
    it('should start with no accounts', () => {
      expect(dao.countAccounts()).toBe(0);
      expect(dao.listAccounts()).toEqual([]);
    });

    it('should insert and look up an account', () => {
      const summary = dao.insertAccount('operator', 'c0ffee', '0102');

      expect(summary).toEqual({ username: 'operator', createdAt: '2025-06-01T08:00:00.000Z' });
      expect(dao.queryAccount('operator')).toEqual({ username: 'operator', password: 'c0ffee', misc: '0102' });
      expect(dao.countAccounts()).toBe(1);
    });

    it('should return undefined for unknown accounts', () => {
      expect(dao.queryAccount('ghost')).toBeUndefined();
    });

    it('should reject duplicate usernames', () => {
      dao.insertAccount('operator', 'c0ffee', '0102');

      expect(() => dao.insertAccount('operator', 'beef', '0304')).toThrow(ConflictError);
    });

    it('should list accounts sorted by username without credentials', () => {
      dao.insertAccount('zed', 'aa', 'bb');
      dao.insertAccount('alice', 'aa', 'bb');

      expect(dao.listAccounts()).toEqual([
        { username: 'alice', createdAt: '2025-06-01T08:00:00.000Z' },
        { username: 'zed', createdAt: '2025-06-01T08:00:00.000Z' },
      ]);
    });

    it('should delete accounts', () => {
      dao.insertAccount('operator', 'c0ffee', '0102');

      expect(dao.deleteAccount('operator')).toBe(true);
      expect(dao.deleteAccount('operator')).toBe(false);
      expect(dao.countAccounts()).toBe(0);
    });
  });

  describe('schedules', () => {
    it('should insert and read back schedules', () => {
      const created = dao.insertSchedule({
        name: 'Field trial',
        startTime: '06:30',
        durationMinutes: 90,
        enabled: true,
      });

      expect(created).toEqual({
        id: 1,
        name: 'Field trial',
        startTime: '06:30',
        durationMinutes: 90,
        enabled: true,
        createdAt: '2025-06-01T08:00:00.000Z',
      });
      expect(dao.getSchedule(1)).toEqual(created);
      expect(dao.listSchedules()).toEqual([created]);
    });

    it('should list schedules ordered by start time', () => {
      dao.insertSchedule({ name: 'Evening', startTime: '18:00', durationMinutes: 30, enabled: false });
      dao.insertSchedule({ name: 'Morning', startTime: '07:00', durationMinutes: 30, enabled: true });

      expect(dao.listSchedules().map(schedule => schedule.name)).toEqual(['Morning', 'Evening']);
      expect(dao.listSchedules()[1].enabled).toBe(false);
    });

    it('should delete schedules', () => {
      const created = dao.insertSchedule({ name: 'Once', startTime: '12:00', durationMinutes: 5, enabled: true });

      expect(dao.deleteSchedule(created.id)).toBe(true);
      expect(dao.deleteSchedule(created.id)).toBe(false);
      expect(dao.getSchedule(created.id)).toBeUndefined();
    });
  });

  describe('database browser', () => {
    it('should list tables with row counts', () => {
      dao.insertAccount('operator', 'c0ffee', '0102');

      expect(dao.listTables()).toEqual([
        { name: 'accounts', rowCount: 1 },
        { name: 'schedules', rowCount: 0 },
      ]);
    });

    it('should browse table rows up to the limit', () => {
      dao.insertAccount('a', '01', '02');
      dao.insertAccount('b', '03', '04');
      dao.insertAccount('c', '05', '06');

      const result = dao.browseTable('accounts', 2);

      expect(result.columns).toEqual(['username', 'password', 'misc', 'created_at']);
      expect(result.rows).toHaveLength(2);
      expect(result.rows[0]).toEqual({
        username: 'a',
        password: '01',
        misc: '02',
        created_at: '2025-06-01T08:00:00.000Z',
      });
      expect(result.truncated).toBe(true);
    });

    it('should reject unknown tables', () => {
      expect(() => dao.browseTable('missing', 10)).toThrow(NotFoundError);
    });

    it('should not allow identifiers to escape the quoted table name', () => {
      expect(() => dao.browseTable('accounts"; DROP TABLE accounts; --', 10)).toThrow(NotFoundError);
      expect(dao.listTables().map(table => table.name)).toContain('accounts');
    });
  });

  describe('read-only queries', () => {
    it('should run select statements', () => {
      dao.insertSchedule({ name: 'Dawn', startTime: '05:00', durationMinutes: 20, enabled: true });

      const result = dao.runReadOnlyQuery('SELECT name, duration_minutes * 2 AS doubled FROM schedules');

      expect(result).toEqual({
        columns: ['name', 'doubled'],
        rows: [{ name: 'Dawn', doubled: 40 }],
        truncated: false,
      });
    });

    it('should mark results beyond the row cap as truncated', () => {
      dao.insertAccount('a', '01', '02');
      dao.insertAccount('b', '03', '04');
      dao.insertAccount('c', '05', '06');

      const result = dao.runReadOnlyQuery('SELECT username FROM accounts ORDER BY username', 2);

      expect(result.rows).toEqual([{ username: 'a' }, { username: 'b' }]);
      expect(result.truncated).toBe(true);
    });

    it('should render blobs as hex', () => {
      const result = dao.runReadOnlyQuery("SELECT X'0aff' AS payload");

      expect(result.rows).toEqual([{ payload: '0aff' }]);
    });

    it('should reject empty queries', () => {
      expect(() => dao.runReadOnlyQuery('   ')).toThrow('Query is empty');
    });

    it('should reject statements that modify the database', () => {
      expect(() => dao.runReadOnlyQuery("DELETE FROM accounts WHERE username = 'a'")).toThrow(
        'Only read-only statements are allowed'
      );
      expect(() =>
        dao.runReadOnlyQuery("INSERT INTO accounts (username, created_at) VALUES ('x', 'y') RETURNING username")
      ).toThrow('Only read-only statements are allowed');
      expect(dao.countAccounts()).toBe(0);
    });

    it('should report syntax errors as validation errors', () => {
      expect(() => dao.runReadOnlyQuery('SELEC nothing')).toThrow(ValidationError);
    });
  });
});

/**
 * 动态表 SQL 生成测试（纯字符串，不连接数据库）
 */
import { describe, it, expect } from 'vitest';
import { DataIntegrityError } from '../../core/errors';
import type { ColumnDefinition } from '../physicalStore';
import {
  buildAddColumns,
  buildAggregate,
  buildCount,
  buildCreateIndex,
  buildCreateTable,
  buildDeleteRows,
  buildDropColumns,
  buildFindRows,
  buildInsertRow,
  buildModifyColumns,
  buildSelect,
  buildUpdateRow,
  buildWriteCells,
  buildWhere,
  columnTypeSql,
  escapeLike,
  indexName,
  parsePhysicalType,
  quoteIdentifier,
} from '../mysql/sqlBuilder';

const NOW = new Date('2026-03-01T08:00:00.000Z');

const LABEL: ColumnDefinition = { name: 'f_label', type: { kind: 'varchar', length: 120 }, indexed: true };
const NOTES: ColumnDefinition = { name: 'f_notes', type: { kind: 'text' }, indexed: true };
const PRICE: ColumnDefinition = { name: 'f_price', type: { kind: 'double' }, indexed: false };

describe('标识符与类型', () => {
  it('quoteIdentifier 只接受安全标识符', () => {
    expect(quoteIdentifier('st_menu')).toBe('`st_menu`');
    expect(() => quoteIdentifier('menu`; DROP')).toThrow(DataIntegrityError);
    expect(() => quoteIdentifier('')).toThrow("Illegal SQL identifier ''");
    expect(() => quoteIdentifier('x'.repeat(65))).toThrow(DataIntegrityError);
  });

  it('columnTypeSql 映射全部物理类型', () => {
    expect(columnTypeSql({ kind: 'varchar', length: 40 })).toBe('VARCHAR(40)');
    expect(columnTypeSql({ kind: 'text' })).toBe('TEXT');
    expect(columnTypeSql({ kind: 'double' })).toBe('DOUBLE');
    expect(columnTypeSql({ kind: 'bigint' })).toBe('BIGINT');
    expect(columnTypeSql({ kind: 'boolean' })).toBe('TINYINT(1)');
  });

  it('parsePhysicalType 还原 information_schema 类型', () => {
    expect(parsePhysicalType('varchar', 'varchar(120)', 120)).toEqual({ kind: 'varchar', length: 120 });
    expect(parsePhysicalType('MEDIUMTEXT', 'mediumtext', null)).toEqual({ kind: 'text' });
    expect(parsePhysicalType('tinyint', 'tinyint(1)', null)).toEqual({ kind: 'boolean' });
    expect(parsePhysicalType('tinyint', 'tinyint(4)', null)).toBeNull();
    expect(parsePhysicalType('datetime', 'datetime(3)', null)).toBeNull();
  });

  it('indexName 截断到 64 个字符', () => {
    expect(indexName('f_label')).toBe('i_f_label');
    expect(indexName('f_' + 'a'.repeat(70))).toHaveLength(64);
  });
});

describe('DDL', () => {
  it('buildCreateTable 生成保留列、投影列、索引与外键', () => {
    expect(buildCreateTable('st_menu', [LABEL, NOTES, PRICE])).toBe([
      'CREATE TABLE `st_menu` (',
      '  `id` BIGINT NOT NULL AUTO_INCREMENT,',
      '  `parent_id` BIGINT NULL,',
      '  `document` LONGTEXT NOT NULL,',
      '  `f_label` VARCHAR(120) NULL,',
      '  `f_notes` TEXT NULL,',
      '  `f_price` DOUBLE NULL,',
      '  `created_at` DATETIME(3) NOT NULL,',
      '  `updated_at` DATETIME(3) NOT NULL,',
      '  PRIMARY KEY (`id`),',
      '  KEY `i_parent_id` (`parent_id`),',
      '  KEY `i_f_label` (`f_label`),',
      '  KEY `i_f_notes` (`f_notes`(191)),',
      '  FOREIGN KEY (`parent_id`) REFERENCES `st_menu` (`id`)',
      ') ENGINE=InnoDB DEFAULT CHARSET=utf8mb4',
    ].join('\n'));
  });

  it('ALTER 语句合并为一条', () => {
    expect(buildAddColumns('st_menu', [PRICE, LABEL])).toBe(
      'ALTER TABLE `st_menu` ADD COLUMN `f_price` DOUBLE NULL, ADD COLUMN `f_label` VARCHAR(120) NULL',
    );
    expect(buildModifyColumns('st_menu', [NOTES])).toBe('ALTER TABLE `st_menu` MODIFY COLUMN `f_notes` TEXT NULL');
    expect(buildDropColumns('st_menu', ['f_a', 'f_b'])).toBe('ALTER TABLE `st_menu` DROP COLUMN `f_a`, DROP COLUMN `f_b`');
  });

  it('TEXT 列索引带前缀长度', () => {
    expect(buildCreateIndex('st_menu', NOTES)).toBe('CREATE INDEX `i_f_notes` ON `st_menu` (`f_notes`(191))');
    expect(buildCreateIndex('st_menu', LABEL)).toBe('CREATE INDEX `i_f_label` ON `st_menu` (`f_label`)');
  });
});

describe('DML', () => {
  it('buildInsertRow 按列顺序生成参数', () => {
    const stmt = buildInsertRow('st_menu', { parentId: 4, document: '{"label":"Open"}', cells: { f_label: 'Open', f_price: null } }, NOW);
    expect(stmt.sql).toBe(
      'INSERT INTO `st_menu` (`parent_id`, `document`, `f_label`, `f_price`, `created_at`, `updated_at`) VALUES (?, ?, ?, ?, ?, ?)',
    );
    expect(stmt.params).toEqual([4, '{"label":"Open"}', 'Open', null, NOW, NOW]);
  });

  it('buildUpdateRow 以 id 结尾', () => {
    const stmt = buildUpdateRow('st_menu', 9, { parentId: null, document: '{}', cells: { f_label: 'X' } }, NOW);
    expect(stmt.sql).toBe('UPDATE `st_menu` SET `parent_id` = ?, `document` = ?, `f_label` = ?, `updated_at` = ? WHERE `id` = ?');
    expect(stmt.params).toEqual([null, '{}', 'X', NOW, 9]);
  });

  it('buildWriteCells 不改 document 与 updated_at', () => {
    expect(buildWriteCells('st_menu', 5, { f_tag: null, f_rank: 2 })).toEqual({
      sql: 'UPDATE `st_menu` SET `f_tag` = ?, `f_rank` = ? WHERE `id` = ?',
      params: [null, 2, 5],
    });
  });

  it('buildFindRows 支持 FOR UPDATE 与空 id 列表', () => {
    expect(buildFindRows('st_menu', [3, 1], true)).toEqual({
      sql: 'SELECT `id`, `parent_id`, `document`, `created_at`, `updated_at` FROM `st_menu` WHERE `id` IN (?, ?) ORDER BY `id` FOR UPDATE',
      params: [3, 1],
    });
    expect(buildFindRows('st_menu', [], false).sql).toBe(
      'SELECT `id`, `parent_id`, `document`, `created_at`, `updated_at` FROM `st_menu` WHERE 1 = 0',
    );
  });

  it('buildDeleteRows 生成 IN 列表', () => {
    expect(buildDeleteRows('st_menu', [2, 1])).toEqual({ sql: 'DELETE FROM `st_menu` WHERE `id` IN (?, ?)', params: [2, 1] });
  });
});

describe('查询', () => {
  it('escapeLike 转义通配符', () => {
    expect(escapeLike('50%_off\\')).toBe('50\\%\\_off\\\\');
  });

  it('buildWhere 无条件时为空', () => {
    expect(buildWhere([])).toEqual({ sql: '', params: [] });
  });

  it('buildWhere 组合各类运算符', () => {
    const where = buildWhere([
      { column: 'f_price', operator: 'gte', value: 2 },
      { column: 'f_label', operator: 'in', value: ['Open', 'Close'] },
      { column: 'f_label', operator: 'contains', value: 'p%' },
      { column: 'parent_id', operator: 'isNull', value: null },
      { column: 'f_notes', operator: 'notNull', value: null },
      { column: 'f_price', operator: 'ne', value: 5 },
    ]);
    expect(where.sql).toBe(
      ' WHERE `f_price` >= ? AND `f_label` IN (?, ?) AND `f_label` LIKE ? AND `parent_id` IS NULL AND `f_notes` IS NOT NULL AND `f_price` <> ?',
    );
    expect(where.params).toEqual([2, 'Open', 'Close', '%p\\%%', 5]);
  });

  it('空 in 列表不匹配任何行', () => {
    expect(buildWhere([{ column: 'f_label', operator: 'in', value: [] }])).toEqual({ sql: ' WHERE 1 = 0', params: [] });
  });

  it('buildSelect 非 id 排序时以 id 兜底', () => {
    const stmt = buildSelect('st_menu', {
      filters: [{ column: 'f_label', operator: 'eq', value: 'File' }],
      sortColumn: 'f_price',
      sortOrder: 'desc',
      limit: 20,
      offset: 40,
    });
    expect(stmt.sql).toBe(
      'SELECT `id`, `parent_id`, `document`, `created_at`, `updated_at` FROM `st_menu` WHERE `f_label` = ? ORDER BY `f_price` DESC, `id` ASC LIMIT ? OFFSET ?',
    );
    expect(stmt.params).toEqual(['File', 20, 40]);
  });

  it('buildSelect 按 id 排序', () => {
    const stmt = buildSelect('st_menu', { filters: [], sortColumn: 'id', sortOrder: 'asc', limit: 10, offset: 0 });
    expect(stmt.sql).toBe('SELECT `id`, `parent_id`, `document`, `created_at`, `updated_at` FROM `st_menu` ORDER BY `id` ASC LIMIT ? OFFSET ?');
  });

  it('buildCount 复用过滤条件', () => {
    expect(buildCount('st_menu', [{ column: 'f_price', operator: 'lt', value: 3 }])).toEqual({
      sql: 'SELECT COUNT(*) AS total FROM `st_menu` WHERE `f_price` < ?',
      params: [3],
    });
  });

  it('buildAggregate 仅数值列计算 AVG', () => {
    expect(buildAggregate('st_menu', 'f_price', true).sql).toBe(
      'SELECT COUNT(*) AS total_count, COUNT(`f_price`) AS non_null_count, MIN(`f_price`) AS min_value, MAX(`f_price`) AS max_value, AVG(`f_price`) AS avg_value FROM `st_menu`',
    );
    expect(buildAggregate('st_menu', 'f_label', false).sql).toBe(
      'SELECT COUNT(*) AS total_count, COUNT(`f_label`) AS non_null_count, MIN(`f_label`) AS min_value, MAX(`f_label`) AS max_value, NULL AS avg_value FROM `st_menu`',
    );
  });
});

/**
 * 动态表 SQL 生成
 *
 * 结构表的列在运行时才确定，drizzle 的静态表定义覆盖不到，
 * 这里生成参数化 SQL（? 占位），标识符统一经 quoteIdentifier 校验。
 */

import { DataIntegrityError } from '../../core/errors';
import type { CellValue, ColumnDefinition, PhysicalType, RowFilter, RowQuery, RowWrite } from '../physicalStore';

export interface SqlStatement {
  sql: string;
  params: unknown[];
}

/** TEXT 列建索引时的前缀长度（utf8mb4 下 191 * 4 < 767） */
export const TEXT_INDEX_PREFIX = 191;

const IDENTIFIER = /^[A-Za-z0-9_]{1,64}$/;

export function quoteIdentifier(name: string): string {
  if (!IDENTIFIER.test(name)) {
    throw new DataIntegrityError(`Illegal SQL identifier '${name}'`);
  }
  return `\`${name}\``;
}

export function columnTypeSql(type: PhysicalType): string {
  switch (type.kind) {
    case 'varchar': return `VARCHAR(${type.length})`;
    case 'text': return 'TEXT';
    case 'double': return 'DOUBLE';
    case 'bigint': return 'BIGINT';
    case 'boolean': return 'TINYINT(1)';
  }
}

/** 从 information_schema.COLUMNS 还原列类型；无法识别返回 null */
export function parsePhysicalType(dataType: string, columnType: string, maxLength: number | null): PhysicalType | null {
  switch (dataType.toLowerCase()) {
    case 'varchar':
      return maxLength !== null ? { kind: 'varchar', length: maxLength } : null;
    case 'text':
    case 'mediumtext':
    case 'longtext':
      return { kind: 'text' };
    case 'double':
      return { kind: 'double' };
    case 'bigint':
      return { kind: 'bigint' };
    case 'tinyint':
      return columnType.toLowerCase() === 'tinyint(1)' ? { kind: 'boolean' } : null;
    default:
      return null;
  }
}

export function indexName(column: string): string {
  return `i_${column}`.slice(0, 64);
}

function indexTarget(column: ColumnDefinition): string {
  const quoted = quoteIdentifier(column.name);
  return column.type.kind === 'text' ? `${quoted}(${TEXT_INDEX_PREFIX})` : quoted;
}

// ============================================
// 注册表
// ============================================

/** 与 drizzle/schema.ts 中的两张注册表一致 */
export const REGISTRY_DDL: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS \`structure_definitions\` (
  \`name\` VARCHAR(48) NOT NULL,
  \`table_name\` VARCHAR(64) NOT NULL,
  \`schema_json\` LONGTEXT NOT NULL,
  \`version\` INT NOT NULL,
  \`meta\` JSON NOT NULL,
  \`created_at\` TIMESTAMP(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3),
  \`updated_at\` TIMESTAMP(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3) ON UPDATE CURRENT_TIMESTAMP(3),
  PRIMARY KEY (\`name\`),
  UNIQUE KEY \`uq_sd_table\` (\`table_name\`)
) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4`,
  `CREATE TABLE IF NOT EXISTS \`structure_migrations\` (
  \`id\` INT NOT NULL AUTO_INCREMENT,
  \`structure_name\` VARCHAR(48) NOT NULL,
  \`version\` INT NOT NULL,
  \`kind\` ENUM('create','update','vacuum','drop') NOT NULL,
  \`summary\` JSON NOT NULL,
  \`applied_at\` TIMESTAMP(3) NOT NULL DEFAULT CURRENT_TIMESTAMP(3),
  PRIMARY KEY (\`id\`),
  KEY \`idx_sm_structure\` (\`structure_name\`)
) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4`,
];

// ============================================
// DDL
// ============================================

export function buildCreateTable(table: string, columns: ColumnDefinition[]): string {
  const t = quoteIdentifier(table);
  const lines = [
    '`id` BIGINT NOT NULL AUTO_INCREMENT',
    '`parent_id` BIGINT NULL',
    '`document` LONGTEXT NOT NULL',
    ...columns.map(c => `${quoteIdentifier(c.name)} ${columnTypeSql(c.type)} NULL`),
    '`created_at` DATETIME(3) NOT NULL',
    '`updated_at` DATETIME(3) NOT NULL',
    'PRIMARY KEY (`id`)',
    'KEY `i_parent_id` (`parent_id`)',
    ...columns.filter(c => c.indexed).map(c => `KEY ${quoteIdentifier(indexName(c.name))} (${indexTarget(c)})`),
    `FOREIGN KEY (\`parent_id\`) REFERENCES ${t} (\`id\`)`,
  ];
  return `CREATE TABLE ${t} (\n  ${lines.join(',\n  ')}\n) ENGINE=InnoDB DEFAULT CHARSET=utf8mb4`;
}

export function buildAddColumns(table: string, columns: ColumnDefinition[]): string {
  const parts = columns.map(c => `ADD COLUMN ${quoteIdentifier(c.name)} ${columnTypeSql(c.type)} NULL`);
  return `ALTER TABLE ${quoteIdentifier(table)} ${parts.join(', ')}`;
}

export function buildModifyColumns(table: string, columns: ColumnDefinition[]): string {
  const parts = columns.map(c => `MODIFY COLUMN ${quoteIdentifier(c.name)} ${columnTypeSql(c.type)} NULL`);
  return `ALTER TABLE ${quoteIdentifier(table)} ${parts.join(', ')}`;
}

export function buildDropColumns(table: string, columns: string[]): string {
  const parts = columns.map(c => `DROP COLUMN ${quoteIdentifier(c)}`);
  return `ALTER TABLE ${quoteIdentifier(table)} ${parts.join(', ')}`;
}

export function buildCreateIndex(table: string, column: ColumnDefinition): string {
  return `CREATE INDEX ${quoteIdentifier(indexName(column.name))} ON ${quoteIdentifier(table)} (${indexTarget(column)})`;
}

export function buildDropIndex(table: string, column: string): string {
  return `DROP INDEX ${quoteIdentifier(indexName(column))} ON ${quoteIdentifier(table)}`;
}

export function buildDropTable(table: string): string {
  return `DROP TABLE IF EXISTS ${quoteIdentifier(table)}`;
}

export function buildDescribeColumns(table: string): SqlStatement {
  return {
    sql: 'SELECT COLUMN_NAME AS column_name, DATA_TYPE AS data_type, COLUMN_TYPE AS column_type, '
      + 'CHARACTER_MAXIMUM_LENGTH AS max_length FROM information_schema.COLUMNS '
      + 'WHERE TABLE_SCHEMA = DATABASE() AND TABLE_NAME = ? ORDER BY ORDINAL_POSITION',
    params: [table],
  };
}

export function buildDescribeIndexes(table: string): SqlStatement {
  return {
    sql: 'SELECT DISTINCT COLUMN_NAME AS column_name FROM information_schema.STATISTICS '
      + 'WHERE TABLE_SCHEMA = DATABASE() AND TABLE_NAME = ? AND SEQ_IN_INDEX = 1',
    params: [table],
  };
}

// ============================================
// DML
// ============================================

const ROW_COLUMNS = '`id`, `parent_id`, `document`, `created_at`, `updated_at`';

export function buildInsertRow(table: string, row: RowWrite, now: Date): SqlStatement {
  const cellNames = Object.keys(row.cells);
  const columns = ['`parent_id`', '`document`', ...cellNames.map(quoteIdentifier), '`created_at`', '`updated_at`'];
  const params: unknown[] = [row.parentId, row.document, ...cellNames.map(n => row.cells[n]), now, now];
  return {
    sql: `INSERT INTO ${quoteIdentifier(table)} (${columns.join(', ')}) VALUES (${columns.map(() => '?').join(', ')})`,
    params,
  };
}

export function buildUpdateRow(table: string, id: number, row: RowWrite, now: Date): SqlStatement {
  const cellNames = Object.keys(row.cells);
  const assignments = ['`parent_id` = ?', '`document` = ?', ...cellNames.map(n => `${quoteIdentifier(n)} = ?`), '`updated_at` = ?'];
  return {
    sql: `UPDATE ${quoteIdentifier(table)} SET ${assignments.join(', ')} WHERE \`id\` = ?`,
    params: [row.parentId, row.document, ...cellNames.map(n => row.cells[n]), now, id],
  };
}

export function buildWriteCells(table: string, id: number, cells: Record<string, CellValue>): SqlStatement {
  const cellNames = Object.keys(cells);
  return {
    sql: `UPDATE ${quoteIdentifier(table)} SET ${cellNames.map(n => `${quoteIdentifier(n)} = ?`).join(', ')} WHERE \`id\` = ?`,
    params: [...cellNames.map(n => cells[n]), id],
  };
}

export function buildFindRows(table: string, ids: number[], forUpdate: boolean): SqlStatement {
  if (ids.length === 0) {
    return { sql: `SELECT ${ROW_COLUMNS} FROM ${quoteIdentifier(table)} WHERE 1 = 0`, params: [] };
  }
  const lock = forUpdate ? ' FOR UPDATE' : '';
  return {
    sql: `SELECT ${ROW_COLUMNS} FROM ${quoteIdentifier(table)} WHERE \`id\` IN (${ids.map(() => '?').join(', ')}) ORDER BY \`id\`${lock}`,
    params: [...ids],
  };
}

export function buildFindChildIds(table: string, parentIds: number[]): SqlStatement {
  return {
    sql: `SELECT \`id\`, \`parent_id\` FROM ${quoteIdentifier(table)} WHERE \`parent_id\` IN (${parentIds.map(() => '?').join(', ')}) ORDER BY \`id\``,
    params: [...parentIds],
  };
}

export function buildDeleteRows(table: string, ids: number[]): SqlStatement {
  return {
    sql: `DELETE FROM ${quoteIdentifier(table)} WHERE \`id\` IN (${ids.map(() => '?').join(', ')})`,
    params: [...ids],
  };
}

/** LIKE 模式转义：% _ \ 按字面匹配 */
export function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, ch => `\\${ch}`);
}

export function buildWhere(filters: RowFilter[]): SqlStatement {
  if (filters.length === 0) return { sql: '', params: [] };
  const clauses: string[] = [];
  const params: unknown[] = [];

  for (const f of filters) {
    const column = quoteIdentifier(f.column);
    switch (f.operator) {
      case 'isNull':
        clauses.push(`${column} IS NULL`);
        break;
      case 'notNull':
        clauses.push(`${column} IS NOT NULL`);
        break;
      case 'in': {
        const values = Array.isArray(f.value) ? f.value : [f.value];
        if (values.length === 0) {
          clauses.push('1 = 0');
        } else {
          clauses.push(`${column} IN (${values.map(() => '?').join(', ')})`);
          params.push(...values);
        }
        break;
      }
      case 'contains':
        clauses.push(`${column} LIKE ?`);
        params.push(`%${escapeLike(String(f.value))}%`);
        break;
      default:
        clauses.push(`${column} ${COMPARATORS[f.operator]} ?`);
        params.push(f.value);
    }
  }
  return { sql: ` WHERE ${clauses.join(' AND ')}`, params };
}

const COMPARATORS = {
  eq: '=',
  ne: '<>',
  gt: '>',
  gte: '>=',
  lt: '<',
  lte: '<=',
} as const;

export function buildSelect(table: string, query: RowQuery): SqlStatement {
  const where = buildWhere(query.filters);
  const direction = query.sortOrder === 'desc' ? 'DESC' : 'ASC';
  const order = query.sortColumn === 'id'
    ? `\`id\` ${direction}`
    : `${quoteIdentifier(query.sortColumn)} ${direction}, \`id\` ASC`;
  return {
    sql: `SELECT ${ROW_COLUMNS} FROM ${quoteIdentifier(table)}${where.sql} ORDER BY ${order} LIMIT ? OFFSET ?`,
    params: [...where.params, query.limit, query.offset],
  };
}

export function buildCount(table: string, filters: RowFilter[]): SqlStatement {
  const where = buildWhere(filters);
  return {
    sql: `SELECT COUNT(*) AS total FROM ${quoteIdentifier(table)}${where.sql}`,
    params: where.params,
  };
}

export function buildAggregate(table: string, column: string, numeric: boolean): SqlStatement {
  const c = quoteIdentifier(column);
  const avg = numeric ? `AVG(${c})` : 'NULL';
  return {
    sql: `SELECT COUNT(*) AS total_count, COUNT(${c}) AS non_null_count, MIN(${c}) AS min_value, `
      + `MAX(${c}) AS max_value, ${avg} AS avg_value FROM ${quoteIdentifier(table)}`,
    params: [],
  };
}

/**
 * MySQL 物理存储
 *
 * - 注册表 / 迁移历史：drizzle-orm（drizzle/schema.ts）
 * - 结构表：sqlBuilder 生成的参数化 SQL
 *
 * MySQL 的 DDL 会隐式提交当前事务，无法随 ROLLBACK 撤销。
 * 因此每条 DDL 登记一条补偿语句，事务失败时在 ROLLBACK 之后逆序执行。
 * 死锁与锁等待超时整体重放一次（runWithRetry）。
 */

import { asc, eq } from 'drizzle-orm';
import { drizzle, type MySql2Database } from 'drizzle-orm/mysql2';
import type { Pool, PoolConnection, ResultSetHeader, RowDataPacket } from 'mysql2/promise';
import { z } from 'zod';
import { structureDefinitions, structureMigrations } from '../../../drizzle/schema';
import type { MigrationEntry } from '../../../shared/structureTypes';
import { NotFoundError } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import {
  RESERVED_COLUMNS,
  type CellValue,
  type ColumnAggregate,
  type ColumnDefinition,
  type PhysicalColumn,
  type PhysicalRow,
  type PhysicalStore,
  type RowFilter,
  type RowQuery,
  type RowWrite,
  type StoreTransaction,
  type StructureRow,
} from '../physicalStore';
import { runWithRetry } from '../retry';
import {
  REGISTRY_DDL,
  buildAddColumns,
  buildAggregate,
  buildCount,
  buildCreateIndex,
  buildCreateTable,
  buildDeleteRows,
  buildDescribeColumns,
  buildDescribeIndexes,
  buildDropColumns,
  buildDropIndex,
  buildDropTable,
  buildFindChildIds,
  buildFindRows,
  buildInsertRow,
  buildModifyColumns,
  buildSelect,
  buildUpdateRow,
  buildWriteCells,
  parsePhysicalType,
} from './sqlBuilder';

const log = createModuleLogger('mysql-store');

// ============================================
// 结果行解析
// ============================================

const physicalRowSchema = z.object({
  id: z.coerce.number().int(),
  parent_id: z.coerce.number().int().nullable(),
  document: z.string(),
  created_at: z.coerce.date(),
  updated_at: z.coerce.date(),
});

const childRowSchema = z.object({
  id: z.coerce.number().int(),
  parent_id: z.coerce.number().int(),
});

const columnInfoSchema = z.object({
  column_name: z.string(),
  data_type: z.string(),
  column_type: z.string(),
  max_length: z.coerce.number().int().nullable(),
});

const indexInfoSchema = z.object({ column_name: z.string() });

const countSchema = z.object({ total: z.coerce.number() });

const cellSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const aggregateSchema = z.object({
  total_count: z.coerce.number(),
  non_null_count: z.coerce.number(),
  min_value: cellSchema,
  max_value: cellSchema,
  // DECIMAL 结果以字符串返回
  avg_value: z.union([z.number(), z.string(), z.null()]).transform(v => (v === null ? null : Number(v))),
});

function toPhysicalRow(raw: RowDataPacket): PhysicalRow {
  const row = physicalRowSchema.parse(raw);
  return {
    id: row.id,
    parentId: row.parent_id,
    document: row.document,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

const RESERVED = new Set<string>(RESERVED_COLUMNS);

// ============================================
// 事务
// ============================================

export class MysqlTransaction implements StoreTransaction {
  private readonly db: MySql2Database;
  /** 逆序执行的补偿 DDL */
  private readonly compensations: string[] = [];
  private readonly hooks: Array<() => void> = [];

  constructor(private readonly conn: PoolConnection) {
    this.db = drizzle(conn);
  }

  // ---------- 注册表 ----------

  async findStructure(name: string): Promise<StructureRow | null> {
    const rows = await this.db.select().from(structureDefinitions)
      .where(eq(structureDefinitions.name, name))
      .for('update');
    return rows[0] ?? null;
  }

  async listStructures(): Promise<StructureRow[]> {
    return this.db.select().from(structureDefinitions).orderBy(asc(structureDefinitions.name));
  }

  async insertStructure(row: StructureRow): Promise<void> {
    await this.db.insert(structureDefinitions).values(row);
  }

  async updateStructure(row: StructureRow): Promise<void> {
    const [result] = await this.db.update(structureDefinitions)
      .set({
        tableName: row.tableName,
        schemaJson: row.schemaJson,
        version: row.version,
        meta: row.meta,
        updatedAt: row.updatedAt,
      })
      .where(eq(structureDefinitions.name, row.name));
    if (result.affectedRows === 0) throw new NotFoundError('structure', row.name);
  }

  async deleteStructure(name: string): Promise<void> {
    await this.db.delete(structureDefinitions).where(eq(structureDefinitions.name, name));
  }

  async appendMigration(entry: MigrationEntry): Promise<void> {
    await this.db.insert(structureMigrations).values({
      structureName: entry.structureName,
      version: entry.version,
      kind: entry.kind,
      summary: entry.summary,
      appliedAt: entry.appliedAt,
    });
  }

  async listMigrations(structureName: string): Promise<MigrationEntry[]> {
    const rows = await this.db.select().from(structureMigrations)
      .where(eq(structureMigrations.structureName, structureName))
      .orderBy(asc(structureMigrations.id));
    return rows.map(r => ({
      structureName: r.structureName,
      version: r.version,
      kind: r.kind,
      summary: r.summary,
      appliedAt: r.appliedAt,
    }));
  }

  // ---------- DDL ----------

  async describeTable(table: string): Promise<PhysicalColumn[] | null> {
    const columns = await this.select(buildDescribeColumns(table));
    if (columns.length === 0) return null;
    const indexed = new Set(
      (await this.select(buildDescribeIndexes(table))).map(r => indexInfoSchema.parse(r).column_name),
    );
    return columns
      .map(r => columnInfoSchema.parse(r))
      .filter(c => !RESERVED.has(c.column_name))
      .map(c => ({
        name: c.column_name,
        type: parsePhysicalType(c.data_type, c.column_type, c.max_length),
        indexed: indexed.has(c.column_name),
      }));
  }

  async createTable(table: string, columns: ColumnDefinition[]): Promise<void> {
    await this.ddl(buildCreateTable(table, columns), buildDropTable(table));
  }

  async addColumns(table: string, columns: ColumnDefinition[]): Promise<void> {
    await this.ddl(buildAddColumns(table, columns), buildDropColumns(table, columns.map(c => c.name)));
  }

  async modifyColumns(table: string, columns: ColumnDefinition[]): Promise<void> {
    const before = await this.describeTable(table);
    const previous: ColumnDefinition[] = [];
    const reindex: Array<{ from: ColumnDefinition; to: ColumnDefinition }> = [];
    for (const column of columns) {
      const current = before?.find(c => c.name === column.name);
      if (!current?.type) continue;
      const from = { name: column.name, type: current.type, indexed: current.indexed };
      previous.push(from);
      // TEXT 列的索引必须带前缀长度，先删除再以前缀重建
      if (current.indexed && column.type.kind === 'text' && current.type.kind !== 'text') {
        reindex.push({ from, to: column });
      }
    }
    for (const { from } of reindex) {
      await this.ddl(buildDropIndex(table, from.name), buildCreateIndex(table, from));
    }
    await this.ddl(buildModifyColumns(table, columns), previous.length > 0 ? buildModifyColumns(table, previous) : null);
    for (const { to } of reindex) {
      await this.ddl(buildCreateIndex(table, to), buildDropIndex(table, to.name));
    }
  }

  async createIndexes(table: string, columns: ColumnDefinition[]): Promise<void> {
    for (const column of columns) {
      await this.ddl(buildCreateIndex(table, column), buildDropIndex(table, column.name));
    }
  }

  async dropColumns(table: string, columns: string[]): Promise<void> {
    if (columns.length === 0) return;
    await this.ddl(buildDropColumns(table, columns), null);
  }

  async dropTable(table: string): Promise<void> {
    await this.ddl(buildDropTable(table), null);
  }

  // ---------- DML ----------

  async insertRow(table: string, row: RowWrite): Promise<PhysicalRow> {
    const stmt = buildInsertRow(table, row, new Date());
    const [result] = await this.conn.query<ResultSetHeader>(stmt.sql, stmt.params);
    const inserted = await this.findRow(table, result.insertId);
    if (!inserted) throw new NotFoundError(`record in '${table}'`, result.insertId);
    return inserted;
  }

  async updateRow(table: string, id: number, row: RowWrite): Promise<PhysicalRow> {
    const stmt = buildUpdateRow(table, id, row, new Date());
    const [result] = await this.conn.query<ResultSetHeader>(stmt.sql, stmt.params);
    if (result.affectedRows === 0) throw new NotFoundError(`record in '${table}'`, id);
    const updated = await this.findRow(table, id);
    if (!updated) throw new NotFoundError(`record in '${table}'`, id);
    return updated;
  }

  async writeCells(table: string, id: number, cells: Record<string, CellValue>): Promise<void> {
    if (Object.keys(cells).length === 0) return;
    const stmt = buildWriteCells(table, id, cells);
    const [result] = await this.conn.query<ResultSetHeader>(stmt.sql, stmt.params);
    if (result.affectedRows === 0) throw new NotFoundError(`record in '${table}'`, id);
  }

  async findRow(table: string, id: number, options: { forUpdate?: boolean } = {}): Promise<PhysicalRow | null> {
    const rows = await this.select(buildFindRows(table, [id], options.forUpdate ?? false));
    return rows.length > 0 ? toPhysicalRow(rows[0]) : null;
  }

  async findRows(table: string, ids: number[]): Promise<PhysicalRow[]> {
    const rows = await this.select(buildFindRows(table, [...new Set(ids)], true));
    return rows.map(toPhysicalRow);
  }

  async findChildIds(table: string, parentIds: number[]): Promise<Array<{ id: number; parentId: number }>> {
    if (parentIds.length === 0) return [];
    const rows = await this.select(buildFindChildIds(table, parentIds));
    return rows.map(r => {
      const parsed = childRowSchema.parse(r);
      return { id: parsed.id, parentId: parsed.parent_id };
    });
  }

  async deleteRows(table: string, ids: number[]): Promise<number> {
    if (ids.length === 0) return 0;
    const stmt = buildDeleteRows(table, ids);
    const [result] = await this.conn.query<ResultSetHeader>(stmt.sql, stmt.params);
    return result.affectedRows;
  }

  async selectRows(table: string, query: RowQuery): Promise<PhysicalRow[]> {
    const rows = await this.select(buildSelect(table, query));
    return rows.map(toPhysicalRow);
  }

  async countRows(table: string, filters: RowFilter[]): Promise<number> {
    const rows = await this.select(buildCount(table, filters));
    return rows.length > 0 ? countSchema.parse(rows[0]).total : 0;
  }

  async aggregateColumn(table: string, column: string, numeric: boolean): Promise<ColumnAggregate> {
    const rows = await this.select(buildAggregate(table, column, numeric));
    const agg = aggregateSchema.parse(rows[0]);
    const min: CellValue = agg.min_value;
    const max: CellValue = agg.max_value;
    return {
      totalCount: agg.total_count,
      nonNullCount: agg.non_null_count,
      min,
      max,
      avg: agg.avg_value,
    };
  }

  afterCommit(hook: () => void): void {
    this.hooks.push(hook);
  }

  // ---------- 提交 / 补偿 ----------

  runAfterCommit(): void {
    for (const hook of this.hooks.splice(0)) hook();
  }

  /** 逆序执行补偿 DDL；单条失败记录后继续 */
  async compensate(): Promise<void> {
    const pending = this.compensations.splice(0).reverse();
    for (const statement of pending) {
      try {
        await this.conn.query(statement);
      } catch (err) {
        log.error({ statement, error: err instanceof Error ? err.message : String(err) }, 'Compensating DDL failed');
      }
    }
    this.hooks.length = 0;
  }

  private async ddl(statement: string, inverse: string | null): Promise<void> {
    await this.conn.query(statement);
    if (inverse) this.compensations.push(inverse);
    else log.debug({ statement }, 'DDL without compensation');
  }

  private async select(stmt: { sql: string; params: unknown[] }): Promise<RowDataPacket[]> {
    const [rows] = await this.conn.query<RowDataPacket[]>(stmt.sql, stmt.params);
    return rows;
  }
}

// ============================================
// 存储
// ============================================

export interface MysqlStoreOptions {
  pool: Pool;
  /** close() 时调用，默认 pool.end() */
  onClose?: () => Promise<void>;
}

export class MysqlPhysicalStore implements PhysicalStore {
  readonly kind = 'mysql' as const;
  private readonly pool: Pool;
  private readonly onClose: () => Promise<void>;

  constructor(options: MysqlStoreOptions) {
    this.pool = options.pool;
    this.onClose = options.onClose ?? (() => this.pool.end());
  }

  async init(): Promise<void> {
    for (const ddl of REGISTRY_DDL) {
      await this.pool.query(ddl);
    }
    log.info('Registry tables ready');
  }

  transaction<T>(fn: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return runWithRetry(() => this.runOnce(fn), { label: 'mysql transaction' });
  }

  async close(): Promise<void> {
    await this.onClose();
  }

  private async runOnce<T>(fn: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    const conn = await this.pool.getConnection();
    const tx = new MysqlTransaction(conn);
    try {
      await conn.beginTransaction();
      const result = await fn(tx);
      await conn.commit();
      tx.runAfterCommit();
      return result;
    } catch (err) {
      try {
        await conn.rollback();
      } catch (rollbackErr) {
        log.error({ error: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr) }, 'Rollback failed');
      }
      await tx.compensate();
      throw err;
    } finally {
      conn.release();
    }
  }
}

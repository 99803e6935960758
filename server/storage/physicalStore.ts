/**
 * 物理存储接口
 *
 * 结构引擎只通过 PhysicalStore / StoreTransaction 访问存储：
 *   - MemoryPhysicalStore：进程内实现（开发、测试）
 *   - MysqlPhysicalStore：mysql2 连接池 + drizzle-orm 注册表
 *
 * 一次 transaction() 内的全部操作要么整体提交，要么整体回滚；
 * afterCommit 钩子在提交成功后按注册顺序同步执行。
 */

import type { FilterOperator, MigrationEntry, SortOrder, StructureMeta } from '../../shared/structureTypes';

// ============================================
// 列类型
// ============================================

export type PhysicalType =
  | { kind: 'varchar'; length: number }
  | { kind: 'text' }
  | { kind: 'double' }
  | { kind: 'bigint' }
  | { kind: 'boolean' };

/** 每张结构表固定存在的保留列 */
export const RESERVED_COLUMNS = ['id', 'parent_id', 'document', 'created_at', 'updated_at'] as const;

export interface ColumnDefinition {
  name: string;
  type: PhysicalType;
  indexed: boolean;
}

/** describeTable 返回的投影列；无法识别的类型为 null */
export interface PhysicalColumn {
  name: string;
  type: PhysicalType | null;
  indexed: boolean;
}

export function formatPhysicalType(type: PhysicalType | null): string {
  if (!type) return 'unknown';
  return type.kind === 'varchar' ? `varchar(${type.length})` : type.kind;
}

// ============================================
// 行
// ============================================

export type CellValue = string | number | boolean | null;

export interface PhysicalRow {
  id: number;
  parentId: number | null;
  /** 规范化序列化后的完整文档 */
  document: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface RowWrite {
  parentId: number | null;
  document: string;
  /** 投影列名 → 值 */
  cells: Record<string, CellValue>;
}

export interface RowFilter {
  column: string;
  operator: FilterOperator;
  value: CellValue | CellValue[];
}

export interface RowQuery {
  filters: RowFilter[];
  sortColumn: string;
  sortOrder: SortOrder;
  limit: number;
  offset: number;
}

export interface ColumnAggregate {
  totalCount: number;
  nonNullCount: number;
  min: CellValue;
  max: CellValue;
  avg: number | null;
}

// ============================================
// 注册表行
// ============================================

export interface StructureRow {
  name: string;
  tableName: string;
  schemaJson: string;
  version: number;
  meta: StructureMeta;
  createdAt: Date;
  updatedAt: Date;
}

// ============================================
// 事务 / 存储
// ============================================

export interface StoreTransaction {
  // 注册表
  findStructure(name: string): Promise<StructureRow | null>;
  listStructures(): Promise<StructureRow[]>;
  insertStructure(row: StructureRow): Promise<void>;
  updateStructure(row: StructureRow): Promise<void>;
  deleteStructure(name: string): Promise<void>;
  appendMigration(entry: MigrationEntry): Promise<void>;
  listMigrations(structureName: string): Promise<MigrationEntry[]>;

  // DDL（describeTable 只返回投影列，不含保留列；表不存在返回 null）
  describeTable(table: string): Promise<PhysicalColumn[] | null>;
  createTable(table: string, columns: ColumnDefinition[]): Promise<void>;
  addColumns(table: string, columns: ColumnDefinition[]): Promise<void>;
  modifyColumns(table: string, columns: ColumnDefinition[]): Promise<void>;
  createIndexes(table: string, columns: ColumnDefinition[]): Promise<void>;
  dropColumns(table: string, columns: string[]): Promise<void>;
  dropTable(table: string): Promise<void>;

  // DML
  insertRow(table: string, row: RowWrite): Promise<PhysicalRow>;
  updateRow(table: string, id: number, row: RowWrite): Promise<PhysicalRow>;
  /** 只改写投影列，document 与 updated_at 不变（迁移回填用） */
  writeCells(table: string, id: number, cells: Record<string, CellValue>): Promise<void>;
  /** forUpdate：读取并锁定该行直到事务结束 */
  findRow(table: string, id: number, options?: { forUpdate?: boolean }): Promise<PhysicalRow | null>;
  findRows(table: string, ids: number[]): Promise<PhysicalRow[]>;
  findChildIds(table: string, parentIds: number[]): Promise<Array<{ id: number; parentId: number }>>;
  deleteRows(table: string, ids: number[]): Promise<number>;
  selectRows(table: string, query: RowQuery): Promise<PhysicalRow[]>;
  countRows(table: string, filters: RowFilter[]): Promise<number>;
  aggregateColumn(table: string, column: string, numeric: boolean): Promise<ColumnAggregate>;

  /** 提交成功后执行；回滚时丢弃 */
  afterCommit(hook: () => void): void;
}

export interface PhysicalStore {
  readonly kind: 'memory' | 'mysql';
  /** 建立注册表与迁移历史表 */
  init(): Promise<void>;
  transaction<T>(fn: (tx: StoreTransaction) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

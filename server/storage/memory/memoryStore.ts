/**
 * 进程内物理存储
 *
 * 与 MySQL 实现保持相同语义：自增 id、parent_id 外键检查、
 * NULL 比较恒为假、升序 NULL 在前。
 *
 * 事务全局串行执行；每个变更登记一条撤销操作，
 * 失败时逆序撤销，保证调用方看不到半完成的状态。
 */

import type { MigrationEntry } from '../../../shared/structureTypes';
import { DataIntegrityError, NotFoundError } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';
import { KeyedLock } from '../../lib/concurrency/keyedLock';
import type {
  CellValue,
  ColumnAggregate,
  ColumnDefinition,
  PhysicalColumn,
  PhysicalRow,
  PhysicalStore,
  RowFilter,
  RowQuery,
  RowWrite,
  StoreTransaction,
  StructureRow,
} from '../physicalStore';

const log = createModuleLogger('memory-store');

// ============================================
// 内部状态
// ============================================

interface MemoryRow {
  id: number;
  parentId: number | null;
  document: string;
  cells: Map<string, CellValue>;
  createdAt: Date;
  updatedAt: Date;
}

interface MemoryTable {
  columns: Map<string, ColumnDefinition>;
  rows: Map<number, MemoryRow>;
  nextId: number;
}

interface MemoryState {
  structures: Map<string, StructureRow>;
  migrations: MigrationEntry[];
  tables: Map<string, MemoryTable>;
}

type Comparable = number | string;

function toComparable(value: CellValue | Date): Comparable | null {
  if (value === null) return null;
  if (value instanceof Date) return value.getTime();
  if (typeof value === 'boolean') return value ? 1 : 0;
  return value;
}

function compareValues(a: Comparable, b: Comparable): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  const sa = String(a);
  const sb = String(b);
  return sa < sb ? -1 : sa > sb ? 1 : 0;
}

function cloneStructureRow(row: StructureRow): StructureRow {
  return {
    ...row,
    meta: { deprecatedColumns: [...row.meta.deprecatedColumns] },
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt),
  };
}

function cloneMigration(entry: MigrationEntry): MigrationEntry {
  return {
    ...entry,
    summary: {
      added: [...entry.summary.added],
      widened: [...entry.summary.widened],
      deprecated: [...entry.summary.deprecated],
      restored: [...entry.summary.restored],
      dropped: [...entry.summary.dropped],
      indexed: [...entry.summary.indexed],
    },
    appliedAt: new Date(entry.appliedAt),
  };
}

function toPhysicalRow(row: MemoryRow): PhysicalRow {
  return {
    id: row.id,
    parentId: row.parentId,
    document: row.document,
    createdAt: new Date(row.createdAt),
    updatedAt: new Date(row.updatedAt),
  };
}

/** 拓宽列类型时转换已有值（boolean → 数值） */
function convertCell(value: CellValue, column: ColumnDefinition): CellValue {
  if (typeof value === 'boolean' && (column.type.kind === 'bigint' || column.type.kind === 'double')) {
    return value ? 1 : 0;
  }
  return value;
}

// ============================================
// 事务
// ============================================

export class MemoryTransaction implements StoreTransaction {
  private readonly undoLog: Array<() => void> = [];
  private readonly hooks: Array<() => void> = [];

  constructor(private readonly state: MemoryState, private readonly now: () => Date) {}

  // ---------- 注册表 ----------

  async findStructure(name: string): Promise<StructureRow | null> {
    const row = this.state.structures.get(name);
    return row ? cloneStructureRow(row) : null;
  }

  async listStructures(): Promise<StructureRow[]> {
    return [...this.state.structures.values()]
      .map(cloneStructureRow)
      .sort((a, b) => compareValues(a.name, b.name));
  }

  async insertStructure(row: StructureRow): Promise<void> {
    if (this.state.structures.has(row.name)) {
      throw new DataIntegrityError(`Duplicate structure row '${row.name}'`);
    }
    this.state.structures.set(row.name, cloneStructureRow(row));
    this.undoLog.push(() => this.state.structures.delete(row.name));
  }

  async updateStructure(row: StructureRow): Promise<void> {
    const previous = this.state.structures.get(row.name);
    if (!previous) throw new NotFoundError('structure', row.name);
    this.state.structures.set(row.name, cloneStructureRow(row));
    this.undoLog.push(() => this.state.structures.set(row.name, previous));
  }

  async deleteStructure(name: string): Promise<void> {
    const previous = this.state.structures.get(name);
    if (!previous) return;
    this.state.structures.delete(name);
    this.undoLog.push(() => this.state.structures.set(name, previous));
  }

  async appendMigration(entry: MigrationEntry): Promise<void> {
    this.state.migrations.push(cloneMigration(entry));
    this.undoLog.push(() => {
      this.state.migrations.pop();
    });
  }

  async listMigrations(structureName: string): Promise<MigrationEntry[]> {
    return this.state.migrations.filter(m => m.structureName === structureName).map(cloneMigration);
  }

  // ---------- DDL ----------

  async describeTable(table: string): Promise<PhysicalColumn[] | null> {
    const t = this.state.tables.get(table);
    if (!t) return null;
    return [...t.columns.values()].map(c => ({ name: c.name, type: { ...c.type }, indexed: c.indexed }));
  }

  async createTable(table: string, columns: ColumnDefinition[]): Promise<void> {
    if (this.state.tables.has(table)) {
      throw new DataIntegrityError(`Table '${table}' already exists`);
    }
    const t: MemoryTable = {
      columns: new Map(columns.map(c => [c.name, { ...c }])),
      rows: new Map(),
      nextId: 1,
    };
    this.state.tables.set(table, t);
    this.undoLog.push(() => this.state.tables.delete(table));
  }

  async addColumns(table: string, columns: ColumnDefinition[]): Promise<void> {
    const t = this.requireTable(table);
    for (const column of columns) {
      if (t.columns.has(column.name)) {
        throw new DataIntegrityError(`Column '${column.name}' already exists in '${table}'`);
      }
    }
    for (const column of columns) {
      t.columns.set(column.name, { ...column });
    }
    this.undoLog.push(() => {
      for (const column of columns) t.columns.delete(column.name);
    });
  }

  async modifyColumns(table: string, columns: ColumnDefinition[]): Promise<void> {
    const t = this.requireTable(table);
    for (const column of columns) {
      const previous = t.columns.get(column.name);
      if (!previous) throw new DataIntegrityError(`Column '${column.name}' does not exist in '${table}'`);
      const previousCells = new Map<number, CellValue>();
      for (const row of t.rows.values()) {
        const cell = row.cells.get(column.name);
        if (cell === undefined) continue;
        previousCells.set(row.id, cell);
        row.cells.set(column.name, convertCell(cell, column));
      }
      t.columns.set(column.name, { ...column, indexed: previous.indexed || column.indexed });
      this.undoLog.push(() => {
        t.columns.set(column.name, previous);
        for (const [id, cell] of previousCells) {
          t.rows.get(id)?.cells.set(column.name, cell);
        }
      });
    }
  }

  async createIndexes(table: string, columns: ColumnDefinition[]): Promise<void> {
    const t = this.requireTable(table);
    for (const column of columns) {
      const previous = t.columns.get(column.name);
      if (!previous) throw new DataIntegrityError(`Column '${column.name}' does not exist in '${table}'`);
      t.columns.set(column.name, { ...previous, indexed: true });
      this.undoLog.push(() => t.columns.set(column.name, previous));
    }
  }

  async dropColumns(table: string, columns: string[]): Promise<void> {
    const t = this.requireTable(table);
    for (const name of columns) {
      const previous = t.columns.get(name);
      if (!previous) continue;
      const previousCells = new Map<number, CellValue>();
      for (const row of t.rows.values()) {
        const cell = row.cells.get(name);
        if (cell !== undefined) previousCells.set(row.id, cell);
        row.cells.delete(name);
      }
      t.columns.delete(name);
      this.undoLog.push(() => {
        t.columns.set(name, previous);
        for (const [id, cell] of previousCells) {
          t.rows.get(id)?.cells.set(name, cell);
        }
      });
    }
  }

  async dropTable(table: string): Promise<void> {
    const previous = this.state.tables.get(table);
    if (!previous) return;
    this.state.tables.delete(table);
    this.undoLog.push(() => this.state.tables.set(table, previous));
  }

  // ---------- DML ----------

  async insertRow(table: string, row: RowWrite): Promise<PhysicalRow> {
    const t = this.requireTable(table);
    this.checkParent(t, table, row.parentId);
    const id = t.nextId;
    const now = this.now();
    const stored: MemoryRow = {
      id,
      parentId: row.parentId,
      document: row.document,
      cells: this.buildCells(t, table, row.cells),
      createdAt: now,
      updatedAt: now,
    };
    t.rows.set(id, stored);
    t.nextId = id + 1;
    this.undoLog.push(() => {
      t.rows.delete(id);
      t.nextId = id;
    });
    return toPhysicalRow(stored);
  }

  async updateRow(table: string, id: number, row: RowWrite): Promise<PhysicalRow> {
    const t = this.requireTable(table);
    const previous = t.rows.get(id);
    if (!previous) throw new NotFoundError(`record in '${table}'`, id);
    this.checkParent(t, table, row.parentId);
    const cells = new Map(previous.cells);
    for (const [name, value] of this.buildCells(t, table, row.cells)) cells.set(name, value);
    const stored: MemoryRow = {
      ...previous,
      parentId: row.parentId,
      document: row.document,
      cells,
      updatedAt: this.now(),
    };
    t.rows.set(id, stored);
    this.undoLog.push(() => t.rows.set(id, previous));
    return toPhysicalRow(stored);
  }

  async writeCells(table: string, id: number, cells: Record<string, CellValue>): Promise<void> {
    const t = this.requireTable(table);
    const previous = t.rows.get(id);
    if (!previous) throw new NotFoundError(`record in '${table}'`, id);
    const next = new Map(previous.cells);
    for (const [name, value] of this.buildCells(t, table, cells)) next.set(name, value);
    t.rows.set(id, { ...previous, cells: next });
    this.undoLog.push(() => t.rows.set(id, previous));
  }

  async findRow(table: string, id: number): Promise<PhysicalRow | null> {
    const row = this.requireTable(table).rows.get(id);
    return row ? toPhysicalRow(row) : null;
  }

  async findRows(table: string, ids: number[]): Promise<PhysicalRow[]> {
    const t = this.requireTable(table);
    const result: PhysicalRow[] = [];
    for (const id of [...new Set(ids)].sort((a, b) => a - b)) {
      const row = t.rows.get(id);
      if (row) result.push(toPhysicalRow(row));
    }
    return result;
  }

  async findChildIds(table: string, parentIds: number[]): Promise<Array<{ id: number; parentId: number }>> {
    const t = this.requireTable(table);
    const wanted = new Set(parentIds);
    const result: Array<{ id: number; parentId: number }> = [];
    for (const row of t.rows.values()) {
      if (row.parentId !== null && wanted.has(row.parentId)) {
        result.push({ id: row.id, parentId: row.parentId });
      }
    }
    return result.sort((a, b) => a.id - b.id);
  }

  async deleteRows(table: string, ids: number[]): Promise<number> {
    const t = this.requireTable(table);
    const targets = new Set(ids.filter(id => t.rows.has(id)));
    // 外键：不允许留下引用已删除行的子行
    for (const row of t.rows.values()) {
      if (!targets.has(row.id) && row.parentId !== null && targets.has(row.parentId)) {
        throw new DataIntegrityError(`Cannot delete record ${row.parentId} from '${table}': referenced by ${row.id}`);
      }
    }
    const removed: MemoryRow[] = [];
    for (const id of targets) {
      const row = t.rows.get(id);
      if (!row) continue;
      removed.push(row);
      t.rows.delete(id);
    }
    this.undoLog.push(() => {
      for (const row of removed) t.rows.set(row.id, row);
    });
    return removed.length;
  }

  async selectRows(table: string, query: RowQuery): Promise<PhysicalRow[]> {
    const t = this.requireTable(table);
    const matched = [...t.rows.values()].filter(row => query.filters.every(f => this.matches(row, f)));
    const direction = query.sortOrder === 'desc' ? -1 : 1;
    matched.sort((a, b) => {
      const va = toComparable(this.valueOf(a, query.sortColumn));
      const vb = toComparable(this.valueOf(b, query.sortColumn));
      let cmp = 0;
      // 与 MySQL 一致：NULL 视为最小值
      if (va === null && vb !== null) cmp = -1;
      else if (va !== null && vb === null) cmp = 1;
      else if (va !== null && vb !== null) cmp = compareValues(va, vb);
      if (cmp !== 0) return cmp * direction;
      return a.id - b.id;
    });
    return matched.slice(query.offset, query.offset + query.limit).map(toPhysicalRow);
  }

  async countRows(table: string, filters: RowFilter[]): Promise<number> {
    const t = this.requireTable(table);
    let count = 0;
    for (const row of t.rows.values()) {
      if (filters.every(f => this.matches(row, f))) count++;
    }
    return count;
  }

  async aggregateColumn(table: string, column: string, numeric: boolean): Promise<ColumnAggregate> {
    const t = this.requireTable(table);
    let nonNullCount = 0;
    let min: CellValue = null;
    let max: CellValue = null;
    let sum = 0;
    for (const row of t.rows.values()) {
      const value = row.cells.get(column) ?? null;
      if (value === null) continue;
      nonNullCount++;
      const cv = toComparable(value);
      const cmin = toComparable(min);
      const cmax = toComparable(max);
      if (cv !== null && (cmin === null || compareValues(cv, cmin) < 0)) min = value;
      if (cv !== null && (cmax === null || compareValues(cv, cmax) > 0)) max = value;
      if (numeric && typeof cv === 'number') sum += cv;
    }
    return {
      totalCount: t.rows.size,
      nonNullCount,
      min,
      max,
      avg: numeric && nonNullCount > 0 ? sum / nonNullCount : null,
    };
  }

  afterCommit(hook: () => void): void {
    this.hooks.push(hook);
  }

  // ---------- 提交 / 回滚 ----------

  rollback(): void {
    for (const undo of this.undoLog.splice(0).reverse()) undo();
    this.hooks.length = 0;
  }

  commit(): void {
    this.undoLog.length = 0;
    for (const hook of this.hooks.splice(0)) hook();
  }

  // ---------- 内部 ----------

  private requireTable(table: string): MemoryTable {
    const t = this.state.tables.get(table);
    if (!t) throw new DataIntegrityError(`Table '${table}' does not exist`);
    return t;
  }

  private checkParent(t: MemoryTable, table: string, parentId: number | null): void {
    if (parentId !== null && !t.rows.has(parentId)) {
      throw new DataIntegrityError(`Parent record ${parentId} does not exist in '${table}'`);
    }
  }

  private buildCells(t: MemoryTable, table: string, values: Record<string, CellValue>): Map<string, CellValue> {
    const cells = new Map<string, CellValue>();
    for (const [name, value] of Object.entries(values)) {
      const column = t.columns.get(name);
      if (!column) throw new DataIntegrityError(`Unknown column '${name}' in '${table}'`);
      cells.set(name, value === null ? null : convertCell(value, column));
    }
    return cells;
  }

  private valueOf(row: MemoryRow, column: string): CellValue | Date {
    switch (column) {
      case 'id': return row.id;
      case 'parent_id': return row.parentId;
      case 'created_at': return row.createdAt;
      case 'updated_at': return row.updatedAt;
      default: return row.cells.get(column) ?? null;
    }
  }

  private matches(row: MemoryRow, filter: RowFilter): boolean {
    const raw = this.valueOf(row, filter.column);
    const cell = toComparable(raw);
    switch (filter.operator) {
      case 'isNull': return cell === null;
      case 'notNull': return cell !== null;
      case 'in': {
        if (cell === null || !Array.isArray(filter.value)) return false;
        return filter.value.some(v => {
          const cv = toComparable(v);
          return cv !== null && compareValues(cell, cv) === 0;
        });
      }
      case 'contains':
        return typeof cell === 'string' && typeof filter.value === 'string' && cell.includes(filter.value);
    }
    if (cell === null || Array.isArray(filter.value)) return false;
    const target = toComparable(filter.value);
    if (target === null) return false;
    const cmp = compareValues(cell, target);
    switch (filter.operator) {
      case 'eq': return cmp === 0;
      case 'ne': return cmp !== 0;
      case 'gt': return cmp > 0;
      case 'gte': return cmp >= 0;
      case 'lt': return cmp < 0;
      case 'lte': return cmp <= 0;
    }
  }
}

// ============================================
// 存储
// ============================================

export interface MemoryStoreOptions {
  now?: () => Date;
}

export class MemoryPhysicalStore implements PhysicalStore {
  readonly kind = 'memory' as const;
  private readonly state: MemoryState = { structures: new Map(), migrations: [], tables: new Map() };
  private readonly serial = new KeyedLock({ timeoutMs: Infinity, name: 'memory-store' });
  private readonly now: () => Date;

  constructor(options: MemoryStoreOptions = {}) {
    this.now = options.now ?? (() => new Date());
  }

  async init(): Promise<void> {
    log.debug('Memory store ready');
  }

  transaction<T>(fn: (tx: StoreTransaction) => Promise<T>): Promise<T> {
    return this.serial.withExclusive('tx', async () => {
      const tx = new MemoryTransaction(this.state, this.now);
      let result: T;
      try {
        result = await fn(tx);
      } catch (err) {
        tx.rollback();
        throw err;
      }
      tx.commit();
      return result;
    });
  }

  async close(): Promise<void> {
    this.state.structures.clear();
    this.state.migrations.length = 0;
    this.state.tables.clear();
  }
}

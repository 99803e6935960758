/**
 * 物理表同步
 *
 * 先完整规划再执行 DDL：规划阶段发现任何不兼容变更即抛出，
 * 不会留下执行了一半的迁移。列只增不减，从 schema 移除的字段列
 * 标记为 deprecated，由 vacuum 或 drop 显式删除。
 */

import type { MigrationSummary, ObjectFieldSpec } from '../../shared/structureTypes';
import { DataIntegrityError, IncompatibleMigrationError, type MigrationConflict } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import {
  formatPhysicalType,
  type CellValue,
  type ColumnDefinition,
  type PhysicalColumn,
  type StoreTransaction,
} from '../storage/physicalStore';
import { toJsonObject } from './json';
import { compareTypes, project, projectedFields } from './typeMapper';

const log = createModuleLogger('table-sync');

const BACKFILL_PAGE_SIZE = 500;

export interface MigrationPlan {
  tableName: string;
  /** 表不存在，需要新建 */
  create: boolean;
  columns: ColumnDefinition[];
  add: ColumnDefinition[];
  widen: ColumnDefinition[];
  index: ColumnDefinition[];
  /** 迁移后仍保留但无字段映射的列 */
  deprecatedColumns: string[];
  summary: MigrationSummary;
}

export function emptySummary(): MigrationSummary {
  return { added: [], widened: [], deprecated: [], restored: [], dropped: [], indexed: [] };
}

export function isNoopPlan(plan: MigrationPlan): boolean {
  return !plan.create && plan.add.length === 0 && plan.widen.length === 0 && plan.index.length === 0;
}

export class TableSynchronizer {
  /**
   * 对比期望投影列与现有物理列
   * @param existing describeTable 的结果；null 表示表不存在
   * @param previousDeprecated 注册表中已记录的 deprecated 列
   */
  plan(
    structureName: string,
    tableName: string,
    fields: ObjectFieldSpec,
    existing: PhysicalColumn[] | null,
    previousDeprecated: string[],
  ): MigrationPlan {
    const desired = projectedFields(fields);
    const columns = desired.map(p => ({ name: p.column, type: p.type, indexed: p.indexed }));
    const summary = emptySummary();

    if (existing === null) {
      summary.added = columns.map(c => c.name);
      summary.indexed = columns.filter(c => c.indexed).map(c => c.name);
      return { tableName, create: true, columns, add: [], widen: [], index: [], deprecatedColumns: [], summary };
    }

    const current = new Map(existing.map(c => [c.name, c]));
    const add: ColumnDefinition[] = [];
    const widen: ColumnDefinition[] = [];
    const index: ColumnDefinition[] = [];
    const conflicts: MigrationConflict[] = [];

    for (const p of desired) {
      const column = current.get(p.column);
      if (!column) {
        add.push({ name: p.column, type: p.type, indexed: p.indexed });
        summary.added.push(p.column);
        if (p.indexed) summary.indexed.push(p.column);
        continue;
      }

      if (previousDeprecated.includes(p.column)) summary.restored.push(p.column);

      const change = column.type ? compareTypes(column.type, p.type) : 'incompatible';
      if (change === 'incompatible') {
        conflicts.push({
          field: p.field,
          column: p.column,
          from: formatPhysicalType(column.type),
          to: formatPhysicalType(p.type),
        });
        continue;
      }
      if (change === 'widen') {
        widen.push({ name: p.column, type: p.type, indexed: column.indexed });
        summary.widened.push(p.column);
      }
      if (p.indexed && !column.indexed) {
        const type = change === 'widen' || !column.type ? p.type : column.type;
        index.push({ name: p.column, type, indexed: true });
        summary.indexed.push(p.column);
      }
    }

    if (conflicts.length > 0) {
      throw new IncompatibleMigrationError(structureName, conflicts);
    }

    const mapped = new Set(desired.map(p => p.column));
    const deprecatedColumns = existing.filter(c => !mapped.has(c.name)).map(c => c.name);
    summary.deprecated = deprecatedColumns.filter(c => !previousDeprecated.includes(c));

    return { tableName, create: false, columns, add, widen, index, deprecatedColumns, summary };
  }

  async apply(tx: StoreTransaction, plan: MigrationPlan): Promise<void> {
    if (plan.create) {
      await tx.createTable(plan.tableName, plan.columns);
      log.info({ table: plan.tableName, columns: plan.columns.length }, 'Table created');
      return;
    }
    if (plan.add.length > 0) await tx.addColumns(plan.tableName, plan.add);
    if (plan.widen.length > 0) await tx.modifyColumns(plan.tableName, plan.widen);
    if (plan.index.length > 0) await tx.createIndexes(plan.tableName, plan.index);
    if (!isNoopPlan(plan) || plan.summary.deprecated.length > 0) {
      log.info({ table: plan.tableName, ...plan.summary }, 'Table migrated');
    }
  }

  /** 读取现有列 → 规划 → 执行 */
  async synchronize(
    tx: StoreTransaction,
    structureName: string,
    tableName: string,
    fields: ObjectFieldSpec,
    previousDeprecated: string[],
  ): Promise<MigrationPlan> {
    const existing = await tx.describeTable(tableName);
    const plan = this.plan(structureName, tableName, fields, existing, previousDeprecated);
    await this.apply(tx, plan);
    await this.backfill(tx, plan, fields);
    return plan;
  }

  /**
   * 新增列与 restored 列按各行 document 重新计算
   * deprecated 期间写入不维护这些列，document 为准
   */
  async backfill(tx: StoreTransaction, plan: MigrationPlan, fields: ObjectFieldSpec): Promise<number> {
    if (plan.create) return 0;
    const restored = new Set(plan.summary.restored);
    const targets = [...plan.add.map(c => c.name), ...restored];
    if (targets.length === 0) return 0;

    let written = 0;
    for (let offset = 0; ; offset += BACKFILL_PAGE_SIZE) {
      const rows = await tx.selectRows(plan.tableName, {
        filters: [], sortColumn: 'id', sortOrder: 'asc', limit: BACKFILL_PAGE_SIZE, offset,
      });
      for (const row of rows) {
        const document = toJsonObject(JSON.parse(row.document));
        if (!document) throw new DataIntegrityError(`Stored document of record ${row.id} is not an object`);
        const projected = project(fields, document);
        const cells: Record<string, CellValue> = {};
        for (const column of targets) {
          const value = projected[column] ?? null;
          if (value !== null || restored.has(column)) cells[column] = value;
        }
        if (Object.keys(cells).length === 0) continue;
        await tx.writeCells(plan.tableName, row.id, cells);
        written++;
      }
      if (rows.length < BACKFILL_PAGE_SIZE) break;
    }
    if (written > 0) log.info({ table: plan.tableName, columns: targets, rows: written }, 'Projection columns backfilled');
    return written;
  }

  /** 物理删除 deprecated 列，返回实际删除的列 */
  async vacuum(tx: StoreTransaction, tableName: string, deprecated: string[]): Promise<string[]> {
    const existing = await tx.describeTable(tableName);
    if (!existing) return [];
    const present = new Set(existing.map(c => c.name));
    const toDrop = deprecated.filter(c => present.has(c));
    if (toDrop.length > 0) {
      await tx.dropColumns(tableName, toDrop);
      log.info({ table: tableName, dropped: toDrop }, 'Deprecated columns dropped');
    }
    return toDrop;
  }
}

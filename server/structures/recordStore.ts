/**
 * 记录存储
 *
 * 结构化文档的 CRUD、级联删除、过滤分页、流式读取、批量创建与字段统计。
 * 记录操作持有结构锁（共享），与 schema 变更互斥；
 * 变更事件在事务提交后按提交顺序发布。
 */

import {
  FILTER_OPERATORS,
  flattenRecord,
  type ChangeKind,
  type FieldStats,
  type FilterCondition,
  type FilterOperator,
  type JsonObject,
  type ListQuery,
  type SortOrder,
  type StructureDefinition,
  type StructureRecord,
  type Violation,
} from '../../shared/structureTypes';
import type { EngineConfig } from '../core/config-schema';
import { DataIntegrityError, NotFoundError, UnfilterableFieldError, ValidationError } from '../core/errors';
import { createModuleLogger } from '../core/logger';
import type { KeyedLock } from '../lib/concurrency/keyedLock';
import type { CellValue, PhysicalRow, PhysicalStore, RowFilter, StoreTransaction } from '../storage/physicalStore';
import type { ChangeNotifier } from './changeNotifier';
import { canonicalJson, isPlainObject, toJsonObject } from './json';
import type { RecordValidator } from './recordValidator';
import type { SchemaRegistry } from './schemaRegistry';
import { findProjectedField, project } from './typeMapper';

const log = createModuleLogger('record-store');

export interface RecordStoreDeps {
  store: PhysicalStore;
  registry: SchemaRegistry;
  validator: RecordValidator;
  notifier: ChangeNotifier;
  lock: KeyedLock;
  config: Pick<EngineConfig, 'defaultPageSize' | 'maxPageSize' | 'streamPageSize'>;
  now?: () => Date;
}

export interface CreateOptions {
  parentId?: number | null;
}

type ColumnKind = 'string' | 'number' | 'integer' | 'boolean' | 'timestamp';

interface ResolvedColumn {
  column: string;
  kind: ColumnKind;
}

const SYSTEM_COLUMNS: Record<string, ResolvedColumn> = {
  id: { column: 'id', kind: 'integer' },
  parent_id: { column: 'parent_id', kind: 'integer' },
};

const SORT_ONLY_COLUMNS: Record<string, ResolvedColumn> = {
  created_at: { column: 'created_at', kind: 'timestamp' },
  updated_at: { column: 'updated_at', kind: 'timestamp' },
};

interface ResolvedQuery {
  filters: RowFilter[];
  sortColumn: string;
  sortOrder: SortOrder;
}

function isFilterOperator(value: unknown): value is FilterOperator {
  return FILTER_OPERATORS.some(op => op === value);
}

function isRecordId(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

export class RecordStore {
  private readonly now: () => Date;

  constructor(private readonly deps: RecordStoreDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  // ============================================
  // 写操作
  // ============================================

  async create(structureName: string, document: unknown, options: CreateOptions = {}): Promise<StructureRecord> {
    const [record] = await this.insertAll(structureName, [{ document, parentId: options.parentId }], false);
    return record;
  }

  /** 全部校验通过后在一个事务内插入；任何违规都不会写入 */
  async createMany(structureName: string, documents: unknown[]): Promise<StructureRecord[]> {
    if (documents.length === 0) return [];
    return this.insertAll(structureName, documents.map(document => ({ document })), true);
  }

  async update(structureName: string, id: number, patch: unknown): Promise<StructureRecord> {
    return this.deps.lock.withShared(structureName, async () => {
      const definition = this.deps.registry.get(structureName);
      if (!isPlainObject(patch)) {
        throw new ValidationError([{ field: '', rule: 'type', message: 'patch must be an object' }]);
      }
      const violations: Violation[] = [];
      if (Object.hasOwn(patch, 'id') && patch.id !== id) {
        violations.push({ field: 'id', rule: 'immutable', message: 'id cannot be changed' });
      }
      const parentChange = Object.hasOwn(patch, 'parent_id');
      const requestedParent = patch.parent_id;
      if (parentChange && requestedParent !== null && !isRecordId(requestedParent)) {
        violations.push({ field: 'parent_id', rule: 'type', message: 'parent_id must be a positive integer or null' });
      }
      if (violations.length > 0) throw new ValidationError(violations, { structure: structureName });

      return this.deps.store.transaction(async tx => {
        const existing = await tx.findRow(definition.tableName, id, { forUpdate: true });
        if (!existing) throw new NotFoundError(`${structureName} record`, id);

        const merged: Record<string, unknown> = { ...this.parseDocument(existing) };
        for (const [key, value] of Object.entries(patch)) {
          if (key === 'id' || key === 'parent_id') continue;
          if (value === null) delete merged[key];
          else Object.defineProperty(merged, key, { value, enumerable: true, writable: true, configurable: true });
        }
        const normalized = this.deps.validator.validate(definition, merged);

        let parentId = existing.parentId;
        if (parentChange) {
          parentId = isRecordId(requestedParent) ? requestedParent : null;
          if (parentId !== null && parentId !== existing.parentId) {
            await this.checkParent(tx, definition, id, parentId);
          }
        }

        const row = await tx.updateRow(definition.tableName, id, {
          parentId,
          document: canonicalJson(normalized),
          cells: project(definition.fields, normalized),
        });
        const record = this.toRecord(row);
        tx.afterCommit(() => this.publish(structureName, 'updated', record));
        return record;
      });
    });
  }

  /**
   * 删除记录及其全部后代
   * 物理删除从最深层开始；事件按后序（子先于父，兄弟按 id 升序）发布
   * @returns 按事件顺序排列的被删除 id
   */
  async delete(structureName: string, id: number): Promise<number[]> {
    return this.deps.lock.withShared(structureName, async () => {
      const definition = this.deps.registry.get(structureName);
      const table = definition.tableName;

      return this.deps.store.transaction(async tx => {
        const root = await tx.findRow(table, id, { forUpdate: true });
        if (!root) throw new NotFoundError(`${structureName} record`, id);

        const layers: number[][] = [[id]];
        const childrenOf = new Map<number, number[]>();
        const seen = new Set<number>([id]);
        let frontier = [id];
        while (frontier.length > 0) {
          const children = (await tx.findChildIds(table, frontier)).filter(c => !seen.has(c.id));
          if (children.length === 0) break;
          for (const child of children) {
            seen.add(child.id);
            const list = childrenOf.get(child.parentId) ?? [];
            list.push(child.id);
            childrenOf.set(child.parentId, list);
          }
          frontier = children.map(c => c.id);
          layers.push(frontier);
        }

        const rows = new Map((await tx.findRows(table, [...seen])).map(r => [r.id, r]));
        for (const layer of [...layers].reverse()) {
          await tx.deleteRows(table, layer);
        }

        // 后序：子树（按 id 升序）先于节点本身
        const order: number[] = [];
        const stack: Array<{ node: number; expanded: boolean }> = [{ node: id, expanded: false }];
        while (stack.length > 0) {
          const top = stack.pop();
          if (!top) break;
          if (top.expanded) {
            order.push(top.node);
            continue;
          }
          stack.push({ node: top.node, expanded: true });
          const children = [...(childrenOf.get(top.node) ?? [])].sort((a, b) => b - a);
          for (const child of children) stack.push({ node: child, expanded: false });
        }

        const records = order.map(rid => {
          const row = rows.get(rid);
          if (!row) throw new DataIntegrityError(`Record ${rid} of '${structureName}' vanished during delete`);
          return this.toRecord(row);
        });
        tx.afterCommit(() => {
          for (const record of records) this.publish(structureName, 'deleted', record);
          if (order.length > 1) {
            log.info({ structure: structureName, root: id, removed: order.length }, 'Cascade delete');
          }
        });
        return order;
      });
    });
  }

  /** SchemaRegistry.drop 的数据清理：删除整张物理表 */
  async dropStructureData(tx: StoreTransaction, definition: StructureDefinition): Promise<void> {
    await tx.dropTable(definition.tableName);
    log.info({ structure: definition.name, table: definition.tableName }, 'Structure data dropped');
  }

  // ============================================
  // 读操作
  // ============================================

  async get(structureName: string, id: number): Promise<StructureRecord> {
    return this.deps.lock.withShared(structureName, async () => {
      const definition = this.deps.registry.get(structureName);
      const row = await this.deps.store.transaction(tx => tx.findRow(definition.tableName, id));
      if (!row) throw new NotFoundError(`${structureName} record`, id);
      return this.toRecord(row);
    });
  }

  async list(structureName: string, query: ListQuery = {}): Promise<StructureRecord[]> {
    return this.deps.lock.withShared(structureName, async () => {
      const definition = this.deps.registry.get(structureName);
      const { limit, offset } = this.resolvePagination(query.limit, query.offset, this.deps.config.maxPageSize);
      const resolved = this.resolveQuery(definition, query);
      return this.fetchPage(definition, resolved, limit, offset);
    });
  }

  async count(structureName: string, filter: FilterCondition[] = []): Promise<number> {
    return this.deps.lock.withShared(structureName, async () => {
      const definition = this.deps.registry.get(structureName);
      const filters = this.resolveFilters(definition, filter);
      return this.deps.store.transaction(tx => tx.countRows(definition.tableName, filters));
    });
  }

  /** 直接子记录，按 id 升序 */
  async children(structureName: string, id: number): Promise<StructureRecord[]> {
    return this.deps.lock.withShared(structureName, async () => {
      const definition = this.deps.registry.get(structureName);
      return this.deps.store.transaction(async tx => {
        if (!(await tx.findRow(definition.tableName, id))) throw new NotFoundError(`${structureName} record`, id);
        const ids = (await tx.findChildIds(definition.tableName, [id])).map(c => c.id);
        if (ids.length === 0) return [];
        return (await tx.findRows(definition.tableName, ids)).map(r => this.toRecord(r));
      });
    });
  }

  /**
   * 按页惰性读取；每页独立加锁，页之间不持有锁或连接
   * query.limit 为总条数上限（可超过 maxPageSize）
   */
  async *stream(structureName: string, query: ListQuery = {}): AsyncGenerator<StructureRecord, void, undefined> {
    const pageSize = this.deps.config.streamPageSize;
    const { limit, offset: start } = this.resolvePagination(query.limit ?? Number.MAX_SAFE_INTEGER, query.offset, Number.MAX_SAFE_INTEGER);
    let offset = start;
    let remaining = limit;

    while (remaining > 0) {
      const size = Math.min(pageSize, remaining);
      const page = await this.deps.lock.withShared(structureName, async () => {
        const definition = this.deps.registry.get(structureName);
        return this.fetchPage(definition, this.resolveQuery(definition, query), size, offset);
      });
      for (const record of page) yield record;
      if (page.length < size) return;
      offset += page.length;
      remaining -= page.length;
    }
  }

  async fieldStats(structureName: string, field: string): Promise<FieldStats> {
    return this.deps.lock.withShared(structureName, async () => {
      const definition = this.deps.registry.get(structureName);
      const projected = findProjectedField(definition.fields, field);
      if (!projected) {
        throw new UnfilterableFieldError(structureName, field, definition.fields.properties.has(field)
          ? 'only root scalar fields have statistics'
          : 'unknown field');
      }
      const numeric = projected.spec.type === 'number' || projected.spec.type === 'integer';
      const agg = await this.deps.store.transaction(tx => tx.aggregateColumn(definition.tableName, projected.column, numeric));
      const asField = (value: CellValue): CellValue =>
        projected.spec.type === 'boolean' && typeof value === 'number' ? value !== 0 : value;
      return {
        field,
        totalCount: agg.totalCount,
        nonNullCount: agg.nonNullCount,
        nullCount: agg.totalCount - agg.nonNullCount,
        min: asField(agg.min),
        max: asField(agg.max),
        avg: agg.avg,
      };
    });
  }

  // ============================================
  // 内部
  // ============================================

  private async insertAll(
    structureName: string,
    inputs: Array<{ document: unknown; parentId?: number | null }>,
    indexed: boolean,
  ): Promise<StructureRecord[]> {
    return this.deps.lock.withShared(structureName, async () => {
      const definition = this.deps.registry.get(structureName);
      const violations: Violation[] = [];
      const prepared: Array<{ document: JsonObject; parentId: number | null }> = [];

      inputs.forEach((input, i) => {
        const prefix = (field: string) => (indexed ? (field ? `[${i}].${field}` : `[${i}]`) : field);
        const result = this.prepareCreate(definition, input.document, input.parentId);
        violations.push(...result.violations.map(v => ({ ...v, field: prefix(v.field) })));
        if (result.document) prepared.push({ document: result.document, parentId: result.parentId });
      });
      if (violations.length > 0) throw new ValidationError(violations, { structure: structureName });

      return this.deps.store.transaction(async tx => {
        const records: StructureRecord[] = [];
        for (const [i, item] of prepared.entries()) {
          if (item.parentId !== null && !(await tx.findRow(definition.tableName, item.parentId, { forUpdate: true }))) {
            const field = indexed ? `[${i}].parent_id` : 'parent_id';
            throw new ValidationError([{ field, rule: 'parent', message: `parent record ${item.parentId} does not exist` }]);
          }
          const row = await tx.insertRow(definition.tableName, {
            parentId: item.parentId,
            document: canonicalJson(item.document),
            cells: project(definition.fields, item.document),
          });
          records.push(this.toRecord(row));
        }
        tx.afterCommit(() => {
          for (const record of records) this.publish(structureName, 'created', record);
        });
        return records;
      });
    });
  }

  /** 拆出 parent_id、拒绝 id，再校验文档主体 */
  private prepareCreate(
    definition: StructureDefinition,
    input: unknown,
    explicitParent: number | null | undefined,
  ): { document?: JsonObject; parentId: number | null; violations: Violation[] } {
    if (!isPlainObject(input)) {
      return { parentId: null, violations: [{ field: '', rule: 'type', message: 'document must be an object' }] };
    }
    const violations: Violation[] = [];
    const body: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(input)) {
      if (key === 'id' || key === 'parent_id') continue;
      Object.defineProperty(body, key, { value, enumerable: true, writable: true, configurable: true });
    }
    if (Object.hasOwn(input, 'id')) {
      violations.push({ field: 'id', rule: 'immutable', message: 'id is assigned by the store' });
    }

    let parentId: number | null = explicitParent ?? null;
    if (Object.hasOwn(input, 'parent_id')) {
      const inline = input.parent_id;
      const link = isRecordId(inline) ? inline : null;
      if (inline !== null && link === null) {
        violations.push({ field: 'parent_id', rule: 'type', message: 'parent_id must be a positive integer or null' });
      } else if (explicitParent !== undefined && link !== explicitParent) {
        violations.push({ field: 'parent_id', rule: 'parent', message: 'parent_id conflicts with the parentId option' });
      } else {
        parentId = link;
      }
    } else if (explicitParent !== undefined && explicitParent !== null && !isRecordId(explicitParent)) {
      violations.push({ field: 'parent_id', rule: 'type', message: 'parent_id must be a positive integer or null' });
    }

    const result = this.deps.validator.check(definition.fields, body);
    violations.push(...result.violations);
    return { document: result.document, parentId, violations };
  }

  /** 新父记录必须存在，且不能是自身或自身的后代 */
  private async checkParent(tx: StoreTransaction, definition: StructureDefinition, id: number, parentId: number): Promise<void> {
    const cycle = () => new ValidationError([{ field: 'parent_id', rule: 'cycle', message: `record ${parentId} is ${id} or one of its descendants` }]);
    if (parentId === id) throw cycle();

    let current = await tx.findRow(definition.tableName, parentId, { forUpdate: true });
    if (!current) {
      throw new ValidationError([{ field: 'parent_id', rule: 'parent', message: `parent record ${parentId} does not exist` }]);
    }
    const visited = new Set<number>([parentId]);
    while (current && current.parentId !== null) {
      if (current.parentId === id) throw cycle();
      if (visited.has(current.parentId)) break;
      visited.add(current.parentId);
      current = await tx.findRow(definition.tableName, current.parentId);
    }
  }

  private resolvePagination(limit: unknown, offset: unknown, maxLimit: number): { limit: number; offset: number } {
    const violations: Violation[] = [];
    const resolvedLimit = limit ?? this.deps.config.defaultPageSize;
    const resolvedOffset = offset ?? 0;
    if (typeof resolvedLimit !== 'number' || !Number.isInteger(resolvedLimit) || resolvedLimit < 1 || resolvedLimit > maxLimit) {
      violations.push({ field: 'limit', rule: 'pagination', message: `limit must be an integer between 1 and ${maxLimit}` });
    }
    if (typeof resolvedOffset !== 'number' || !Number.isInteger(resolvedOffset) || resolvedOffset < 0) {
      violations.push({ field: 'offset', rule: 'pagination', message: 'offset must be a non-negative integer' });
    }
    if (violations.length > 0 || typeof resolvedLimit !== 'number' || typeof resolvedOffset !== 'number') {
      throw new ValidationError(violations);
    }
    return { limit: resolvedLimit, offset: resolvedOffset };
  }

  private resolveQuery(definition: StructureDefinition, query: ListQuery): ResolvedQuery {
    const sortField = query.sortField ?? 'id';
    const sortOrder: unknown = query.sortOrder ?? 'asc';
    if (sortOrder !== 'asc' && sortOrder !== 'desc') {
      throw new ValidationError([{ field: 'sortOrder', rule: 'sort', message: "sortOrder must be 'asc' or 'desc'" }]);
    }
    const sort = Object.hasOwn(SORT_ONLY_COLUMNS, sortField)
      ? SORT_ONLY_COLUMNS[sortField]
      : this.resolveColumn(definition, sortField);
    return {
      filters: this.resolveFilters(definition, query.filter ?? []),
      sortColumn: sort.column,
      sortOrder,
    };
  }

  private resolveColumn(definition: StructureDefinition, field: string): ResolvedColumn {
    if (Object.hasOwn(SYSTEM_COLUMNS, field)) return SYSTEM_COLUMNS[field];
    const projected = findProjectedField(definition.fields, field);
    if (projected) return { column: projected.column, kind: projected.spec.type };
    const reason = definition.fields.properties.has(field)
      ? 'field is not a scalar with a projected column'
      : field.includes('.') || field.includes('[')
        ? 'nested fields have no projected column'
        : 'unknown field';
    throw new UnfilterableFieldError(definition.name, field, reason);
  }

  private resolveFilters(definition: StructureDefinition, conditions: FilterCondition[]): RowFilter[] {
    const violations: Violation[] = [];
    const filters: RowFilter[] = [];

    for (const condition of conditions) {
      const { column, kind } = this.resolveColumn(definition, condition.field);
      const operator: unknown = condition.operator;
      const field = condition.field;
      if (!isFilterOperator(operator)) {
        violations.push({ field, rule: 'filter', message: `unknown operator '${String(operator)}'` });
        continue;
      }
      if (operator === 'isNull' || operator === 'notNull') {
        filters.push({ column, operator, value: null });
        continue;
      }
      if (operator === 'contains') {
        if (kind !== 'string' || typeof condition.value !== 'string') {
          violations.push({ field, rule: 'filter', message: 'contains needs a string field and a string value' });
        } else {
          filters.push({ column, operator, value: condition.value });
        }
        continue;
      }
      if (operator === 'in') {
        const values = condition.value;
        if (!Array.isArray(values)) {
          violations.push({ field, rule: 'filter', message: 'in needs an array value' });
          continue;
        }
        const cells: CellValue[] = [];
        for (const v of values) {
          if (this.matchesKind(kind, v)) cells.push(v);
        }
        if (cells.length !== values.length) {
          violations.push({ field, rule: 'filter', message: `in values must all be of type ${kind}` });
          continue;
        }
        filters.push({ column, operator, value: cells });
        continue;
      }
      const value = condition.value;
      if (!this.matchesKind(kind, value)) {
        violations.push({ field, rule: 'filter', message: `${operator} value must be of type ${kind}` });
        continue;
      }
      filters.push({ column, operator, value });
    }

    if (violations.length > 0) throw new ValidationError(violations, { structure: definition.name });
    return filters;
  }

  private matchesKind(kind: ColumnKind, value: unknown): value is string | number | boolean {
    switch (kind) {
      case 'string': return typeof value === 'string';
      case 'number': return typeof value === 'number' && Number.isFinite(value);
      case 'integer': return typeof value === 'number' && Number.isInteger(value);
      case 'boolean': return typeof value === 'boolean';
      case 'timestamp': return false;
    }
  }

  private async fetchPage(definition: StructureDefinition, query: ResolvedQuery, limit: number, offset: number): Promise<StructureRecord[]> {
    const rows = await this.deps.store.transaction(tx => tx.selectRows(definition.tableName, { ...query, limit, offset }));
    return rows.map(r => this.toRecord(r));
  }

  private parseDocument(row: PhysicalRow): JsonObject {
    const document = toJsonObject(JSON.parse(row.document));
    if (!document) throw new DataIntegrityError(`Stored document of record ${row.id} is not an object`);
    return document;
  }

  private toRecord(row: PhysicalRow): StructureRecord {
    return {
      id: row.id,
      parentId: row.parentId,
      document: this.parseDocument(row),
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  private publish(structureName: string, kind: ChangeKind, record: StructureRecord): void {
    this.deps.notifier.publish({
      structureName,
      kind,
      recordId: record.id,
      payload: flattenRecord(record),
      timestamp: this.now(),
    });
  }
}

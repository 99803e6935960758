/**
 * TableSynchronizer 单元测试
 *
 * 覆盖：新建表规划、加列 / 拓宽 / 补索引 / deprecated / restored、
 * 不兼容变更在执行 DDL 之前整体拒绝、vacuum
 */
import { describe, it, expect, beforeEach } from 'vitest';
import type { ObjectFieldSpec } from '../../../shared/structureTypes';
import { IncompatibleMigrationError } from '../../core/errors';
import { MemoryPhysicalStore } from '../../storage/memory/memoryStore';
import type { PhysicalColumn } from '../../storage/physicalStore';
import { parseSchema } from '../schemaParser';
import { TableSynchronizer, isNoopPlan } from '../tableSynchronizer';

function fieldsOf(properties: Record<string, unknown>): ObjectFieldSpec {
  return parseSchema({ type: 'object', properties }, { maxDepth: 4 }).fields;
}

const sync = new TableSynchronizer();

describe('TableSynchronizer.plan', () => {
  it('表不存在时规划建表', () => {
    const plan = sync.plan('menu', 'st_menu', fieldsOf({
      label: { type: 'string', maxLength: 40, index: true },
      price: { type: 'number' },
      tags: { type: 'array', items: { type: 'string' } },
    }), null, []);

    expect(plan.create).toBe(true);
    expect(plan.columns.map(c => c.name)).toEqual(['f_label', 'f_price']);
    expect(plan.summary).toEqual({
      added: ['f_label', 'f_price'],
      widened: [],
      deprecated: [],
      restored: [],
      dropped: [],
      indexed: ['f_label'],
    });
  });

  it('加列、拓宽、补索引与 deprecated', () => {
    const existing: PhysicalColumn[] = [
      { name: 'f_label', type: { kind: 'varchar', length: 40 }, indexed: false },
      { name: 'f_qty', type: { kind: 'bigint' }, indexed: true },
      { name: 'f_old', type: { kind: 'text' }, indexed: false },
    ];
    const plan = sync.plan('menu', 'st_menu', fieldsOf({
      label: { type: 'string', maxLength: 80, index: true },
      qty: { type: 'number' },
      note: { type: 'string' },
    }), existing, []);

    expect(plan.create).toBe(false);
    expect(plan.add).toEqual([{ name: 'f_note', type: { kind: 'text' }, indexed: false }]);
    expect(plan.widen).toEqual([
      { name: 'f_label', type: { kind: 'varchar', length: 80 }, indexed: false },
      { name: 'f_qty', type: { kind: 'double' }, indexed: true },
    ]);
    expect(plan.index).toEqual([{ name: 'f_label', type: { kind: 'varchar', length: 80 }, indexed: true }]);
    expect(plan.deprecatedColumns).toEqual(['f_old']);
    expect(plan.summary).toEqual({
      added: ['f_note'],
      widened: ['f_label', 'f_qty'],
      deprecated: ['f_old'],
      restored: [],
      dropped: [],
      indexed: ['f_label'],
    });
  });

  it('更短的 varchar 沿用现有列', () => {
    const plan = sync.plan('menu', 'st_menu', fieldsOf({ label: { type: 'string', maxLength: 10 } }), [
      { name: 'f_label', type: { kind: 'varchar', length: 40 }, indexed: false },
    ], []);
    expect(isNoopPlan(plan)).toBe(true);
  });

  it('text 列的字段加上 maxLength 时沿用现有列', () => {
    const plan = sync.plan('menu', 'st_menu', fieldsOf({ label: { type: 'string', maxLength: 40 } }), [
      { name: 'f_label', type: { kind: 'text' }, indexed: false },
    ], []);
    expect(isNoopPlan(plan)).toBe(true);
    expect(plan.summary.widened).toEqual([]);
  });

  it('重新出现的 deprecated 列记为 restored', () => {
    const plan = sync.plan('menu', 'st_menu', fieldsOf({ old: { type: 'string' } }), [
      { name: 'f_old', type: { kind: 'text' }, indexed: false },
      { name: 'f_gone', type: { kind: 'double' }, indexed: false },
    ], ['f_old', 'f_gone']);
    expect(plan.summary.restored).toEqual(['f_old']);
    expect(plan.deprecatedColumns).toEqual(['f_gone']);
    expect(plan.summary.deprecated).toEqual([]);
  });

  it('不兼容变更一次性列出全部冲突', () => {
    let caught: unknown;
    try {
      sync.plan('menu', 'st_menu', fieldsOf({
        price: { type: 'integer' },
        label: { type: 'boolean' },
        extra: { type: 'string' },
      }), [
        { name: 'f_price', type: { kind: 'double' }, indexed: false },
        { name: 'f_label', type: null, indexed: false },
      ], []);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(IncompatibleMigrationError);
    if (caught instanceof IncompatibleMigrationError) {
      expect(caught.conflicts).toEqual([
        { field: 'price', column: 'f_price', from: 'double', to: 'bigint' },
        { field: 'label', column: 'f_label', from: 'unknown', to: 'boolean' },
      ]);
    }
  });
});

describe('TableSynchronizer 执行', () => {
  let store: MemoryPhysicalStore;

  beforeEach(async () => {
    store = new MemoryPhysicalStore();
    await store.transaction(async tx => {
      await sync.synchronize(tx, 'menu', 'st_menu', fieldsOf({
        label: { type: 'string', maxLength: 20 },
        active: { type: 'boolean' },
        legacy: { type: 'string' },
      }), []);
    });
  });

  it('synchronize 把规划落到物理表', async () => {
    const plan = await store.transaction(tx => sync.synchronize(tx, 'menu', 'st_menu', fieldsOf({
      label: { type: 'string', maxLength: 20, index: true },
      active: { type: 'integer' },
      note: { type: 'number' },
    }), []));

    expect(plan.summary.deprecated).toEqual(['f_legacy']);
    const columns = await store.transaction(tx => tx.describeTable('st_menu'));
    expect(columns).toEqual([
      { name: 'f_label', type: { kind: 'varchar', length: 20 }, indexed: true },
      { name: 'f_active', type: { kind: 'bigint' }, indexed: false },
      { name: 'f_legacy', type: { kind: 'text' }, indexed: false },
      { name: 'f_note', type: { kind: 'double' }, indexed: false },
    ]);
  });

  it('restored 列与新增列按 document 回填', async () => {
    await store.transaction(async tx => {
      await tx.insertRow('st_menu', { parentId: null, document: '{"label":"a","note":3}', cells: { f_label: 'a', f_legacy: 'stale' } });
      await tx.insertRow('st_menu', { parentId: null, document: '{"label":"b","legacy":"kept"}', cells: { f_label: 'b' } });
    });

    const plan = await store.transaction(tx => sync.synchronize(tx, 'menu', 'st_menu', fieldsOf({
      label: { type: 'string', maxLength: 20 },
      active: { type: 'boolean' },
      legacy: { type: 'string' },
      note: { type: 'number' },
    }), ['f_legacy']));
    expect(plan.summary.restored).toEqual(['f_legacy']);
    expect(plan.summary.added).toEqual(['f_note']);

    const idsWhere = (column: string, value: string | number) => store.transaction(async tx => (await tx.selectRows('st_menu', {
      filters: [{ column, operator: 'eq', value }], sortColumn: 'id', sortOrder: 'asc', limit: 10, offset: 0,
    })).map(r => r.id));
    expect(await idsWhere('f_legacy', 'stale')).toEqual([]);
    expect(await idsWhere('f_legacy', 'kept')).toEqual([2]);
    expect(await idsWhere('f_note', 3)).toEqual([1]);
  });

  it('冲突时不执行任何 DDL', async () => {
    await expect(store.transaction(tx => sync.synchronize(tx, 'menu', 'st_menu', fieldsOf({
      label: { type: 'string', maxLength: 20 },
      active: { type: 'string' },
      fresh: { type: 'number' },
    }), []))).rejects.toThrow(IncompatibleMigrationError);

    const columns = await store.transaction(tx => tx.describeTable('st_menu'));
    expect(columns?.map(c => c.name)).toEqual(['f_label', 'f_active', 'f_legacy']);
  });

  it('vacuum 只删除仍存在的列', async () => {
    const dropped = await store.transaction(tx => sync.vacuum(tx, 'st_menu', ['f_legacy', 'f_missing']));
    expect(dropped).toEqual(['f_legacy']);
    const columns = await store.transaction(tx => tx.describeTable('st_menu'));
    expect(columns?.map(c => c.name)).toEqual(['f_label', 'f_active']);
  });

  it('表不存在时 vacuum 返回空', async () => {
    expect(await store.transaction(tx => sync.vacuum(tx, 'st_none', ['f_x']))).toEqual([]);
  });
});

/**
 * RecordStore 测试（内存存储）
 *
 * 覆盖范围：
 * - create / createMany / update / delete（含级联与事件顺序）
 * - 父子关系：不存在的父记录、环检测
 * - list / count / stream 的过滤、排序、分页
 * - 不可过滤字段与类型不符的过滤值
 * - fieldStats
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { ChangeEvent, FlatRecord } from '../../../shared/structureTypes';
import { NotFoundError, UnfilterableFieldError, ValidationError } from '../../core/errors';
import { MemoryPhysicalStore } from '../../storage/memory/memoryStore';
import type { Subscription } from '../changeNotifier';
import { StructureEngine, createStructureEngine } from '../engine';

const ITEM_SCHEMA = {
  type: 'object',
  properties: {
    label: { type: 'string', maxLength: 40, index: true },
    price: { type: 'number', minimum: 0 },
    active: { type: 'boolean', default: true },
    tags: { type: 'array', items: { type: 'string' } },
    meta: { type: 'object', properties: { color: { type: 'string' } } },
  },
  required: ['label'],
};

function violationsOf(err: unknown): Array<[string, string]> {
  if (!(err instanceof ValidationError)) throw err;
  return err.violations.map(v => [v.field, v.rule]);
}

async function caught(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('expected rejection');
}

/** 读出订阅中已缓冲的事件 */
async function bufferedEvents(sub: Subscription, count: number): Promise<ChangeEvent[]> {
  const iterator = sub[Symbol.asyncIterator]();
  const events: ChangeEvent[] = [];
  for (let i = 0; i < count; i++) {
    const next = await iterator.next();
    if (next.done) break;
    events.push(next.value);
  }
  return events;
}

describe('RecordStore', () => {
  let engine: StructureEngine;

  beforeEach(async () => {
    engine = await createStructureEngine({ storage: 'memory', store: new MemoryPhysicalStore(), maxPageSize: 50, defaultPageSize: 10, streamPageSize: 2 });
    await engine.registry.define('items', ITEM_SCHEMA);
  });

  afterEach(async () => {
    await engine.shutdown();
  });

  describe('create', () => {
    it('分配递增 id 并返回规范化文档', async () => {
      const first = await engine.records.create('items', { label: 'Tea', price: 2 });
      const second = await engine.records.create('items', { label: 'Cake' });
      expect(first.id).toBe(1);
      expect(second.id).toBe(2);
      expect(first.parentId).toBeNull();
      expect(first.document).toEqual({ label: 'Tea', price: 2, active: true });
    });

    it('校验失败时抛出 ValidationError 且不写入', async () => {
      const err = await caught(engine.records.create('items', { price: -1 }));
      expect(violationsOf(err)).toEqual([['label', 'required'], ['price', 'minimum']]);
      expect(await engine.records.count('items')).toBe(0);
    });

    it('拒绝调用方提供的 id', async () => {
      const err = await caught(engine.records.create('items', { id: 9, label: 'Tea' }));
      expect(violationsOf(err)).toEqual([['id', 'immutable']]);
    });

    it('支持 parentId 选项与内联 parent_id', async () => {
      const root = await engine.records.create('items', { label: 'Root' });
      const viaOption = await engine.records.create('items', { label: 'A' }, { parentId: root.id });
      const inline = await engine.records.create('items', { label: 'B', parent_id: root.id });
      expect(viaOption.parentId).toBe(root.id);
      expect(inline.parentId).toBe(root.id);
      expect(inline.document).toEqual({ label: 'B', active: true });
    });

    it('父记录不存在时报告 parent 规则', async () => {
      const err = await caught(engine.records.create('items', { label: 'Orphan' }, { parentId: 42 }));
      expect(violationsOf(err)).toEqual([['parent_id', 'parent']]);
    });

    it('未定义的结构抛出 NotFoundError', async () => {
      await expect(engine.records.create('ghost', { label: 'x' })).rejects.toThrow(NotFoundError);
    });
  });

  describe('createMany', () => {
    it('全部通过时在一个事务内插入', async () => {
      const records = await engine.records.createMany('items', [{ label: 'A' }, { label: 'B' }, { label: 'C' }]);
      expect(records.map(r => r.id)).toEqual([1, 2, 3]);
    });

    it('任何一条违规都不写入，违规带下标', async () => {
      const err = await caught(engine.records.createMany('items', [{ label: 'A' }, { price: 'x' }, 'nope']));
      expect(violationsOf(err)).toEqual([
        ['[1].label', 'required'],
        ['[1].price', 'type'],
        ['[2]', 'type'],
      ]);
      expect(await engine.records.count('items')).toBe(0);
    });

    it('空列表直接返回', async () => {
      expect(await engine.records.createMany('items', [])).toEqual([]);
    });
  });

  describe('update', () => {
    it('顶层合并，null 删除字段', async () => {
      const created = await engine.records.create('items', { label: 'Tea', price: 2, tags: ['hot'] });
      const updated = await engine.records.update('items', created.id, { price: 3, tags: null });
      expect(updated.document).toEqual({ label: 'Tea', price: 3, active: true });
      expect(updated.id).toBe(created.id);
    });

    it('合并后的文档重新校验', async () => {
      const created = await engine.records.create('items', { label: 'Tea' });
      const err = await caught(engine.records.update('items', created.id, { label: null }));
      expect(violationsOf(err)).toEqual([['label', 'required']]);
    });

    it('修改父记录时检测环', async () => {
      const a = await engine.records.create('items', { label: 'A' });
      const b = await engine.records.create('items', { label: 'B' }, { parentId: a.id });
      const c = await engine.records.create('items', { label: 'C' }, { parentId: b.id });

      expect(violationsOf(await caught(engine.records.update('items', a.id, { parent_id: c.id })))).toEqual([['parent_id', 'cycle']]);
      expect(violationsOf(await caught(engine.records.update('items', a.id, { parent_id: a.id })))).toEqual([['parent_id', 'cycle']]);

      const moved = await engine.records.update('items', c.id, { parent_id: null });
      expect(moved.parentId).toBeNull();
    });

    it('不存在的记录抛出 NotFoundError', async () => {
      await expect(engine.records.update('items', 99, { label: 'x' })).rejects.toThrow("items record '99' not found");
    });
  });

  describe('delete', () => {
    it('级联删除并按子先于父发布事件', async () => {
      const root = await engine.records.create('items', { label: 'root' });
      const b = await engine.records.create('items', { label: 'b' }, { parentId: root.id });
      const a = await engine.records.create('items', { label: 'a' }, { parentId: root.id });
      const leaf = await engine.records.create('items', { label: 'leaf' }, { parentId: b.id });
      const sub = engine.subscribe('items');

      const removed = await engine.records.delete('items', root.id);
      expect(removed).toEqual([leaf.id, b.id, a.id, root.id]);
      expect(await engine.records.count('items')).toBe(0);

      const events = await bufferedEvents(sub, 4);
      expect(events.map(e => [e.kind, e.recordId])).toEqual([
        ['deleted', leaf.id],
        ['deleted', b.id],
        ['deleted', a.id],
        ['deleted', root.id],
      ]);
      const payload: FlatRecord = events[3].payload;
      expect(payload).toEqual({ id: root.id, parent_id: null, label: 'root', active: true });
    });

    it('深层链式层级也能级联删除', async () => {
      const depth = 12000;
      await engine.registry.define('chain', { type: 'object', properties: { n: { type: 'integer' } } });
      await engine.records.createMany('chain', Array.from({ length: depth }, (_, i) => (i === 0 ? { n: 1 } : { n: i + 1, parent_id: i })));

      const removed = await engine.records.delete('chain', 1);
      expect(removed).toHaveLength(depth);
      expect(removed[0]).toBe(depth);
      expect(removed[depth - 1]).toBe(1);
      expect(await engine.records.count('chain')).toBe(0);
    }, 60_000);

    it('只删除目标子树', async () => {
      const root = await engine.records.create('items', { label: 'root' });
      const keep = await engine.records.create('items', { label: 'keep' }, { parentId: root.id });
      const drop = await engine.records.create('items', { label: 'drop' }, { parentId: root.id });
      await engine.records.create('items', { label: 'drop-child' }, { parentId: drop.id });

      expect(await engine.records.delete('items', drop.id)).toEqual([4, drop.id]);
      expect((await engine.records.children('items', root.id)).map(r => r.id)).toEqual([keep.id]);
    });

    it('不存在的记录抛出 NotFoundError', async () => {
      await expect(engine.records.delete('items', 7)).rejects.toThrow(NotFoundError);
    });
  });

  describe('投影列与 document 一致', () => {
    it('字段下线期间的写入在重新上线后反映到过滤结果', async () => {
      const withTag = {
        type: 'object',
        properties: { label: { type: 'string' }, tag: { type: 'string' } },
        additionalProperties: true,
      };
      await engine.registry.define('tagged', withTag);
      const first = await engine.records.create('tagged', { label: 'a', tag: 'x' });

      await engine.registry.update('tagged', {
        type: 'object',
        properties: { label: { type: 'string' } },
        additionalProperties: true,
      });
      await engine.records.update('tagged', first.id, { tag: null, label: 'b' });
      const second = await engine.records.create('tagged', { label: 'c', tag: 'y' });

      await engine.registry.update('tagged', withTag);
      expect(await engine.records.list('tagged', { filter: [{ field: 'tag', operator: 'eq', value: 'x' }] })).toEqual([]);
      const tagged = await engine.records.list('tagged', { filter: [{ field: 'tag', operator: 'eq', value: 'y' }] });
      expect(tagged.map(r => r.id)).toEqual([second.id]);
      expect(tagged[0].document).toEqual({ label: 'c', tag: 'y' });
    });
  });

  describe('查询', () => {
    beforeEach(async () => {
      await engine.records.createMany('items', [
        { label: 'Tea', price: 3, active: true },
        { label: 'Cake', price: 5, active: false },
        { label: 'Water', active: true },
        { label: 'Coffee', price: 4, active: true, meta: { color: 'brown' } },
      ]);
    });

    it('按布尔字段等值过滤', async () => {
      const records = await engine.records.list('items', { filter: [{ field: 'active', operator: 'eq', value: false }] });
      expect(records.map(r => r.document.label)).toEqual(['Cake']);
    });

    it('排序与分页，NULL 升序在前', async () => {
      const asc = await engine.records.list('items', { sortField: 'price' });
      expect(asc.map(r => r.id)).toEqual([3, 1, 4, 2]);
      const page = await engine.records.list('items', { sortField: 'price', sortOrder: 'desc', limit: 2, offset: 1 });
      expect(page.map(r => r.id)).toEqual([4, 1]);
    });

    it('支持 contains / in / gte 组合', async () => {
      const records = await engine.records.list('items', {
        filter: [
          { field: 'label', operator: 'contains', value: 'C' },
          { field: 'price', operator: 'gte', value: 4 },
        ],
      });
      expect(records.map(r => r.id)).toEqual([2, 4]);
      expect(await engine.records.count('items', [{ field: 'id', operator: 'in', value: [1, 3] }])).toBe(2);
    });

    it('嵌套字段不可过滤', async () => {
      const err = await caught(engine.records.list('items', { filter: [{ field: 'meta.color', operator: 'eq', value: 'brown' }] }));
      expect(err).toBeInstanceOf(UnfilterableFieldError);
      expect(err instanceof Error ? err.message : '').toBe(
        "Field 'meta.color' of 'items' cannot be filtered or sorted: nested fields have no projected column",
      );
    });

    it('数组字段与未知字段不可排序', async () => {
      await expect(engine.records.list('items', { sortField: 'tags' })).rejects.toThrow(UnfilterableFieldError);
      await expect(engine.records.list('items', { sortField: 'nope' })).rejects.toThrow(UnfilterableFieldError);
    });

    it('类型不符的过滤值报告 filter 规则', async () => {
      const err = await caught(engine.records.count('items', [{ field: 'price', operator: 'lt', value: '4' }]));
      expect(violationsOf(err)).toEqual([['price', 'filter']]);
    });

    it('分页参数越界报告 pagination 规则', async () => {
      const err = await caught(engine.records.list('items', { limit: 51, offset: -1 }));
      expect(violationsOf(err)).toEqual([['limit', 'pagination'], ['offset', 'pagination']]);
    });

    it('可按 created_at 排序', async () => {
      const records = await engine.records.list('items', { sortField: 'created_at', sortOrder: 'desc' });
      expect(records).toHaveLength(4);
    });

    it('stream 逐页读取全部匹配记录', async () => {
      const ids: number[] = [];
      for await (const record of engine.records.stream('items', { filter: [{ field: 'active', operator: 'eq', value: true }] })) {
        ids.push(record.id);
      }
      expect(ids).toEqual([1, 3, 4]);
    });

    it('stream 遵守 limit 与 offset', async () => {
      const ids: number[] = [];
      for await (const record of engine.records.stream('items', { offset: 1, limit: 2 })) {
        ids.push(record.id);
      }
      expect(ids).toEqual([2, 3]);
    });

    it('fieldStats 统计数值字段', async () => {
      expect(await engine.records.fieldStats('items', 'price')).toEqual({
        field: 'price',
        totalCount: 4,
        nonNullCount: 3,
        nullCount: 1,
        min: 3,
        max: 5,
        avg: 4,
      });
    });

    it('fieldStats 把布尔值还原为 boolean', async () => {
      const stats = await engine.records.fieldStats('items', 'active');
      expect(stats.min).toBe(false);
      expect(stats.max).toBe(true);
      expect(stats.avg).toBeNull();
    });

    it('fieldStats 拒绝没有投影列的字段', async () => {
      await expect(engine.records.fieldStats('items', 'tags')).rejects.toThrow(
        "Field 'tags' of 'items' cannot be filtered or sorted: only root scalar fields have statistics",
      );
    });
  });
});

/**
 * StructureEngine 端到端测试（内存存储）
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { ChangeEvent } from '../../../shared/structureTypes';
import { ConcurrencyError, ConfigurationError, NotFoundError, UnfilterableFieldError, ValidationError } from '../../core/errors';
import { MemoryPhysicalStore } from '../../storage/memory/memoryStore';
import { toTransportMessage, type Subscription } from '../changeNotifier';
import { StructureEngine, createStructureEngine } from '../engine';

const MENU_SCHEMA = {
  type: 'object',
  properties: {
    label: { type: 'string', maxLength: 60 },
    url: { type: 'string' },
    active: { type: 'boolean' },
    settings: { type: 'object', properties: { theme: { type: 'string' } } },
    children: { type: 'array', items: { $ref: '#' } },
  },
  required: ['label'],
};

async function take(sub: Subscription, count: number): Promise<ChangeEvent[]> {
  const iterator = sub[Symbol.asyncIterator]();
  const events: ChangeEvent[] = [];
  while (events.length < count) {
    const next = await iterator.next();
    if (next.done) break;
    events.push(next.value);
  }
  return events;
}

describe('StructureEngine', () => {
  let store: MemoryPhysicalStore;
  let engine: StructureEngine;

  beforeEach(async () => {
    store = new MemoryPhysicalStore();
    engine = await createStructureEngine({ storage: 'memory', store });
  });

  afterEach(async () => {
    await engine.shutdown();
  });

  it('define 之后 get 返回原 schema 且版本为 1', async () => {
    await engine.registry.define('menu', MENU_SCHEMA);
    const def = engine.registry.get('menu');
    expect(def.schema).toEqual(MENU_SCHEMA);
    expect(def.version).toBe(1);
  });

  it('新增带默认值的字段后旧记录不变，新记录往返正确', async () => {
    await engine.registry.define('menu', MENU_SCHEMA);
    const old = await engine.records.create('menu', { label: 'Old' });

    const next = structuredClone(MENU_SCHEMA);
    await engine.registry.update('menu', {
      ...next,
      properties: { ...next.properties, weight: { type: 'integer', default: 0 } },
    });

    const fresh = await engine.records.create('menu', { label: 'New', weight: 5 });
    expect((await engine.records.get('menu', fresh.id)).document).toEqual({ label: 'New', weight: 5 });
    expect((await engine.records.get('menu', old.id)).document).toEqual({ label: 'Old' });
  });

  it('缺少必填字段时 ValidationError 指出 label', async () => {
    await engine.registry.define('menu', MENU_SCHEMA);
    const attempt = engine.records.create('menu', {});
    await expect(attempt).rejects.toBeInstanceOf(ValidationError);
    await attempt.catch((err: unknown) => {
      expect(err instanceof ValidationError ? err.violations.map(v => v.field) : []).toEqual(['label']);
    });
  });

  it('删除带两层后代的记录发出三个 deleted 事件，子先于父', async () => {
    await engine.registry.define('menu', MENU_SCHEMA);
    const root = await engine.records.create('menu', { label: 'root' });
    const child = await engine.records.create('menu', { label: 'child' }, { parentId: root.id });
    const grandchild = await engine.records.create('menu', { label: 'grandchild' }, { parentId: child.id });
    const sub = engine.subscribe('menu');

    await engine.records.delete('menu', root.id);

    expect(await engine.records.count('menu')).toBe(0);
    const events = await take(sub, 3);
    expect(events.map(e => [e.kind, e.recordId])).toEqual([
      ['deleted', grandchild.id],
      ['deleted', child.id],
      ['deleted', root.id],
    ]);
    sub.unsubscribe();
  });

  it('按投影列过滤布尔字段，嵌套字段不可过滤', async () => {
    await engine.registry.define('menu', MENU_SCHEMA);
    await engine.records.createMany('menu', [
      { label: 'on', active: true },
      { label: 'off', active: false },
      { label: 'unset' },
    ]);

    const active = await engine.records.list('menu', { filter: [{ field: 'active', operator: 'eq', value: true }] });
    expect(active.map(r => r.document.label)).toEqual(['on']);

    await expect(engine.records.list('menu', {
      filter: [{ field: 'settings.theme', operator: 'eq', value: 'dark' }],
    })).rejects.toBeInstanceOf(UnfilterableFieldError);
  });

  it('两个并发 schema 更新恰好一个成功，表与胜者一致', async () => {
    await engine.registry.define('menu', MENU_SCHEMA);
    const sa = { type: 'object', properties: { label: { type: 'string', maxLength: 60 }, color: { type: 'string' } } };
    const sb = { type: 'object', properties: { label: { type: 'string', maxLength: 60 }, rank: { type: 'integer' } } };

    const [ra, rb] = await Promise.allSettled([
      engine.registry.update('menu', sa),
      engine.registry.update('menu', sb),
    ]);
    expect([ra.status, rb.status].sort()).toEqual(['fulfilled', 'rejected']);
    const loser = ra.status === 'rejected' ? ra : rb;
    if (loser.status === 'rejected') expect(loser.reason).toBeInstanceOf(ConcurrencyError);

    const winnerColumn = ra.status === 'fulfilled' ? 'f_color' : 'f_rank';
    const loserColumn = ra.status === 'fulfilled' ? 'f_rank' : 'f_color';
    const columns = (await store.transaction(tx => tx.describeTable('st_menu')))?.map(c => c.name) ?? [];
    expect(columns).toContain(winnerColumn);
    expect(columns).not.toContain(loserColumn);
    expect(engine.registry.get('menu').version).toBe(2);
  });

  it('菜单场景：创建、级联删除与事件顺序', async () => {
    await engine.registry.define('menu', MENU_SCHEMA);
    const sub = engine.subscribe('menu');

    const home = await engine.records.create('menu', { label: 'Home', url: '/' });
    expect(home.id).toBe(1);
    expect(home.parentId).toBeNull();
    expect(home.document).toEqual({ label: 'Home', url: '/' });

    const child = await engine.records.create('menu', { label: 'Child', url: '/c', parent_id: 1 });
    expect(child.id).toBe(2);
    expect(child.parentId).toBe(1);

    expect(await engine.records.delete('menu', 1)).toEqual([2, 1]);
    await expect(engine.records.get('menu', 2)).rejects.toBeInstanceOf(NotFoundError);

    const events = await take(sub, 4);
    expect(events.map(e => [e.kind, e.recordId])).toEqual([
      ['created', 1],
      ['created', 2],
      ['deleted', 2],
      ['deleted', 1],
    ]);
    expect(toTransportMessage(events[0])).toEqual({
      type: 'created',
      structure: 'menu',
      data: { id: 1, parent_id: null, label: 'Home', url: '/' },
    });
  });

  it('update 发布 updated 事件', async () => {
    await engine.registry.define('menu', MENU_SCHEMA);
    const home = await engine.records.create('menu', { label: 'Home' });
    const sub = engine.subscribe('menu');
    await engine.records.update('menu', home.id, { url: '/home' });

    const [event] = await take(sub, 1);
    expect(event.kind).toBe('updated');
    expect(event.payload).toEqual({ id: home.id, parent_id: null, label: 'Home', url: '/home' });
    sub.unsubscribe();
  });

  it('校验失败的写入不发布事件', async () => {
    await engine.registry.define('menu', MENU_SCHEMA);
    const sub = engine.subscribe('menu');
    await expect(engine.records.create('menu', { label: 7 })).rejects.toBeInstanceOf(ValidationError);
    await engine.records.create('menu', { label: 'ok' });

    const [event] = await take(sub, 1);
    expect(event.recordId).toBe(1);
    sub.unsubscribe();
  });

  it('订阅未定义的结构抛出 NotFoundError', () => {
    expect(() => engine.subscribe('ghost')).toThrow(NotFoundError);
  });

  it('shutdown 结束全部订阅', async () => {
    await engine.registry.define('menu', MENU_SCHEMA);
    const sub = engine.subscribe('menu');
    await engine.shutdown();
    expect(sub.closed).toBe(true);
    engine = await createStructureEngine({ storage: 'memory', store: new MemoryPhysicalStore() });
  });

  it('非法配置抛出 ConfigurationError', async () => {
    await expect(createStructureEngine({ storage: 'memory', store: new MemoryPhysicalStore(), maxDepth: 0 }))
      .rejects.toBeInstanceOf(ConfigurationError);
  });
});

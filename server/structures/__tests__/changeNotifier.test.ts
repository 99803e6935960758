import { describe, it, expect } from 'vitest';
import type { ChangeEvent, ChangeKind } from '../../../shared/structureTypes';
import { ChangeNotifier, toTransportMessage } from '../changeNotifier';

const AT = new Date('2026-05-01T00:00:00.000Z');

function event(structureName: string, recordId: number, kind: ChangeKind = 'created'): ChangeEvent {
  return {
    structureName,
    kind,
    recordId,
    payload: { id: recordId, parent_id: null, label: `item-${recordId}` },
    timestamp: AT,
  };
}

async function drain(iterable: AsyncIterable<ChangeEvent>): Promise<number[]> {
  const ids: number[] = [];
  for await (const e of iterable) ids.push(e.recordId);
  return ids;
}

describe('ChangeNotifier', () => {
  it('只向同结构的订阅者投递，顺序与发布一致', async () => {
    const notifier = new ChangeNotifier({ bufferSize: 8 });
    const menu = notifier.subscribe('menu');
    const orders = notifier.subscribe('orders');

    notifier.publish(event('menu', 1));
    notifier.publish(event('orders', 7));
    notifier.publish(event('menu', 2));
    notifier.closeAll();

    expect(await drain(menu)).toEqual([1, 2]);
    expect(await drain(orders)).toEqual([7]);
  });

  it('无订阅者时 publish 不做任何事', () => {
    const notifier = new ChangeNotifier({ bufferSize: 8 });
    expect(() => notifier.publish(event('menu', 1))).not.toThrow();
    expect(notifier.subscriberCount('menu')).toBe(0);
  });

  it('慢订阅者丢弃最旧事件，不影响其他订阅者', async () => {
    const notifier = new ChangeNotifier({ bufferSize: 8 });
    const slow = notifier.subscribe('menu', { bufferSize: 2 });
    const fast = notifier.subscribe('menu');

    for (const id of [1, 2, 3, 4]) notifier.publish(event('menu', id));
    notifier.closeStructure('menu');

    expect(slow.droppedCount).toBe(2);
    expect(await drain(slow)).toEqual([3, 4]);
    expect(await drain(fast)).toEqual([1, 2, 3, 4]);
  });

  it('unsubscribe 丢弃未读事件并移除订阅者', async () => {
    const notifier = new ChangeNotifier({ bufferSize: 8 });
    const sub = notifier.subscribe('menu');
    notifier.publish(event('menu', 1));

    sub.unsubscribe();
    expect(sub.closed).toBe(true);
    expect(notifier.subscriberCount('menu')).toBe(0);
    expect(await drain(sub)).toEqual([]);
  });

  it('closeStructure 结束迭代但保留已缓冲事件', async () => {
    const notifier = new ChangeNotifier({ bufferSize: 8 });
    const sub = notifier.subscribe('menu');
    notifier.publish(event('menu', 5, 'deleted'));
    notifier.closeStructure('menu');

    notifier.publish(event('menu', 6));
    expect(sub.closed).toBe(true);
    expect(await drain(sub)).toEqual([5]);
  });

  it('for await 中 break 自动退订', async () => {
    const notifier = new ChangeNotifier({ bufferSize: 8 });
    const sub = notifier.subscribe('menu');
    notifier.publish(event('menu', 1));
    notifier.publish(event('menu', 2));

    for await (const e of sub) {
      expect(e.recordId).toBe(1);
      break;
    }
    expect(notifier.subscriberCount('menu')).toBe(0);
  });
});

describe('toTransportMessage', () => {
  it('转换为传输层消息格式', () => {
    expect(toTransportMessage(event('menu', 3, 'updated'))).toEqual({
      type: 'updated',
      structure: 'menu',
      data: { id: 3, parent_id: null, label: 'item-3' },
    });
  });
});

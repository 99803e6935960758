/**
 * 变更通知
 *
 * 每个订阅者一条有界通道：publish 同步写入，永不等待消费端；
 * 缓冲满时丢弃最旧事件并计数。同一结构内投递顺序即提交顺序。
 */

import type { ChangeEvent, TransportMessage } from '../../shared/structureTypes';
import { createModuleLogger } from '../core/logger';
import { BoundedChannel } from '../lib/concurrency/boundedChannel';

const log = createModuleLogger('change-notifier');

export interface SubscribeOptions {
  bufferSize?: number;
}

export class Subscription implements AsyncIterable<ChangeEvent> {
  constructor(
    readonly structureName: string,
    private readonly channel: BoundedChannel<ChangeEvent>,
  ) {}

  get droppedCount(): number {
    return this.channel.dropped;
  }

  get closed(): boolean {
    return this.channel.isClosed;
  }

  /** 停止接收并丢弃未读事件 */
  unsubscribe(): void {
    void this.channel.return();
  }

  [Symbol.asyncIterator](): AsyncIterator<ChangeEvent> {
    return this.channel;
  }
}

export interface ChangeNotifierOptions {
  bufferSize: number;
}

export class ChangeNotifier {
  private readonly channels = new Map<string, Set<BoundedChannel<ChangeEvent>>>();
  private readonly bufferSize: number;

  constructor(options: ChangeNotifierOptions) {
    this.bufferSize = options.bufferSize;
  }

  subscribe(structureName: string, options: SubscribeOptions = {}): Subscription {
    const capacity = options.bufferSize ?? this.bufferSize;
    let set = this.channels.get(structureName);
    if (!set) {
      set = new Set();
      this.channels.set(structureName, set);
    }
    const subscribers = set;

    const channel: BoundedChannel<ChangeEvent> = new BoundedChannel<ChangeEvent>({
      capacity,
      onDrop: dropped => {
        log.warn({ structure: structureName, recordId: dropped.recordId, kind: dropped.kind, dropped: channel.dropped }, 'Subscriber buffer full, oldest event dropped');
      },
      onClose: () => {
        subscribers.delete(channel);
        if (subscribers.size === 0 && this.channels.get(structureName) === subscribers) {
          this.channels.delete(structureName);
        }
      },
    });
    subscribers.add(channel);
    log.debug({ structure: structureName, capacity, subscribers: subscribers.size }, 'Subscriber added');
    return new Subscription(structureName, channel);
  }

  publish(event: ChangeEvent): void {
    const subscribers = this.channels.get(event.structureName);
    if (!subscribers) return;
    for (const channel of subscribers) {
      channel.push(event);
    }
  }

  subscriberCount(structureName: string): number {
    return this.channels.get(structureName)?.size ?? 0;
  }

  /** 关闭某结构的全部订阅；已缓冲的事件仍可读完 */
  closeStructure(structureName: string): void {
    const subscribers = this.channels.get(structureName);
    if (!subscribers) return;
    for (const channel of [...subscribers]) channel.close();
    this.channels.delete(structureName);
    log.info({ structure: structureName }, 'Subscriptions closed');
  }

  closeAll(): void {
    for (const name of [...this.channels.keys()]) this.closeStructure(name);
  }
}

export function toTransportMessage(event: ChangeEvent): TransportMessage {
  return { type: event.kind, structure: event.structureName, data: event.payload };
}

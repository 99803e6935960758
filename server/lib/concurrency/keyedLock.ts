/**
 * 按键读写锁
 *
 * 每个键（结构名）独立排队，不同键互不阻塞：
 * - shared：记录读写、列表查询，可并发持有
 * - exclusive：schema 定义/更新/删除，独占
 *
 * 写优先：一旦有独占等待者，后到的 shared 请求排在其后。
 * 等待超过 timeoutMs 抛出 ConcurrencyError。
 */

import { ConcurrencyError } from '../../core/errors';
import { createModuleLogger } from '../../core/logger';

const log = createModuleLogger('keyed-lock');

export type LockMode = 'shared' | 'exclusive';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

interface LockState {
  readers: number;
  writer: boolean;
  queue: Waiter[];
}

export interface KeyedLockOptions {
  /** 默认等待超时（毫秒），Infinity 表示不超时 */
  timeoutMs: number;
  name?: string;
}

export interface LockStats {
  keys: number;
  readers: number;
  writers: number;
  waiting: number;
}

export class KeyedLock {
  private readonly states = new Map<string, LockState>();
  private readonly timeoutMs: number;
  private readonly name: string;

  constructor(options: KeyedLockOptions) {
    this.timeoutMs = options.timeoutMs;
    this.name = options.name ?? 'lock';
  }

  async withShared<T>(key: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const release = await this.acquire(key, 'shared', timeoutMs ?? this.timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  async withExclusive<T>(key: string, fn: () => Promise<T>, timeoutMs?: number): Promise<T> {
    const release = await this.acquire(key, 'exclusive', timeoutMs ?? this.timeoutMs);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /** 获取锁，返回释放函数 */
  acquire(key: string, mode: LockMode, timeoutMs: number = this.timeoutMs): Promise<() => void> {
    const state = this.stateFor(key);

    if (state.queue.length === 0 && this.canGrant(state, mode)) {
      this.take(state, mode);
      return Promise.resolve(this.releaser(key, state, mode));
    }

    return new Promise<() => void>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const waiter: Waiter = {
        mode,
        grant: () => {
          if (timer) clearTimeout(timer);
          this.take(state, mode);
          resolve(this.releaser(key, state, mode));
        },
      };
      state.queue.push(waiter);

      if (Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => {
          const idx = state.queue.indexOf(waiter);
          if (idx === -1) return;
          state.queue.splice(idx, 1);
          log.warn({ lock: this.name, key, mode, timeoutMs }, 'Lock wait timed out');
          // 队首的独占等待者离开后，后面的 shared 可能已可授予
          this.drain(key, state);
          reject(new ConcurrencyError(`Timed out after ${timeoutMs}ms waiting for ${mode} lock on '${key}'`, {
            key,
            mode,
            timeoutMs,
          }));
        }, timeoutMs);
      }
    });
  }

  stats(): LockStats {
    let readers = 0;
    let writers = 0;
    let waiting = 0;
    for (const state of this.states.values()) {
      readers += state.readers;
      writers += state.writer ? 1 : 0;
      waiting += state.queue.length;
    }
    return { keys: this.states.size, readers, writers, waiting };
  }

  private stateFor(key: string): LockState {
    let state = this.states.get(key);
    if (!state) {
      state = { readers: 0, writer: false, queue: [] };
      this.states.set(key, state);
    }
    return state;
  }

  private canGrant(state: LockState, mode: LockMode): boolean {
    if (mode === 'shared') return !state.writer;
    return !state.writer && state.readers === 0;
  }

  private take(state: LockState, mode: LockMode): void {
    if (mode === 'shared') state.readers++;
    else state.writer = true;
  }

  private releaser(key: string, state: LockState, mode: LockMode): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      if (mode === 'shared') state.readers--;
      else state.writer = false;
      this.drain(key, state);
    };
  }

  /** 按 FIFO 授予队首可授予的等待者；连续的 shared 一次性放行 */
  private drain(key: string, state: LockState): void {
    while (state.queue.length > 0) {
      const head = state.queue[0];
      if (!this.canGrant(state, head.mode)) break;
      state.queue.shift();
      head.grant();
      if (head.mode === 'exclusive') break;
    }

    if (state.readers === 0 && !state.writer && state.queue.length === 0) {
      this.states.delete(key);
    }
  }
}

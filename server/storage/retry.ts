/**
 * 瞬时存储冲突重试
 *
 * InnoDB 死锁（1213）与锁等待超时（1205）属于可重试错误：
 * 整个事务重放一次，仍失败则转为 ConcurrencyError。
 */

import { ConcurrencyError } from '../core/errors';
import { createModuleLogger } from '../core/logger';

const log = createModuleLogger('store-retry');

const TRANSIENT_ERRNOS = new Set([1213, 1205]);
const TRANSIENT_CODES = new Set(['ER_LOCK_DEADLOCK', 'ER_LOCK_WAIT_TIMEOUT']);

export function isTransientStoreError(err: unknown): boolean {
  if (typeof err !== 'object' || err === null) return false;
  if ('errno' in err && typeof err.errno === 'number' && TRANSIENT_ERRNOS.has(err.errno)) return true;
  if ('code' in err && typeof err.code === 'string' && TRANSIENT_CODES.has(err.code)) return true;
  return false;
}

export interface RetryOptions {
  /** 额外重试次数 */
  retries?: number;
  label?: string;
  isTransient?: (err: unknown) => boolean;
}

export async function runWithRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const retries = options.retries ?? 1;
  const isTransient = options.isTransient ?? isTransientStoreError;
  const label = options.label ?? 'transaction';

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!isTransient(err)) throw err;
      const message = err instanceof Error ? err.message : String(err);
      if (attempt >= retries) {
        throw new ConcurrencyError(`${label} failed after ${attempt + 1} attempt(s): ${message}`, {
          label,
          attempts: attempt + 1,
        });
      }
      log.warn({ label, attempt: attempt + 1, error: message }, 'Transient storage conflict, retrying');
    }
  }
}

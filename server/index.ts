/**
 * Structura 入口
 *
 * 对外导出引擎 API，并提供 startStructura() 完成
 * 配置校验 → 日志级别 → 引擎启动 → 信号处理 的启动流程
 */

import 'dotenv/config';

import { config as defaultConfig, type AppConfig } from './core/config';
import { validateConfigWithSchema } from './core/config-schema';
import { ConfigurationError } from './core/errors';
import { createModuleLogger, setLogLevel } from './core/logger';
import type { PhysicalStore } from './storage/physicalStore';
import { createStructureEngine, type StructureEngine } from './structures/engine';

const log = createModuleLogger('index');

const SHUTDOWN_SIGNALS = ['SIGTERM', 'SIGINT'] as const;

export interface StartOptions {
  config?: AppConfig;
  /** 注入物理存储（测试或嵌入场景） */
  store?: PhysicalStore;
  /** 收到 SIGTERM / SIGINT 时自动 stop() */
  handleSignals?: boolean;
}

export interface StartedStructura {
  engine: StructureEngine;
  stop(): Promise<void>;
}

export async function startStructura(options: StartOptions = {}): Promise<StartedStructura> {
  const cfg = options.config ?? defaultConfig;

  const validation = validateConfigWithSchema(cfg);
  if (!validation.success) {
    throw new ConfigurationError(validation.errors);
  }
  setLogLevel(cfg.app.logLevel);

  const engine = await createStructureEngine({ ...cfg.engine, store: options.store });

  let stopping: Promise<void> | null = null;
  const onSignal = (signal: NodeJS.Signals) => {
    log.info({ signal }, 'Shutdown signal received');
    stop().catch((err: unknown) => {
      log.error({ error: err instanceof Error ? err.message : String(err) }, 'Graceful shutdown failed');
      process.exitCode = 1;
    });
  };

  const stop = (): Promise<void> => {
    if (!stopping) {
      for (const signal of SHUTDOWN_SIGNALS) process.off(signal, onSignal);
      stopping = engine.shutdown();
    }
    return stopping;
  };

  if (options.handleSignals) {
    for (const signal of SHUTDOWN_SIGNALS) process.once(signal, onSignal);
  }

  log.info({ name: cfg.app.name, version: cfg.app.version, env: cfg.app.env, storage: cfg.engine.storage }, `${cfg.app.name} ready`);
  return { engine, stop };
}

export * from './structures';
export * from './core/errors';
export { config, getConfigSummary, type AppConfig, type EngineSettings } from './core/config';
export { parseEngineConfig, validateConfigWithSchema, type EngineConfig, type ConfigValidationResult } from './core/config-schema';
export { logger, createModuleLogger, setLogLevel, addLogListener, getRecentLogs, Logger, type LogLevel, type LogEntry } from './core/logger';
export { MemoryPhysicalStore } from './storage';
export type { PhysicalStore, StoreTransaction } from './storage/physicalStore';
export * from '../shared/structureTypes';

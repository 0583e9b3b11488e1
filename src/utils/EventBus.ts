/**
 * 事件总线模块
 * 基于 EventEmitter3 的类型安全事件系统
 */

import { EventEmitter } from 'eventemitter3';
import type { EngineEvents } from '../types/index.js';
import { logger } from './logger.js';

type EventCallback<T> = (data: T) => void;

/**
 * 类型安全的事件总线
 */
export class TypedEventBus extends EventEmitter {
  private debugMode: boolean = false;

  constructor() {
    super();
    this.debugMode = process.env.DEBUG_EVENTS === 'true';
  }

  /**
   * 发射事件
   */
  emitEvent<K extends keyof EngineEvents>(event: K, data: EngineEvents[K]): boolean {
    if (this.debugMode) {
      logger.debug(`Event emitted: ${event}`, {
        data,
        listenerCount: this.listenerCount(event),
      });
    }
    return this.emit(event, data);
  }

  /**
   * 监听事件
   */
  onEvent<K extends keyof EngineEvents>(
    event: K,
    callback: EventCallback<EngineEvents[K]>
  ): this {
    return this.on(event, callback);
  }
}

// 单例事件总线
export const eventBus = new TypedEventBus();

export default eventBus;

/**
 * 工具模块导出
 */

export { logger, settlementLogger, logSettlement, redactSensitiveData } from './logger.js';
export { loadConfig, getConfig } from './config.js';
export { eventBus, TypedEventBus } from './EventBus.js';

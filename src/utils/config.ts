/**
 * 配置管理模块
 * 加载环境变量并提供类型安全的配置访问
 */

import dotenv from 'dotenv';
import type { EngineConfig, RefundShortfallPolicy } from '../types/index.js';
import { logger } from './logger.js';

// 加载 .env 文件
dotenv.config();

interface NumberBounds {
  min: number;
  max: number;
  integer?: boolean;
}

/**
 * 获取环境变量，支持默认值
 */
function getEnv(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined || value === '') {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * 获取数字类型的环境变量，并检查边界
 */
function getEnvNumber(key: string, defaultValue: number, bounds: NumberBounds): number {
  const raw = process.env[key];
  const value = raw === undefined || raw === '' ? defaultValue : Number(raw);

  if (Number.isNaN(value)) {
    throw new Error(`Invalid number for environment variable ${key}: ${raw}`);
  }
  if (bounds.integer && !Number.isInteger(value)) {
    throw new Error(`${key} must be an integer, got ${value}`);
  }
  if (value < bounds.min) {
    throw new Error(`${key}=${value} is below minimum ${bounds.min}`);
  }
  if (value > bounds.max) {
    throw new Error(`${key}=${value} exceeds maximum ${bounds.max}`);
  }
  return value;
}

/**
 * 获取布尔类型的环境变量
 */
function getEnvBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

function getRefundShortfallPolicy(): RefundShortfallPolicy {
  const value = getEnv('REFUND_SHORTFALL_POLICY', 'defer');
  if (value === 'defer' || value === 'abort') {
    return value;
  }
  throw new Error(`REFUND_SHORTFALL_POLICY must be "defer" or "abort", got "${value}"`);
}

/**
 * 加载完整配置
 */
export function loadConfig(): EngineConfig {
  logger.info('Loading configuration from environment variables');

  const config: EngineConfig = {
    // 下注参数
    minStake: getEnvNumber('MIN_STAKE', 1000, { min: 0, max: 1e12, integer: true }),
    feePercent: getEnvNumber('FEE_PERCENT', 2, { min: 0, max: 100, integer: true }),

    // 权限
    authority: getEnv('AUTHORITY'),

    // 结算策略
    refundShortfallPolicy: getRefundShortfallPolicy(),

    // 存储配置
    historyCacheSize: getEnvNumber('HISTORY_CACHE_SIZE', 100, { min: 1, max: 100000, integer: true }),
    dbPath: getEnv('DB_PATH', './data/rounds.db'),
    persistRounds: getEnvBoolean('PERSIST_ROUNDS', true),
  };

  logger.info('Configuration loaded successfully', {
    minStake: config.minStake,
    feePercent: `${config.feePercent}%`,
    refundShortfallPolicy: config.refundShortfallPolicy,
    persistRounds: config.persistRounds,
  });

  return config;
}

/**
 * 单例配置实例
 */
let configInstance: EngineConfig | null = null;

export function getConfig(): EngineConfig {
  if (!configInstance) {
    configInstance = loadConfig();
  }
  return configInstance;
}

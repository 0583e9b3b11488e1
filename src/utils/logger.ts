/**
 * 日志系统模块
 * 使用 Winston 提供结构化日志输出
 */

import winston from 'winston';
import { format } from 'date-fns';
import path from 'path';
import fs from 'fs';

// 敏感字段列表 (日志脱敏)
const SENSITIVE_FIELDS = [
  'privateKey',
  'apiKey',
  'password',
  'secret',
  'token',
  'authorization',
  'signature',
];

// 身份相关字段 (部分脱敏)
const IDENTITY_FIELDS = ['bettor', 'receiver', 'recipient', 'authority', 'caller'];

/**
 * 脱敏单个值
 */
function redactValue(value: unknown, fieldName: string): unknown {
  if (value === null || value === undefined) {
    return value;
  }

  const lowerFieldName = fieldName.toLowerCase();

  // 完全敏感字段 - 完全隐藏
  if (SENSITIVE_FIELDS.some(sf => lowerFieldName.includes(sf.toLowerCase()))) {
    return '[REDACTED]';
  }

  // 身份字段 - 部分显示
  if (IDENTITY_FIELDS.some(f => lowerFieldName.includes(f))) {
    if (typeof value === 'string' && value.length > 10) {
      return `${value.slice(0, 6)}...${value.slice(-4)}`;
    }
  }

  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 递归脱敏对象
 */
export function redactSensitiveData(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(obj)) {
    if (value === null || value === undefined) {
      result[key] = value;
    } else if (Array.isArray(value)) {
      result[key] = value.map((item, index) =>
        isRecord(item) ? redactSensitiveData(item) : redactValue(item, `${key}[${index}]`)
      );
    } else if (isRecord(value)) {
      result[key] = redactSensitiveData(value);
    } else {
      result[key] = redactValue(value, key);
    }
  }

  return result;
}

/**
 * Winston 脱敏格式化器
 */
const redactFormat = winston.format((info) => {
  // 原地覆盖字符串键，保留 winston 内部的 Symbol 键
  return Object.assign(info, redactSensitiveData({ ...info }));
});

// 确保日志目录存在，仅所有者可访问
const logDir = process.env.LOG_DIR || './logs';
if (!fs.existsSync(logDir)) {
  fs.mkdirSync(logDir, { recursive: true, mode: 0o700 });
}

const timestampFormat = winston.format.timestamp({
  format: () => format(new Date(), 'yyyy-MM-dd HH:mm:ss.SSS'),
});

// 控制台格式
const customFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${metaStr}`;
});

// JSON 格式用于文件输出
const jsonFormat = winston.format.printf(({ level, message, timestamp, ...meta }) => {
  return JSON.stringify({
    timestamp,
    level,
    message,
    ...meta,
  });
});

export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: winston.format.combine(
    timestampFormat,
    winston.format.errors({ stack: true }),
    redactFormat()
  ),
  defaultMeta: { service: 'dice-pool-engine' },
  transports: [
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ all: true }),
        customFormat
      ),
    }),
    new winston.transports.File({
      filename: path.join(logDir, 'engine.log'),
      format: winston.format.combine(jsonFormat),
      maxsize: 10 * 1024 * 1024, // 10MB
      maxFiles: 5,
    }),
    // 错误日志单独文件
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
      format: winston.format.combine(jsonFormat),
      maxsize: 10 * 1024 * 1024,
      maxFiles: 5,
    }),
  ],
});

// 结算专用日志器: 状态转换、退款、派彩
export const settlementLogger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(timestampFormat, redactFormat()),
  transports: [
    new winston.transports.File({
      filename: path.join(logDir, 'settlements.log'),
      format: winston.format.combine(jsonFormat),
      maxsize: 50 * 1024 * 1024, // 50MB
      maxFiles: 10,
    }),
  ],
});

/**
 * 记录结算相关操作
 */
export function logSettlement(
  action: string,
  data: Record<string, unknown>
): void {
  settlementLogger.info(action, {
    action,
    ...data,
    loggedAt: Date.now(),
  });
}

export default logger;

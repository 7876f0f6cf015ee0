import { mkdirSync } from 'fs';
import pino from 'pino';
import pinoPretty from 'pino-pretty';
import type { AppConfig } from '../config/schema.js';

let logger: pino.Logger | null = null;

/**
 * 创建应用日志实例。
 *
 * 控制台输出使用同步 pino-pretty 写到 stderr，stdout 留给命令结果；
 * 配置了 directory 时额外通过 pino-roll worker 线程写入轮转日志文件。
 *
 * @param config - 日志配置。
 * @returns 配置好的 pino logger。
 */
export function createLogger(config: AppConfig['logging']): pino.Logger {
  const prettyStream = pinoPretty({ destination: 2, sync: true });
  const streams: pino.StreamEntry[] = [{ level: config.level, stream: prettyStream }];

  if (config.directory) {
    mkdirSync(config.directory, { recursive: true });
    const fileTransport = pino.transport({
      target: 'pino-roll',
      level: config.level,
      options: {
        file: `${config.directory}/guard`,
        size: config.maxSize,
        limit: { count: config.maxFiles },
      },
    });
    streams.push({ level: config.level, stream: fileTransport });
  }

  logger = pino({ level: config.level }, pino.multistream(streams));

  return logger;
}

/**
 * 获取已创建的 logger。必须先调用 createLogger()。
 *
 * @returns pino Logger 实例。
 * @throws 未调用 createLogger() 时抛出错误。
 */
export function getLogger(): pino.Logger {
  if (!logger) {
    throw new Error('Logger not initialized. Call createLogger() first.');
  }
  return logger;
}

/**
 * 清除已创建的 logger（仅用于测试）。
 */
export function resetLogger(): void {
  logger = null;
}

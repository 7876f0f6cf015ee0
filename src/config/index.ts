import { readFileSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { parse as parseYaml } from 'yaml';
import { AppConfigSchema, type AppConfig } from './schema.js';

let cachedConfig: AppConfig | null = null;
let configFilePath: string | null = null;

/** loadConfig 选项。 */
export interface LoadConfigOptions {
  /** 配置文件路径，默认为 ./guard.yaml。 */
  configPath?: string;
}

/**
 * 加载并校验配置文件。
 *
 * @param options - 加载选项。
 * @returns 类型安全的配置对象。
 * @throws 配置文件不存在或校验失败时抛出错误。
 */
export function loadConfig(options?: LoadConfigOptions): AppConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  const filePath = resolve(process.cwd(), options?.configPath ?? 'guard.yaml');
  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = parseYaml(raw) ?? {};
  const config = AppConfigSchema.parse(parsed);

  // 将相对路径的 logging.directory 基于配置文件所在目录解析为绝对路径。
  const directory = config.logging.directory;
  if (directory && !isAbsolute(directory)) {
    config.logging.directory = resolve(dirname(filePath), directory);
  }

  configFilePath = filePath;
  cachedConfig = config;
  return cachedConfig;
}

/**
 * 获取已加载的配置。必须先调用 loadConfig()。
 *
 * @returns 配置对象。
 * @throws 未调用 loadConfig() 时抛出错误。
 */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    throw new Error('Config not loaded. Call loadConfig() first.');
  }
  return cachedConfig;
}

/**
 * 获取已加载配置文件的绝对路径。
 *
 * @returns 文件路径，未加载或通过 setConfig() 设置时返回 null。
 */
export function getConfigFilePath(): string | null {
  return configFilePath;
}

/**
 * 清除缓存的配置（仅用于测试）。
 */
export function resetConfig(): void {
  cachedConfig = null;
  configFilePath = null;
}

/**
 * 直接设置配置对象（仅用于测试，跳过文件加载）。
 *
 * @param config - 完整的配置对象。
 */
export function setConfig(config: AppConfig): void {
  cachedConfig = config;
}

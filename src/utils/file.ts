import { existsSync, readFileSync } from 'fs';
import { parse as parseYaml } from 'yaml';
import type { z } from 'zod';

/**
 * 读取 YAML（或 JSON）文件并用 zod schema 校验。
 *
 * @param filePath - 文件路径。
 * @param schema - 校验用的 zod schema。
 * @returns 校验后的对象。
 * @throws 文件不存在或校验失败时抛出错误。
 */
export function readYamlFile<S extends z.ZodTypeAny>(filePath: string, schema: S): z.output<S> {
  if (!existsSync(filePath)) {
    throw new Error(`File does not exist: ${filePath}`);
  }
  const raw = readFileSync(filePath, 'utf-8');
  const parsed: unknown = parseYaml(raw) ?? {};
  return schema.parse(parsed);
}

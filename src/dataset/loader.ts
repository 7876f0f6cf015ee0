import { resolve } from 'path';
import { z } from 'zod';
import type { ContentType, TaggedItem } from '../core/content-type.js';
import { PERMISSION_VALUES, type GlobalPermission } from '../core/permission-value.js';
import { readYamlFile } from '../utils/file.js';

/** 用户 key：数据集中的用户 id。 */
export type DatasetUserKey = string | number;

const UserKeySchema = z.union([z.string(), z.number()]);

/** 数据集中的用户。 */
const DatasetUserSchema = z.object({
  /** 用户 id，作为传入 match 谓词的 key。 */
  id: UserKeySchema,
  /** 显示名称。 */
  name: z.string().optional(),
  /** 全局权限：权限名 → 权限值。 */
  permissions: z.record(z.string(), z.enum(PERMISSION_VALUES)).default(() => ({})),
});

/** 数据集文件 schema。 */
export const DatasetSchema = z.object({
  users: z.array(DatasetUserSchema).default(() => []),
  items: z.array(z.record(z.string(), z.unknown())).default(() => []),
});

export type DatasetUser = z.infer<typeof DatasetUserSchema>;
export type Dataset = z.infer<typeof DatasetSchema>;

/**
 * 加载并校验数据集文件。
 *
 * @param filePath - 数据集路径（相对路径基于当前工作目录）。
 * @returns 数据集。
 */
export function loadDataset(filePath: string): Dataset {
  return readYamlFile(resolve(process.cwd(), filePath), DatasetSchema);
}

/**
 * 把用户的权限映射转换为全局权限列表。
 */
export function userGlobalPermissions(user: DatasetUser): GlobalPermission[] {
  return Object.entries(user.permissions).map(([name, value]) => ({ name, value }));
}

/**
 * 按 id 或名称查找用户。命令行参数总是字符串，所以 id 按字符串比较。
 *
 * @returns 用户，找不到时返回 null。
 */
export function findUser(dataset: Dataset, idOrName: string): DatasetUser | null {
  return (
    dataset.users.find((u) => String(u.id) === idOrName)
    ?? dataset.users.find((u) => u.name === idOrName)
    ?? null
  );
}

/**
 * 列出属于某内容类型的条目。
 */
export function itemsOfType(dataset: Dataset, contentType: ContentType<TaggedItem>): TaggedItem[] {
  return dataset.items.filter((item) => contentType.is(item));
}

/**
 * 按 id 查找条目，可选限定内容类型。
 *
 * @returns 条目，找不到时返回 null。
 */
export function findItem(dataset: Dataset, id: string, contentType?: ContentType<TaggedItem>): TaggedItem | null {
  const candidates = contentType ? itemsOfType(dataset, contentType) : dataset.items;
  return candidates.find((item) => String(item.id) === id) ?? null;
}

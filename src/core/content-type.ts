import { z } from 'zod';

/**
 * 内容类型标记。
 *
 * 组的 match 谓词只接受对应内容类型的条目；is() 在运行时校验条目形状，
 * 名称相同的两个 ContentType 视为同一类型。
 */
export interface ContentType<T> {
  /** 类型名称（注册表按名称区分内容类型）。 */
  readonly name: string;
  /** 运行时类型守卫。 */
  is(value: unknown): value is T;
}

/** 声明式策略与 CLI 使用的通用条目形状。 */
export type TaggedItem = Record<string, unknown>;

const TaggedItemSchema = z.record(z.string(), z.unknown());

/**
 * 基于类型守卫定义内容类型。
 *
 * @param name - 类型名称。
 * @param guard - 运行时类型守卫。
 * @returns 内容类型标记。
 */
export function defineContentType<T>(name: string, guard: (value: unknown) => value is T): ContentType<T> {
  return { name, is: guard };
}

/**
 * 基于 zod schema 定义内容类型，条目能通过 safeParse 即属于该类型。
 *
 * @param name - 类型名称。
 * @param schema - 描述条目形状的 zod schema。
 * @returns 内容类型标记。
 */
export function schemaContentType<S extends z.ZodTypeAny>(name: string, schema: S): ContentType<z.infer<S>> {
  return defineContentType(name, (value: unknown): value is z.infer<S> => schema.safeParse(value).success);
}

/**
 * 定义以判别字段区分的内容类型：记录的 tagField 字段等于 name 时属于该类型。
 *
 * @param name - 类型名称。
 * @param tagField - 判别字段，默认 "type"。
 * @returns 内容类型标记。
 */
export function taggedContentType(name: string, tagField = 'type'): ContentType<TaggedItem> {
  return defineContentType(name, (value: unknown): value is TaggedItem => {
    const parsed = TaggedItemSchema.safeParse(value);
    return parsed.success && parsed.data[tagField] === name;
  });
}

/**
 * 判断两个内容类型是否相同。
 */
export function sameContentType(a: ContentType<unknown>, b: ContentType<unknown>): boolean {
  return a.name === b.name;
}

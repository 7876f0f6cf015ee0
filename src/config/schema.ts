import { z } from 'zod';
import { PERMISSION_VALUES } from '../core/permission-value.js';

/** 日志配置。 */
const LoggingConfigSchema = z.object({
  /** 日志级别。 */
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  /** 日志文件目录（相对路径基于配置文件所在目录解析），不配置则只输出到控制台。 */
  directory: z.string().optional(),
  /** 单个日志文件最大体积（pino-roll 格式：数字 + k/m/g，如 10m）。 */
  maxSize: z.string().default('10m'),
  /** 保留的轮转文件数量。 */
  maxFiles: z.number().int().positive().default(10),
});

/** 组成员匹配规则（声明式）。 */
export type MatchRule =
  | { field: string }
  | { includes: string }
  | { matcher: string }
  | { any: MatchRule[] }
  | { all: MatchRule[] }
  | { not: MatchRule };

/**
 * 匹配规则 schema。
 *
 * - field: 条目字段（支持 a.b 路径）等于用户 key。
 * - includes: 条目数组字段包含用户 key。
 * - matcher: 引用应用注册的具名谓词。
 * - any / all / not: 组合规则。
 */
export const MatchRuleSchema: z.ZodType<MatchRule> = z.lazy(() =>
  z.union([
    z.object({ field: z.string().min(1) }).strict(),
    z.object({ includes: z.string().min(1) }).strict(),
    z.object({ matcher: z.string().min(1) }).strict(),
    z.object({ any: z.array(MatchRuleSchema).min(1) }).strict(),
    z.object({ all: z.array(MatchRuleSchema).min(1) }).strict(),
    z.object({ not: MatchRuleSchema }).strict(),
  ]),
);

/** 内容类型声明 schema。 */
const ContentTypeConfigSchema = z.object({
  /** 区分内容类型的判别字段。 */
  tagField: z.string().default('type'),
});

/** 组声明 schema。 */
const GroupConfigSchema = z.object({
  /** 组名。 */
  name: z.string().min(1),
  /** 组绑定的内容类型（需在 contentTypes 中声明）。 */
  contentType: z.string().min(1),
  /** 成员匹配规则。 */
  match: MatchRuleSchema,
  /** 权限名 → 权限值。 */
  permissions: z.record(z.string(), z.enum(PERMISSION_VALUES)).default(() => ({})),
});

/** 权限策略 schema。 */
export const PolicyConfigSchema = z.object({
  /** 是否允许同一组名绑定多种内容类型。 */
  allowReusingGroupNames: z.boolean().default(false),
  /** 内容类型声明（键为类型名）。 */
  contentTypes: z.record(z.string(), ContentTypeConfigSchema).default(() => ({})),
  /** 有序的组声明列表。 */
  groups: z.array(GroupConfigSchema).default(() => []),
});

/** 应用全局配置 schema。 */
export const AppConfigSchema = z.object({
  /** 日志配置。 */
  logging: LoggingConfigSchema.default(() => ({
    level: 'info' as const,
    maxSize: '10m',
    maxFiles: 10,
  })),
  /** 关系型权限策略。 */
  policy: PolicyConfigSchema.default(() => ({
    allowReusingGroupNames: false,
    contentTypes: {},
    groups: [],
  })),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
export type PolicyConfig = z.infer<typeof PolicyConfigSchema>;
export type GroupConfig = z.infer<typeof GroupConfigSchema>;

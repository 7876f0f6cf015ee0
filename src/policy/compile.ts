import type { MatchRule, PolicyConfig } from '../config/schema.js';
import { taggedContentType, type ContentType, type TaggedItem } from '../core/content-type.js';
import { PermissionConfigError } from '../core/errors.js';
import type { MatchFn } from '../core/group.js';
import {
  PredicateFilterBuilder,
  type PredicateFilter,
  type PredicateFilterOptions,
} from '../core/predicate-filter.js';

/** 应用注册的具名谓词，可在策略文件中通过 { matcher: name } 引用。 */
export type MatcherRegistry<TKey> = Record<string, MatchFn<TaggedItem, TKey>>;

/** 策略引用了未注册的具名谓词。 */
export class UnknownMatcherError extends PermissionConfigError {
  readonly matcherName: string;

  constructor(matcherName: string) {
    super(`There is no matcher named '${matcherName}'.`);
    this.matcherName = matcherName;
  }
}

/** 策略中声明的内容类型，键为类型名。 */
export type PolicyContentTypes = Map<string, ContentType<TaggedItem>>;

/**
 * 按点分路径读取条目字段。
 *
 * @param item - 条目。
 * @param path - 字段路径，如 "owner.id"。
 * @returns 字段值，路径不存在时返回 undefined。
 */
export function readPath(item: TaggedItem, path: string): unknown {
  let current: unknown = item;
  for (const segment of path.split('.')) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * 把声明式匹配规则编译为 match 谓词。
 *
 * @param rule - 匹配规则。
 * @param matchers - 具名谓词注册表。
 * @returns 成员谓词。
 * @throws UnknownMatcherError 引用的具名谓词不存在时。
 */
export function compileMatchRule<TKey>(rule: MatchRule, matchers: MatcherRegistry<TKey> = {}): MatchFn<TaggedItem, TKey> {
  if ('field' in rule) {
    const { field } = rule;
    return (item, userKey) => readPath(item, field) === userKey;
  }
  if ('includes' in rule) {
    const { includes } = rule;
    return (item, userKey) => {
      const value = readPath(item, includes);
      return Array.isArray(value) && value.includes(userKey);
    };
  }
  if ('matcher' in rule) {
    const fn = Object.hasOwn(matchers, rule.matcher) ? matchers[rule.matcher] : undefined;
    if (!fn) {
      throw new UnknownMatcherError(rule.matcher);
    }
    return fn;
  }
  if ('any' in rule) {
    const parts = rule.any.map((r) => compileMatchRule(r, matchers));
    return (item, userKey) => parts.some((p) => p(item, userKey));
  }
  if ('all' in rule) {
    const parts = rule.all.map((r) => compileMatchRule(r, matchers));
    return (item, userKey) => parts.every((p) => p(item, userKey));
  }
  const inner = compileMatchRule(rule.not, matchers);
  return (item, userKey) => !inner(item, userKey);
}

/**
 * 收集策略中的内容类型。组引用了未在 contentTypes 中声明的类型时，
 * 使用默认判别字段 "type"。
 */
export function collectContentTypes(policy: PolicyConfig): PolicyContentTypes {
  const types: PolicyContentTypes = new Map();
  for (const [name, config] of Object.entries(policy.contentTypes)) {
    types.set(name, taggedContentType(name, config.tagField));
  }
  for (const group of policy.groups) {
    if (!types.has(group.contentType)) {
      types.set(group.contentType, taggedContentType(group.contentType));
    }
  }
  return types;
}

/**
 * 将策略中的组和权限声明到构建器上。
 *
 * 权限总是按组自身的内容类型消歧，所以复用组名时不会挂到错误的组上。
 *
 * @param builder - 目标构建器。
 * @param policy - 已校验的策略配置。
 * @param matchers - 具名谓词注册表。
 * @returns 策略中的内容类型。
 */
export function applyPolicy<TUser, TKey>(
  builder: PredicateFilterBuilder<TUser, TKey>,
  policy: PolicyConfig,
  matchers: MatcherRegistry<TKey> = {},
): PolicyContentTypes {
  const contentTypes = collectContentTypes(policy);

  for (const group of policy.groups) {
    const contentType = contentTypes.get(group.contentType) ?? taggedContentType(group.contentType);
    builder.addGroup(group.name, contentType, compileMatchRule(group.match, matchers));
    for (const [permission, value] of Object.entries(group.permissions)) {
      builder.addPermission(group.name, permission, value, contentType);
    }
  }

  return contentTypes;
}

/** createFilterFromPolicy 选项。 */
export interface PolicyFilterOptions<TUser, TKey>
  extends Omit<PredicateFilterOptions<TUser, TKey>, 'allowReusingGroupNames'> {
  /** 具名谓词注册表。 */
  matchers?: MatcherRegistry<TKey>;
}

/**
 * 根据策略直接构建只读过滤器。
 *
 * @param policy - 已校验的策略配置。
 * @param options - 过滤器选项，allowReusingGroupNames 取自策略。
 * @returns 过滤器及策略中的内容类型。
 */
export function createFilterFromPolicy<TUser, TKey>(
  policy: PolicyConfig,
  options: PolicyFilterOptions<TUser, TKey>,
): { filter: PredicateFilter<TUser, TKey>; contentTypes: PolicyContentTypes } {
  const { matchers, ...filterOptions } = options;
  const builder = new PredicateFilterBuilder<TUser, TKey>({
    ...filterOptions,
    allowReusingGroupNames: policy.allowReusingGroupNames,
  });
  const contentTypes = applyPolicy(builder, policy, matchers);
  return { filter: builder.build(), contentTypes };
}

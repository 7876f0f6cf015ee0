import type { Logger } from 'pino';
import type { ContentType } from './content-type.js';
import { and, constant, describeExpression, evaluate, match, not, or, type DecisionExpression } from './expression.js';
import type { Group } from './group.js';
import type { GroupRegistry } from './group-registry.js';
import {
  mergePermissionValues,
  normalizeName,
  type GlobalPermission,
  type PermissionValue,
} from './permission-value.js';

/** 用户 → 用户 key（传入 match 谓词的值）。 */
export type UserKeyExtractor<TUser, TKey> = (user: TUser) => TKey;

/** 用户 → 全局（非关系型）权限列表，例如站点管理员权限。 */
export type GlobalPermissionResolver<TUser> = (user: TUser) => Iterable<GlobalPermission>;

/** 引擎求值所需的上下文。 */
export interface ResolutionContext<TUser, TKey> {
  registry: GroupRegistry<TKey>;
  getUserKey: UserKeyExtractor<TUser, TKey>;
  getGlobalPermissions?: GlobalPermissionResolver<TUser>;
  logger: Logger;
}

/** 某个 (contentType, permission, user) 三元组的判定结果。 */
export interface Decision<T, TKey> {
  contentType: ContentType<T>;
  permission: string;
  /** 全局权限的合并结果。 */
  globalVerdict: PermissionValue;
  /** 完整的决策表达式，可交给查询翻译层。 */
  expression: DecisionExpression<TKey>;
  /** 对单个条目求值，无副作用，可重复调用。 */
  test(item: T): boolean;
}

/**
 * 权限解析引擎。
 *
 * 合并全局权限与关系型组谓词，得到每个条目的 allow/deny 判定：
 * 1. 全局结论 G：任一 deny → deny，否则任一 allow → allow，否则 inherit。
 * 2. allow 集合 = {G 为 allow 时的常量 true} ∪ {allow 组的 match}，OR 合并，空集为 false。
 * 3. deny 集合 = {G 为 deny 时的常量 true} ∪ {deny 组的 match}，逐项取反后 AND 合并，空集为 true。
 * 4. 判定 = allow AND deny。
 *
 * 任意一个命中的 deny 都会否决所有 allow 路径；没有 allow 路径时默认拒绝。
 */
export class PermissionResolutionEngine<TUser, TKey> {
  private readonly context: ResolutionContext<TUser, TKey>;

  constructor(context: ResolutionContext<TUser, TKey>) {
    this.context = context;
  }

  /**
   * 计算用户对某权限的全局结论。未配置全局权限解析器时恒为 inherit。
   *
   * @param permission - 权限名（大小写不敏感）。
   * @param user - 用户实体。
   * @returns 合并后的权限值。
   */
  resolveGlobalVerdict(permission: string, user: TUser): PermissionValue {
    const resolver = this.context.getGlobalPermissions;
    if (!resolver) {
      return 'inherit';
    }

    const key = normalizeName(permission);
    const values: PermissionValue[] = [];
    for (const entry of resolver(user)) {
      if (normalizeName(entry.name) === key) {
        values.push(entry.value);
      }
    }
    return mergePermissionValues(values);
  }

  /**
   * 构造判定函数。
   *
   * @param contentType - 条目的内容类型。
   * @param permission - 请求的权限名。
   * @param user - 用户实体。
   * @returns 可重复使用的判定结果。
   */
  buildDecision<T>(contentType: ContentType<T>, permission: string, user: TUser): Decision<T, TKey> {
    const { registry, getUserKey, logger } = this.context;
    const globalVerdict = this.resolveGlobalVerdict(permission, user);
    const userKey = getUserKey(user);

    const groups = registry.groupsFor(contentType, permission);
    const allowGroups = groups.filter((g) => g.getPermission(permission) === 'allow');
    const denyGroups = groups.filter((g) => g.getPermission(permission) === 'deny');

    const allowSet = [
      ...(globalVerdict === 'allow' ? [constant<TKey>(true)] : []),
      ...this.matchAll(allowGroups, userKey),
    ];
    const denySet = [
      ...(globalVerdict === 'deny' ? [constant<TKey>(true)] : []),
      ...this.matchAll(denyGroups, userKey),
    ];

    const expression = and([or(allowSet), and(denySet.map((term) => not(term)))]);

    logger.debug(
      {
        contentType: contentType.name,
        permission,
        globalVerdict,
        allowGroups: allowGroups.map((g) => g.name),
        denyGroups: denyGroups.map((g) => g.name),
        expression: describeExpression(expression),
      },
      'Built permission decision',
    );

    return {
      contentType,
      permission,
      globalVerdict,
      expression,
      test: (item: T) => evaluate(expression, item),
    };
  }

  private matchAll(groups: Group<TKey>[], userKey: TKey): DecisionExpression<TKey>[] {
    return groups.map((group) => match(group, userKey));
  }
}

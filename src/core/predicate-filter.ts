import pino, { type Logger } from 'pino';
import type { ContentType } from './content-type.js';
import {
  PermissionResolutionEngine,
  type Decision,
  type GlobalPermissionResolver,
  type UserKeyExtractor,
} from './engine.js';
import { AmbiguousGroupNameError, TypeMismatchError, UnknownGroupError } from './errors.js';
import type { Group, MatchFn } from './group.js';
import { GroupRegistry, type ContentTypeRef } from './group-registry.js';
import type { PermissionValue } from './permission-value.js';

/** PredicateFilter 构造选项。 */
export interface PredicateFilterOptions<TUser, TKey> {
  /** 用户 → 传入 match 谓词的 key。 */
  getUserKey: UserKeyExtractor<TUser, TKey>;
  /** 用户 → 全局权限。不配置时全局结论恒为 inherit。 */
  getGlobalPermissions?: GlobalPermissionResolver<TUser>;
  /** 是否允许同一组名绑定到多种内容类型，默认 false。 */
  allowReusingGroupNames?: boolean;
  /** 调试日志输出，默认静默。 */
  logger?: Logger;
}

/** 已构建过滤器的运行选项；组名复用模式取自注册表本身。 */
export type PredicateFilterRuntimeOptions<TUser, TKey> = Omit<PredicateFilterOptions<TUser, TKey>, 'allowReusingGroupNames'>;

/**
 * 配置阶段的构建器。
 *
 * 先用 addGroup/addPermission 声明所有组与权限，再调用 build() 得到只读的
 * PredicateFilter。build() 会复制当前注册表，之后对构建器的修改不影响已构建的实例。
 * 构建器本身不加锁，多线程并发配置需要调用方自行同步。
 */
export class PredicateFilterBuilder<TUser, TKey> {
  private readonly options: PredicateFilterOptions<TUser, TKey>;
  private readonly registry: GroupRegistry<TKey>;

  constructor(options: PredicateFilterOptions<TUser, TKey>) {
    this.options = options;
    this.registry = new GroupRegistry<TKey>(options.allowReusingGroupNames ?? false);
  }

  /**
   * 声明一个关系型组。
   *
   * @param name - 组名（同一内容类型内大小写不敏感）。
   * @param contentType - match 谓词接受的内容类型。
   * @param match - 成员谓词，由应用提供。
   * @throws DuplicateGroupNameError 未开启组名复用且组名已绑定其他内容类型时。
   */
  addGroup<T>(name: string, contentType: ContentType<T>, match: MatchFn<T, TKey>): void {
    this.registry.addGroup(name, contentType, match);
  }

  /**
   * 为组声明权限值。
   *
   * @param groupName - 组名。
   * @param permission - 权限名（大小写不敏感，后写覆盖先写）。
   * @param value - 权限值。
   * @param contentType - 复用组名时用于消歧的内容类型。
   * @throws UnknownGroupError 找不到组时。
   * @throws AmbiguousGroupNameError 同名组有多个且未指定 contentType 时。
   */
  addPermission(groupName: string, permission: string, value: PermissionValue, contentType?: ContentTypeRef): void {
    this.registry.addPermission(groupName, permission, value, contentType);
  }

  /**
   * 冻结当前配置，生成只读的过滤器。
   */
  build(): PredicateFilter<TUser, TKey> {
    return new PredicateFilter<TUser, TKey>(this.options, this.registry.freeze());
  }
}

/**
 * 关系型权限过滤器。
 *
 * 把应用定义的组谓词和全局权限合并成每个条目的 allow/deny 判定，
 * 用于过滤条目集合或判断单个条目。实例只读，可被并发使用。
 *
 * @example
 * const builder = new PredicateFilterBuilder<User, number>({ getUserKey: (u) => u.id });
 * builder.addGroup('post-editor', Post, (post, userId) => post.editorId === userId);
 * builder.addPermission('post-editor', 'post-edit', 'allow');
 * const filter = builder.build();
 * const editable = filter.filter(posts, Post, 'post-edit', user);
 */
export class PredicateFilter<TUser, TKey> {
  private readonly registry: GroupRegistry<TKey>;
  private readonly engine: PermissionResolutionEngine<TUser, TKey>;
  private readonly getUserKey: UserKeyExtractor<TUser, TKey>;

  /**
   * @param options - 运行选项。
   * @param registry - 组注册表，未冻结时先生成只读快照。
   */
  constructor(options: PredicateFilterRuntimeOptions<TUser, TKey>, registry: GroupRegistry<TKey>) {
    this.registry = registry.isFrozen ? registry : registry.freeze();
    this.getUserKey = options.getUserKey;
    this.engine = new PermissionResolutionEngine<TUser, TKey>({
      registry: this.registry,
      getUserKey: options.getUserKey,
      getGlobalPermissions: options.getGlobalPermissions,
      logger: options.logger ?? pino({ level: 'silent' }),
    });
  }

  /**
   * 构造 (contentType, permission, user) 的判定结果。
   * 外部查询翻译层可以直接编译 decision.expression，而不必物化条目。
   */
  decision<T>(contentType: ContentType<T>, permission: string, user: TUser): Decision<T, TKey> {
    return this.engine.buildDecision(contentType, permission, user);
  }

  /**
   * 过滤出用户拥有指定权限的条目，保持原有顺序。
   *
   * @param items - 待过滤的条目序列。
   * @param contentType - 条目的内容类型。
   * @param permission - 权限名。
   * @param user - 用户实体。
   * @returns 判定为 true 的条目。
   */
  filter<T>(items: Iterable<T>, contentType: ContentType<T>, permission: string, user: TUser): T[] {
    const decision = this.decision(contentType, permission, user);
    const result: T[] = [];
    for (const item of items) {
      if (decision.test(item)) {
        result.push(item);
      }
    }
    return result;
  }

  /**
   * 判断用户对单个条目是否拥有权限，等价于 filter([item]) 非空。
   */
  test<T>(item: T, contentType: ContentType<T>, permission: string, user: TUser): boolean {
    return this.filter([item], contentType, permission, user).length > 0;
  }

  /**
   * 仅根据全局权限判断（不涉及条目），例如“该用户是否为此权限的站点管理员”。
   *
   * @returns 全局结论为 allow 时返回 true。
   */
  testGlobal(permission: string, user: TUser): boolean {
    return this.engine.resolveGlobalVerdict(permission, user) === 'allow';
  }

  /**
   * 直接对条目执行某个组的成员谓词（不考虑权限）。
   *
   * 复用组名时按条目的运行时类型选出对应的组。
   *
   * @param item - 条目。
   * @param groupName - 组名。
   * @param user - 用户实体。
   * @returns 用户是否属于该组。
   * @throws UnknownGroupError 组不存在时。
   * @throws TypeMismatchError 同名组都不接受该条目的类型时。
   * @throws AmbiguousGroupNameError 多个同名组都接受该条目时。
   */
  isMember(item: unknown, groupName: string, user: TUser): boolean {
    const group = this.resolveMemberGroup(item, groupName);
    return group.matches(item, this.getUserKey(user));
  }

  /** 列出所有已注册的组。 */
  groups(): readonly Group<TKey>[] {
    return this.registry.list();
  }

  /** 是否允许组名复用。 */
  get reusesGroupNames(): boolean {
    return this.registry.reusesGroupNames;
  }

  private resolveMemberGroup(item: unknown, groupName: string): Group<TKey> {
    const candidates = this.registry.findByName(groupName);
    if (candidates.length === 0) {
      throw new UnknownGroupError(groupName);
    }

    const accepting = candidates.filter((g) => g.contentType.is(item));
    if (accepting.length === 0) {
      throw new TypeMismatchError(
        groupName,
        candidates.map((g) => g.contentType.name).join(' | '),
        'no group with this name accepts the item',
      );
    }
    if (accepting.length > 1) {
      throw new AmbiguousGroupNameError(groupName, accepting.map((g) => g.contentType.name));
    }
    return accepting[0];
  }
}

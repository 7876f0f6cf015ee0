import type { Logger } from 'pino';
import type { PolicyConfig } from '../config/schema.js';
import type { ContentType, TaggedItem } from '../core/content-type.js';
import type { Decision } from '../core/engine.js';
import type { PredicateFilter } from '../core/predicate-filter.js';
import {
  findItem,
  findUser,
  itemsOfType,
  userGlobalPermissions,
  type Dataset,
  type DatasetUser,
  type DatasetUserKey,
} from '../dataset/loader.js';
import { createFilterFromPolicy, type MatcherRegistry, type PolicyContentTypes } from '../policy/compile.js';

/** 命令行参数无法解析到用户、条目或内容类型时抛出。 */
export class LookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LookupError';
  }
}

/**
 * 一次 CLI 调用的上下文：策略构建出的过滤器 + 数据集。
 * 所有命令都只读，不修改数据集。
 */
export class GuardSession {
  readonly filter: PredicateFilter<DatasetUser, DatasetUserKey>;
  readonly contentTypes: PolicyContentTypes;
  readonly dataset: Dataset;

  constructor(
    policy: PolicyConfig,
    dataset: Dataset,
    logger: Logger,
    matchers: MatcherRegistry<DatasetUserKey> = {},
  ) {
    const built = createFilterFromPolicy<DatasetUser, DatasetUserKey>(policy, {
      getUserKey: (user) => user.id,
      getGlobalPermissions: userGlobalPermissions,
      logger,
      matchers,
    });
    this.filter = built.filter;
    this.contentTypes = built.contentTypes;
    this.dataset = dataset;
  }

  /**
   * 过滤某内容类型下用户拥有权限的条目。
   */
  filterItems(typeName: string, permission: string, userRef: string): TaggedItem[] {
    const contentType = this.contentType(typeName);
    const items = itemsOfType(this.dataset, contentType);
    return this.filter.filter(items, contentType, permission, this.user(userRef));
  }

  /**
   * 判断用户对单个条目是否拥有权限。
   */
  testItem(typeName: string, itemId: string, permission: string, userRef: string): boolean {
    const contentType = this.contentType(typeName);
    return this.filter.test(this.item(itemId, contentType), contentType, permission, this.user(userRef));
  }

  /** 仅根据全局权限判断。 */
  testGlobal(permission: string, userRef: string): boolean {
    return this.filter.testGlobal(permission, this.user(userRef));
  }

  /** 判断用户是否属于某组（针对某条目）。 */
  isMember(groupName: string, itemId: string, userRef: string, typeName?: string): boolean {
    const contentType = typeName === undefined ? undefined : this.contentType(typeName);
    return this.filter.isMember(this.item(itemId, contentType), groupName, this.user(userRef));
  }

  /** 构造判定结果，用于 explain。 */
  explain(typeName: string, permission: string, userRef: string): Decision<TaggedItem, DatasetUserKey> {
    return this.filter.decision(this.contentType(typeName), permission, this.user(userRef));
  }

  private contentType(typeName: string): ContentType<TaggedItem> {
    const contentType = this.contentTypes.get(typeName);
    if (!contentType) {
      throw new LookupError(`Unknown content type: ${typeName}`);
    }
    return contentType;
  }

  private user(userRef: string): DatasetUser {
    const user = findUser(this.dataset, userRef);
    if (!user) {
      throw new LookupError(`User not found: ${userRef}`);
    }
    return user;
  }

  private item(itemId: string, contentType?: ContentType<TaggedItem>): TaggedItem {
    const item = findItem(this.dataset, itemId, contentType);
    if (!item) {
      throw new LookupError(`Item not found: ${itemId}`);
    }
    return item;
  }
}

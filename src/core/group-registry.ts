import type { ContentType } from './content-type.js';
import {
  AmbiguousGroupNameError,
  DuplicateGroupNameError,
  RegistryFrozenError,
  UnknownGroupError,
} from './errors.js';
import { Group, type MatchFn } from './group.js';
import { normalizeName, type PermissionValue } from './permission-value.js';

/** 内容类型参数：可以直接传 ContentType，也可以只传类型名。 */
export type ContentTypeRef = ContentType<unknown> | string;

function contentTypeName(ref: ContentTypeRef): string {
  return typeof ref === 'string' ? ref : ref.name;
}

/**
 * 有序的组集合，负责组名唯一性和 (name, contentType) 消歧。
 *
 * 默认模式下一个组名只能绑定一种内容类型；开启 allowReusingGroupNames 后，
 * 同名组可绑定到多种互不相关的内容类型，查询时按内容类型区分。
 *
 * 注册表只在配置阶段修改；freeze() 之后只读，可被并发读取。
 */
export class GroupRegistry<TKey> {
  private readonly allowReusingGroupNames: boolean;
  private groups: Group<TKey>[] = [];
  private frozen = false;

  constructor(allowReusingGroupNames = false) {
    this.allowReusingGroupNames = allowReusingGroupNames;
  }

  /** 组的数量（每个 (name, contentType) 计一个）。 */
  get size(): number {
    return this.groups.length;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get reusesGroupNames(): boolean {
    return this.allowReusingGroupNames;
  }

  /**
   * 注册组。
   *
   * 相同 (name, contentType) 再次注册时替换其谓词，已声明的权限保留。
   *
   * @param name - 组名（大小写不敏感）。
   * @param contentType - 谓词接受的内容类型。
   * @param match - 成员谓词。
   * @returns 注册后的组。
   * @throws DuplicateGroupNameError 未开启复用且组名已绑定其他内容类型时。
   */
  addGroup<T>(name: string, contentType: ContentType<T>, match: MatchFn<T, TKey>): Group<TKey> {
    this.assertMutable();
    const sameName = this.findByName(name);

    const existing = sameName.find((g) => g.contentType.name === contentType.name);
    if (existing) {
      existing.replaceMatch(contentType, match);
      return existing;
    }

    if (!this.allowReusingGroupNames && sameName.length > 0) {
      throw new DuplicateGroupNameError(name, sameName[0].contentType.name, contentType.name);
    }

    const group = Group.create(name, contentType, match);
    this.groups.push(group);
    return group;
  }

  /**
   * 为组声明权限。
   *
   * 复用组名时若同名组不止一个，必须传 contentType 消歧。
   *
   * @param groupName - 组名。
   * @param permission - 权限名。
   * @param value - 权限值。
   * @param contentType - 可选，组绑定的内容类型。
   * @returns 被修改的组。
   * @throws UnknownGroupError 找不到组时。
   * @throws AmbiguousGroupNameError 同名组有多个且未指定 contentType 时。
   */
  addPermission(
    groupName: string,
    permission: string,
    value: PermissionValue,
    contentType?: ContentTypeRef,
  ): Group<TKey> {
    this.assertMutable();
    const group = this.resolveOne(groupName, contentType);
    group.setPermission(permission, value);
    return group;
  }

  /**
   * 查找某内容类型下声明了指定权限的所有组（含 inherit）。
   */
  groupsFor(contentType: ContentTypeRef, permission: string): Group<TKey>[] {
    const typeName = contentTypeName(contentType);
    return this.groups.filter((g) => g.contentType.name === typeName && g.hasPermission(permission));
  }

  /**
   * 按组名查找（大小写不敏感），可能返回多个不同内容类型的组。
   */
  findByName(groupName: string): Group<TKey>[] {
    const key = normalizeName(groupName);
    return this.groups.filter((g) => g.key === key);
  }

  /**
   * 按组名和可选的内容类型解析出唯一的组。
   *
   * @throws UnknownGroupError 找不到组时。
   * @throws AmbiguousGroupNameError 匹配到多个组时。
   */
  resolveOne(groupName: string, contentType?: ContentTypeRef): Group<TKey> {
    const candidates = this.findByName(groupName);
    if (contentType !== undefined) {
      const typeName = contentTypeName(contentType);
      const group = candidates.find((g) => g.contentType.name === typeName);
      if (!group) {
        throw new UnknownGroupError(groupName, typeName);
      }
      return group;
    }

    if (candidates.length === 0) {
      throw new UnknownGroupError(groupName);
    }
    if (candidates.length > 1) {
      throw new AmbiguousGroupNameError(groupName, candidates.map((g) => g.contentType.name));
    }
    return candidates[0];
  }

  /** 按注册顺序列出所有组。 */
  list(): readonly Group<TKey>[] {
    return this.groups;
  }

  /**
   * 生成只读快照。快照中的组与当前注册表互不影响，且同样不可修改。
   */
  freeze(): GroupRegistry<TKey> {
    const snapshot = new GroupRegistry<TKey>(this.allowReusingGroupNames);
    snapshot.groups = this.groups.map((g) => g.freeze());
    snapshot.frozen = true;
    return snapshot;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new RegistryFrozenError();
    }
  }
}

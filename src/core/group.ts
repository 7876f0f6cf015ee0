import type { ContentType } from './content-type.js';
import { RegistryFrozenError, TypeMismatchError } from './errors.js';
import { normalizeName, type PermissionValue } from './permission-value.js';

/**
 * 组成员谓词：给定条目和用户 key，判断该用户是否属于此组。
 * 函数体由应用提供，引擎只负责调用。
 */
export type MatchFn<T, TKey> = (item: T, userKey: TKey) => boolean;

/** 组内的一条权限声明。 */
export interface GroupPermission {
  /** 首次声明时的权限名称（保留原始大小写）。 */
  name: string;
  value: PermissionValue;
}

/**
 * 命名的关系型权限组。
 *
 * 绑定一种内容类型、一个成员谓词，以及权限名 → 权限值的映射。
 * 谓词以类型擦除的形式保存，但调用前总会用 contentType.is() 校验条目，
 * 所以错误类型的条目会抛出 TypeMismatchError 而不是静默返回 false。
 *
 * 冻结注册表中的组是只读的，修改会抛出 RegistryFrozenError。
 */
export class Group<TKey> {
  readonly name: string;
  private type: ContentType<unknown>;
  private test: (item: unknown, userKey: TKey) => boolean;
  private readonly permissions = new Map<string, GroupPermission>();
  private frozen = false;

  private constructor(name: string, contentType: ContentType<unknown>, test: (item: unknown, userKey: TKey) => boolean) {
    this.name = name;
    this.type = contentType;
    this.test = test;
  }

  /**
   * 创建组。
   *
   * @param name - 组名。
   * @param contentType - 谓词接受的内容类型。
   * @param match - 成员谓词。
   * @returns 新的组实例。
   */
  static create<T, TKey>(name: string, contentType: ContentType<T>, match: MatchFn<T, TKey>): Group<TKey> {
    return new Group<TKey>(name, contentType, Group.guard(name, contentType, match));
  }

  private static guard<T, TKey>(
    name: string,
    contentType: ContentType<T>,
    match: MatchFn<T, TKey>,
  ): (item: unknown, userKey: TKey) => boolean {
    return (item, userKey) => {
      if (!contentType.is(item)) {
        throw new TypeMismatchError(name, contentType.name);
      }
      return match(item, userKey);
    };
  }

  /** 谓词接受的内容类型。 */
  get contentType(): ContentType<unknown> {
    return this.type;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  /** 归一化后的组名。 */
  get key(): string {
    return normalizeName(this.name);
  }

  /**
   * 对条目执行成员谓词。
   *
   * @throws TypeMismatchError 条目不属于本组的内容类型时。
   */
  matches(item: unknown, userKey: TKey): boolean {
    return this.test(item, userKey);
  }

  /**
   * 替换内容类型和成员谓词，已有的权限声明保持不变。
   *
   * @throws RegistryFrozenError 组已冻结时。
   */
  replaceMatch<T>(contentType: ContentType<T>, match: MatchFn<T, TKey>): void {
    this.assertMutable();
    this.type = contentType;
    this.test = Group.guard(this.name, contentType, match);
  }

  /**
   * 读取权限值。
   *
   * @param permission - 权限名（大小写不敏感）。
   * @returns 权限值，未声明时返回 undefined。
   */
  getPermission(permission: string): PermissionValue | undefined {
    return this.permissions.get(normalizeName(permission))?.value;
  }

  /**
   * 设置权限值，后写覆盖先写。
   *
   * @throws RegistryFrozenError 组已冻结时。
   */
  setPermission(permission: string, value: PermissionValue): void {
    this.assertMutable();
    const key = normalizeName(permission);
    const existing = this.permissions.get(key);
    this.permissions.set(key, { name: existing?.name ?? permission, value });
  }

  /** 是否声明了该权限（含 inherit）。 */
  hasPermission(permission: string): boolean {
    return this.permissions.has(normalizeName(permission));
  }

  /** 按声明顺序列出所有权限。 */
  listPermissions(): GroupPermission[] {
    return [...this.permissions.values()].map((p) => ({ ...p }));
  }

  /**
   * 复制一个权限独立的只读副本，用于冻结注册表。
   */
  freeze(): Group<TKey> {
    const copy = new Group<TKey>(this.name, this.type, this.test);
    for (const [key, permission] of this.permissions) {
      copy.permissions.set(key, { ...permission });
    }
    copy.frozen = true;
    return copy;
  }

  private assertMutable(): void {
    if (this.frozen) {
      throw new RegistryFrozenError();
    }
  }
}

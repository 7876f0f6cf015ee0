/**
 * 组对某个权限的态度。
 *
 * - inherit: 不表态，对结果无影响。
 * - allow: 允许，除非被任意 deny 覆盖。
 * - deny: 拒绝，优先于所有 allow。
 */
export type PermissionValue = 'inherit' | 'allow' | 'deny';

/** 所有合法的权限值。 */
export const PERMISSION_VALUES = ['inherit', 'allow', 'deny'] as const satisfies readonly PermissionValue[];

/** 用户的一条全局（非关系型）权限。 */
export interface GlobalPermission {
  /** 权限名称（大小写不敏感）。 */
  name: string;
  /** 权限值。 */
  value: PermissionValue;
}

/**
 * 名称归一化。组名和权限名都按大小写不敏感比较。
 *
 * @param name - 原始名称。
 * @returns 归一化后的 key。
 */
export function normalizeName(name: string): string {
  return name.toLowerCase();
}

/**
 * 合并多个权限值：任一 deny 即为 deny，否则任一 allow 即为 allow，否则 inherit。
 *
 * @param values - 待合并的权限值。
 * @returns 合并结果。
 */
export function mergePermissionValues(values: Iterable<PermissionValue>): PermissionValue {
  let result: PermissionValue = 'inherit';
  for (const value of values) {
    if (value === 'deny') {
      return 'deny';
    }
    if (value === 'allow') {
      result = 'allow';
    }
  }
  return result;
}

/**
 * 判断任意值是否为合法的权限值。
 */
export function isPermissionValue(value: unknown): value is PermissionValue {
  return typeof value === 'string' && (PERMISSION_VALUES as readonly string[]).includes(value);
}

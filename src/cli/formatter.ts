import type { TaggedItem } from '../core/content-type.js';
import type { Decision } from '../core/engine.js';
import { describeExpression } from '../core/expression.js';
import type { Group } from '../core/group.js';

/**
 * 条目的单行展示：id 加可选的 title/name。
 */
export function formatItem(item: TaggedItem): string {
  const id = item.id === undefined ? '?' : String(item.id);
  const label = typeof item.title === 'string' ? item.title : typeof item.name === 'string' ? item.name : null;
  return label ? `${id}\t${label}` : id;
}

/**
 * 组列表展示，每组一行：name [contentType] permission=value ...
 */
export function formatGroups<TKey>(groups: readonly Group<TKey>[]): string {
  if (groups.length === 0) {
    return 'No groups defined.';
  }
  return groups
    .map((group) => {
      const permissions = group.listPermissions().map((p) => `${p.name}=${p.value}`);
      return [`${group.name} [${group.contentType.name}]`, ...permissions].join(' ');
    })
    .join('\n');
}

/**
 * explain 命令的输出。
 */
export function formatDecision<T, TKey>(decision: Decision<T, TKey>): string {
  return [
    `content type:   ${decision.contentType.name}`,
    `permission:     ${decision.permission}`,
    `global verdict: ${decision.globalVerdict}`,
    `decision:       ${describeExpression(decision.expression)}`,
  ].join('\n');
}

/** 布尔结果的展示。 */
export function formatVerdict(allowed: boolean): string {
  return allowed ? 'allowed' : 'denied';
}

import type { Group } from './group.js';

/**
 * 决策表达式。
 *
 * 引擎把权限判断构造成由常量、组匹配和 AND/OR/NOT 组成的表达式树，
 * 既可以直接对内存中的条目求值，也可以交给外部的查询翻译层编译成数据库查询。
 */
export type DecisionExpression<TKey> =
  | { kind: 'constant'; value: boolean }
  | { kind: 'match'; group: Group<TKey>; userKey: TKey }
  | { kind: 'not'; operand: DecisionExpression<TKey> }
  | { kind: 'and'; operands: DecisionExpression<TKey>[] }
  | { kind: 'or'; operands: DecisionExpression<TKey>[] };

/** 常量表达式。 */
export function constant<TKey>(value: boolean): DecisionExpression<TKey> {
  return { kind: 'constant', value };
}

/** 组匹配原子：group.match(item, userKey)。 */
export function match<TKey>(group: Group<TKey>, userKey: TKey): DecisionExpression<TKey> {
  return { kind: 'match', group, userKey };
}

/**
 * 取反。常量直接折叠，双重否定消去。
 */
export function not<TKey>(operand: DecisionExpression<TKey>): DecisionExpression<TKey> {
  if (operand.kind === 'constant') {
    return constant<TKey>(!operand.value);
  }
  if (operand.kind === 'not') {
    return operand.operand;
  }
  return { kind: 'not', operand };
}

/**
 * 合取。空集合为 true；含 false 常量时整体为 false；true 常量被忽略。
 */
export function and<TKey>(operands: DecisionExpression<TKey>[]): DecisionExpression<TKey> {
  return combine('and', operands);
}

/**
 * 析取。空集合为 false；含 true 常量时整体为 true；false 常量被忽略。
 */
export function or<TKey>(operands: DecisionExpression<TKey>[]): DecisionExpression<TKey> {
  return combine('or', operands);
}

function combine<TKey>(kind: 'and' | 'or', operands: DecisionExpression<TKey>[]): DecisionExpression<TKey> {
  // and 的单位元是 true，吸收元是 false；or 相反。
  const identity = kind === 'and';
  const flattened: DecisionExpression<TKey>[] = [];

  for (const operand of operands) {
    if (operand.kind === 'constant') {
      if (operand.value !== identity) {
        return constant<TKey>(!identity);
      }
      continue;
    }
    if ((operand.kind === 'and' || operand.kind === 'or') && operand.kind === kind) {
      flattened.push(...operand.operands);
    } else {
      flattened.push(operand);
    }
  }

  if (flattened.length === 0) {
    return constant<TKey>(identity);
  }
  if (flattened.length === 1) {
    return flattened[0];
  }
  return { kind, operands: flattened };
}

/**
 * 对单个条目求值。
 *
 * @param expression - 决策表达式。
 * @param item - 待判断的条目。
 * @returns 表达式结果。
 * @throws TypeMismatchError 条目与某个组的内容类型不符时。
 */
export function evaluate<TKey>(expression: DecisionExpression<TKey>, item: unknown): boolean {
  switch (expression.kind) {
    case 'constant':
      return expression.value;
    case 'match':
      return expression.group.matches(item, expression.userKey);
    case 'not':
      return !evaluate(expression.operand, item);
    case 'and':
      return expression.operands.every((operand) => evaluate(operand, item));
    case 'or':
      return expression.operands.some((operand) => evaluate(operand, item));
  }
}

/**
 * 将表达式渲染为可读文本，如 `match(post-editor) AND NOT match(post-submitter)`。
 */
export function describeExpression<TKey>(expression: DecisionExpression<TKey>): string {
  return render(expression, false);
}

function render<TKey>(expression: DecisionExpression<TKey>, nested: boolean): string {
  switch (expression.kind) {
    case 'constant':
      return expression.value ? 'true' : 'false';
    case 'match':
      return `match(${expression.group.name})`;
    case 'not':
      return `NOT ${render(expression.operand, true)}`;
    case 'and':
    case 'or': {
      const text = expression.operands
        .map((operand) => render(operand, true))
        .join(expression.kind === 'and' ? ' AND ' : ' OR ');
      return nested ? `(${text})` : text;
    }
  }
}

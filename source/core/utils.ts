/**
 * 核心工具函数模块
 */

// 空产生式的两种写法（epsilon 不区分大小写）
export const EPSILON_WORD = 'epsilon'
export const EPSILON_CHAR = 'ε'

// 规则文本使用的正则表达式模式
export const RULE_ARROW = '->'
export const WHITESPACE_PATTERN = /\s+/

export class CompilerError extends Error {}

/**
 * 断言函数，如果条件为假则抛出错误
 */
export function requireCondition(condition: unknown, message: string): asserts condition {
  if (!condition) throw new CompilerError(message)
}

/**
 * 判断记号是否为空产生式标记
 */
export function isEpsilonMarker(token: string): boolean {
  return token === EPSILON_CHAR || token.toLowerCase() === EPSILON_WORD
}

/**
 * 按空白分割字符串，丢弃空片段
 */
export function splitByWhitespace(str: string): string[] {
  return str
    .trim()
    .split(WHITESPACE_PATTERN)
    .filter(part => part.length > 0)
}

/**
 * 保序去重
 */
export function uniqueInOrder<T>(items: Iterable<T>): T[] {
  return [...new Set(items)]
}

/**
 * 右线性文法相关的类型定义
 */

/**
 * 已声明的符号表
 */
export type SymbolTables = {
  readonly terminals: readonly string[]
  readonly nonTerminals: readonly string[]
  readonly startSymbol: string
}

/**
 * 未经校验的规则：左部与已切分的右部记号
 */
export type RawRule = {
  source: string
  body: string[]
  ruleNumber?: number // 规则编号（从1开始），用于报错
  text?: string // 规则原文，用于报错
}

/**
 * A -> ε
 */
export type EpsilonProduction = {
  readonly shape: 'epsilon'
  readonly source: string
}

/**
 * A -> a
 */
export type TerminalProduction = {
  readonly shape: 'terminal'
  readonly source: string
  readonly terminal: string
}

/**
 * A -> aB
 */
export type TerminalTargetProduction = {
  readonly shape: 'terminalTarget'
  readonly source: string
  readonly terminal: string
  readonly target: string
}

/**
 * 校验后的产生式
 */
export type ProductionRule = EpsilonProduction | TerminalProduction | TerminalTargetProduction

/**
 * 文法声明：符号集与有序的规则序列
 */
export type GrammarDeclaration = {
  terminals: string[]
  nonTerminals: string[]
  startSymbol: string
  rules: RawRule[]
}

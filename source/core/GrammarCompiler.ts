/**
 * 文法编译入口：符号表 -> 规则校验 -> NFA构造 -> epsilon闭包
 */

import { GrammarDeclaration, ProductionRule, SymbolTables } from './grammar/GrammarTypes'
import { createSymbolTables } from './grammar/SymbolTables'
import { validateRules } from './grammar/RuleValidator'
import { NondeterministicAutomaton } from './automata/NondeterministicAutomaton'
import { EpsilonClosureTable, computeClosureTable } from './automata/EpsilonClosure'
import { SimulationResult, simulate } from './automata/Simulator'

/**
 * 编译完成的文法，构造后只读，可供任意多次模拟共享
 */
export type CompiledGrammar = {
  readonly tables: SymbolTables
  readonly rules: readonly ProductionRule[]
  readonly automaton: NondeterministicAutomaton
  readonly closures: EpsilonClosureTable
}

/**
 * 编译文法声明，任何一步失败都抛出 GrammarBuildError，不返回部分结果
 */
export function compileGrammar(declaration: GrammarDeclaration): CompiledGrammar {
  const tables = createSymbolTables(declaration.terminals, declaration.nonTerminals, declaration.startSymbol)
  const rules = Object.freeze(validateRules(declaration.rules, tables))
  const automaton = NondeterministicAutomaton.buildFromGrammar(tables, rules)
  const closures = computeClosureTable(automaton)
  return Object.freeze({ tables, rules, automaton, closures })
}

/**
 * 用编译好的文法模拟输入串
 */
export function runGrammar(compiled: CompiledGrammar, input: string | readonly string[]): SimulationResult {
  return simulate(compiled.automaton, compiled.closures, input)
}

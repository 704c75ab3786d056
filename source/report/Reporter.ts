/**
 * 结果输出：接受/拒绝判定、字母表检查、状态集合演化与自动机结构
 */

import { NondeterministicAutomaton } from '../core/automata/NondeterministicAutomaton'
import { SimulationResult, toSymbols } from '../core/automata/Simulator'
import { getStateName } from '../core/automata/StateMachine'
import { CompiledGrammar, runGrammar } from '../core/GrammarCompiler'
import { splitByWhitespace } from '../core/utils'

export const EMPTY_SET_TEXT = '∅'

/**
 * 切分输入串：含空白或字母表中有多字符符号时按空白切分，否则逐字符切分
 */
export function tokenizeInput(input: string, alphabet: readonly string[]): string[] {
  if (/\s/.test(input) || alphabet.some(symbol => [...symbol].length > 1)) {
    return splitByWhitespace(input)
  }
  return [...input]
}

/**
 * 找出输入中不属于字母表的符号（保序去重）
 */
export function findForeignSymbols(alphabet: readonly string[], input: string | readonly string[]): string[] {
  const foreign = toSymbols(input).filter(symbol => !alphabet.includes(symbol))
  return [...new Set(foreign)]
}

/**
 * 状态集合的文本形式，按状态索引排序
 */
export function formatStateSet(nfa: NondeterministicAutomaton, states: ReadonlySet<number>): string {
  if (states.size === 0) {
    return EMPTY_SET_TEXT
  }
  const names = [...states]
    .sort((a, b) => a - b)
    .map(index => {
      const state = nfa.getState(index)
      return state ? getStateName(state) : `#${index}`
    })
  return `{${names.join(', ')}}`
}

/**
 * 判定结果，一行
 */
export function formatVerdict(
  input: string,
  symbols: readonly string[],
  result: SimulationResult,
  alphabet: readonly string[]
): string {
  const foreign = findForeignSymbols(alphabet, symbols)
  if (foreign.length > 0) {
    return `串 '${input}'：拒绝（含有字母表之外的符号：${foreign.join(', ')}）`
  }
  return `串 '${input}'：${result.accepted ? '接受' : '拒绝'}`
}

/**
 * 逐步输出状态集合的变化
 */
export function formatFrontiers(
  nfa: NondeterministicAutomaton,
  symbols: readonly string[],
  result: SimulationResult
): string[] {
  return result.frontiers.map((frontier, step) =>
    step === 0
      ? `  初始: ${formatStateSet(nfa, frontier)}`
      : `  读入 '${symbols[step - 1]}': ${formatStateSet(nfa, frontier)}`
  )
}

/**
 * 自动机结构
 */
export function formatAutomaton(nfa: NondeterministicAutomaton): string[] {
  const description = nfa.describe()
  const lines = [
    `状态: ${description.states.join(', ')}`,
    `字母表: ${description.alphabet.join(', ')}`,
    `开始状态: ${description.start}`,
    `接受状态: ${description.accepting.join(', ')}`,
    '转移:',
  ]
  for (const transition of description.transitions) {
    lines.push(`  (${transition.from}, ${transition.symbol}) -> {${transition.to.join(', ')}}`)
  }
  return lines
}

/**
 * 检查一个输入串，返回要输出的各行
 * @param trace 是否附带逐步的状态集合
 */
export function reportString(compiled: CompiledGrammar, input: string, trace: boolean = false): string[] {
  const alphabet = compiled.automaton.symbolSet
  const symbols = tokenizeInput(input, alphabet)
  const result = runGrammar(compiled, symbols)
  const lines = [formatVerdict(input, symbols, result, alphabet)]
  if (trace) {
    lines.push(...formatFrontiers(compiled.automaton, symbols, result))
  }
  return lines
}

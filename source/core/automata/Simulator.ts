/**
 * NFA模拟：用状态集合逐个读入符号，判断串是否被接受
 */

import { NondeterministicAutomaton } from './NondeterministicAutomaton'
import { EpsilonClosureTable, closureOfSet } from './EpsilonClosure'

/**
 * 模拟结果
 * frontiers[0] 为初始状态集合，frontiers[i] 为读入第i个符号后的状态集合
 */
export type SimulationResult = {
  accepted: boolean
  frontiers: ReadonlySet<number>[]
}

/**
 * 将输入串切分为符号序列，字符串按字符切分
 */
export function toSymbols(input: string | readonly string[]): string[] {
  return typeof input === 'string' ? [...input] : [...input]
}

/**
 * 模拟NFA读入输入串
 * 不在字母表中的符号没有转移，状态集合变为空，最终拒绝；模拟本身不会失败
 * @param nfa 自动机
 * @param closures 预计算的epsilon闭包表
 * @param input 输入串或符号序列
 */
export function simulate(
  nfa: NondeterministicAutomaton,
  closures: EpsilonClosureTable,
  input: string | readonly string[]
): SimulationResult {
  let frontier = closureOfSet(closures, [nfa.initialState])
  const frontiers: ReadonlySet<number>[] = [frontier]

  for (const symbol of toSymbols(input)) {
    // 空集合不会再产生任何状态
    if (frontier.size > 0) {
      frontier = closureOfSet(closures, nfa.computeStateMove(frontier, symbol))
    }
    frontiers.push(frontier)
  }

  const accepted = [...frontier].some(state => nfa.isAccepting(state))
  return { accepted, frontiers }
}

/**
 * 只返回是否接受
 */
export function accepts(
  nfa: NondeterministicAutomaton,
  closures: EpsilonClosureTable,
  input: string | readonly string[]
): boolean {
  return simulate(nfa, closures, input).accepted
}

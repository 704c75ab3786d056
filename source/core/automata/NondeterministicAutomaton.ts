/**
 * 非确定有限状态自动机（NFA）
 * 支持epsilon转移，由右线性文法构造
 */

import {
  StateMachineBase,
  MachineState,
  SpecialSymbol,
  ACCEPTING_STATE,
  createNonTerminalState,
  getStateName,
  getSpecialSymbolName,
} from './StateMachine'
import { requireCondition } from '../utils'
import { GrammarErrorKind, requireGrammar } from '../GrammarError'
import { ProductionRule, SymbolTables } from '../grammar/GrammarTypes'

/**
 * 转移的结构化描述
 */
export type TransitionDescription = {
  from: string
  symbol: string
  to: string[]
}

/**
 * 自动机的结构化描述，用于比较与输出
 */
export type AutomatonDescription = {
  states: string[]
  alphabet: string[]
  transitions: TransitionDescription[]
  start: string
  accepting: string[]
}

/**
 * 非确定有限状态自动机
 */
export class NondeterministicAutomaton extends StateMachineBase {
  private _nonTerminalIndex: Map<string, number> = new Map()

  private constructor() {
    super()
  }

  /**
   * 接受状态的索引（恒为最后一个状态）
   */
  get acceptingStateIndex(): number {
    return this._stateList.length - 1
  }

  /**
   * 查找非终结符对应的状态索引
   */
  stateIndexOf(nonTerminal: string): number | undefined {
    return this._nonTerminalIndex.get(nonTerminal)
  }

  getState(stateIndex: number): MachineState | undefined {
    return this._stateList[stateIndex]
  }

  /**
   * move操作：从状态集合通过一个字符能到达的状态（不考虑epsilon边）
   * 不在字母表中的符号没有任何转移，结果为空集
   * @param states 状态集合
   * @param symbol 输入符号
   */
  computeStateMove(states: Iterable<number>, symbol: string): Set<number> {
    const result = new Set<number>()
    const symbolIndex = this.symbolIndexOf(symbol)
    if (symbolIndex === undefined) {
      return result
    }
    for (const state of states) {
      for (const target of this.getTargets(state, symbolIndex)) {
        result.add(target)
      }
    }
    return result
  }

  /**
   * 生成结构化描述，状态与转移按构造顺序排列
   */
  describe(): AutomatonDescription {
    const transitions: TransitionDescription[] = []
    this._transitionTable.forEach((row, stateIndex) => {
      for (const [inputSymbol, targets] of row) {
        transitions.push({
          from: getStateName(this._stateList[stateIndex]),
          symbol: inputSymbol < 0 ? getSpecialSymbolName(inputSymbol) : this._symbolSet[inputSymbol],
          to: [...targets].map(target => getStateName(this._stateList[target])),
        })
      }
    })

    return {
      states: this._stateList.map(getStateName),
      alphabet: [...this._symbolSet],
      transitions,
      start: getStateName(this._stateList[this._initialState]),
      accepting: this._acceptingStates.map(index => getStateName(this._stateList[index])),
    }
  }

  /**
   * 从右线性文法构造NFA
   * 每个非终结符对应一个状态，另加一个接受状态：
   *   A -> ε   ：(A, ε) -> 接受状态
   *   A -> a   ：(A, a) -> 接受状态
   *   A -> aB  ：(A, a) -> B
   * @param tables 符号表
   * @param rules 校验后的产生式序列
   * @returns 构造的NFA
   */
  static buildFromGrammar(tables: SymbolTables, rules: readonly ProductionRule[]): NondeterministicAutomaton {
    requireGrammar(rules.length > 0, GrammarErrorKind.EmptyGrammar, '没有任何产生式')
    requireGrammar(
      tables.nonTerminals.includes(tables.startSymbol),
      GrammarErrorKind.UndeclaredStartSymbol,
      `开始符号 '${tables.startSymbol}' 不在非终结符集合中`
    )

    const nfa = new NondeterministicAutomaton()
    nfa._symbolSet = [...tables.terminals]

    tables.nonTerminals.forEach((nonTerminal, index) => {
      nfa._stateList.push(createNonTerminalState(nonTerminal))
      nfa._nonTerminalIndex.set(nonTerminal, index)
    })
    nfa._stateList.push(ACCEPTING_STATE)
    nfa._transitionTable = nfa._stateList.map(() => new Map())

    nfa._initialState = nfa.requireStateIndex(tables.startSymbol)
    nfa._acceptingStates = [nfa.acceptingStateIndex]

    for (const rule of rules) {
      const sourceIndex = nfa.requireStateIndex(rule.source)
      switch (rule.shape) {
        case 'epsilon':
          nfa.addTransition(sourceIndex, SpecialSymbol.EPSILON, nfa.acceptingStateIndex)
          break
        case 'terminal':
          nfa.addTransition(sourceIndex, nfa.requireSymbolIndex(rule.terminal), nfa.acceptingStateIndex)
          break
        case 'terminalTarget':
          nfa.addTransition(sourceIndex, nfa.requireSymbolIndex(rule.terminal), nfa.requireStateIndex(rule.target))
          break
      }
    }

    return nfa
  }

  private requireStateIndex(nonTerminal: string): number {
    const index = this._nonTerminalIndex.get(nonTerminal)
    requireCondition(index !== undefined, `非终结符 '${nonTerminal}' 没有对应的状态`)
    return index
  }

  private requireSymbolIndex(terminal: string): number {
    const index = this.symbolIndexOf(terminal)
    requireCondition(index !== undefined, `终结符 '${terminal}' 不在字母表中`)
    return index
  }
}

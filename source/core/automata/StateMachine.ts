/**
 * 有限状态自动机基础类型和类定义
 */

/**
 * 由非终结符得到的状态
 */
export type NonTerminalState = {
  readonly kind: 'nonTerminal'
  readonly nonTerminal: string
}

/**
 * 合成的接受状态，与任何非终结符都不同
 */
export type AcceptingState = {
  readonly kind: 'accepting'
}

/**
 * 自动机状态
 */
export type MachineState = NonTerminalState | AcceptingState

export const ACCEPTING_STATE: AcceptingState = Object.freeze<AcceptingState>({ kind: 'accepting' })

export function createNonTerminalState(nonTerminal: string): NonTerminalState {
  return Object.freeze<NonTerminalState>({ kind: 'nonTerminal', nonTerminal })
}

/**
 * 获取状态的显示名称
 */
export function getStateName(state: MachineState): string {
  return state.kind === 'accepting' ? '[accept]' : state.nonTerminal
}

/**
 * 特殊符号枚举
 */
export enum SpecialSymbol {
  EPSILON = -1, // ε（空字符）
}

/**
 * 获取特殊符号的字符串表示
 */
export function getSpecialSymbolName(symbol: number): string {
  const symbolNames: { [key: string]: string } = { '-1': '[ε]' }
  return symbolNames[String(symbol)] || ''
}

/**
 * 一个状态的出边：输入符号（字母表索引或特殊符号） -> 目标状态索引集合
 */
export type TransitionRow = Map<number, Set<number>>

const NO_TARGETS: ReadonlySet<number> = new Set()

/**
 * 有限状态自动机基类
 * 状态、符号都以索引表示
 */
export class StateMachineBase {
  protected _symbolSet: string[] = [] // 字母表
  protected _stateList: MachineState[] = [] // 所有状态
  protected _initialState: number = -1 // 初始状态索引
  protected _acceptingStates: number[] = [] // 接受状态索引
  protected _transitionTable: TransitionRow[] = [] // 状态转移表

  get initialState(): number {
    return this._initialState
  }

  get acceptingStates(): readonly number[] {
    return this._acceptingStates
  }

  get stateList(): readonly MachineState[] {
    return this._stateList
  }

  get symbolSet(): readonly string[] {
    return this._symbolSet
  }

  get stateCount(): number {
    return this._stateList.length
  }

  isAccepting(stateIndex: number): boolean {
    return this._acceptingStates.includes(stateIndex)
  }

  /**
   * 查找符号在字母表中的索引，不在字母表中返回undefined
   */
  symbolIndexOf(symbol: string): number | undefined {
    const index = this._symbolSet.indexOf(symbol)
    return index === -1 ? undefined : index
  }

  /**
   * 获取从指定状态出发的所有转移
   */
  getTransitionsFromState(stateIndex: number): ReadonlyMap<number, ReadonlySet<number>> {
    return this._transitionTable[stateIndex] ?? new Map()
  }

  /**
   * 获取从指定状态经过指定符号能直接到达的状态
   */
  getTargets(stateIndex: number, inputSymbol: number): ReadonlySet<number> {
    return this._transitionTable[stateIndex]?.get(inputSymbol) ?? NO_TARGETS
  }

  /**
   * 添加一条转移；同一(状态, 符号)的目标取并集，不覆盖
   */
  protected addTransition(sourceIndex: number, inputSymbol: number, targetIndex: number): void {
    const row = this._transitionTable[sourceIndex]
    const targets = row.get(inputSymbol)
    if (targets) {
      targets.add(targetIndex)
    } else {
      row.set(inputSymbol, new Set([targetIndex]))
    }
  }
}

import { closureOfSet, computeClosureTable, computeEpsilonClosure } from './EpsilonClosure'
import { StateMachineBase, SpecialSymbol, createNonTerminalState } from './StateMachine'
import { NondeterministicAutomaton } from './NondeterministicAutomaton'
import { createSymbolTables } from '../grammar/SymbolTables'

/**
 * 直接按边构造的自动机，可以含有文法产生不了的epsilon环
 */
class EdgeMachine extends StateMachineBase {
  constructor(stateCount: number, edges: [number, number, number][]) {
    super()
    for (let i = 0; i < stateCount; i++) {
      this._stateList.push(createNonTerminalState(`q${i}`))
      this._transitionTable.push(new Map())
    }
    this._initialState = 0
    edges.forEach(([from, symbol, to]) => this.addTransition(from, symbol, to))
  }
}

const e = SpecialSymbol.EPSILON

describe('epsilon closure', () => {
  let machine: EdgeMachine

  beforeAll(() => {
    machine = new EdgeMachine(6, [
      [0, e, 1],
      [1, e, 2],
      [2, e, 0],
      [2, 0, 3],
      [3, e, 3],
      [4, e, 5],
    ])
  })

  test('follows epsilon edges through a cycle', () => {
    expect([...computeEpsilonClosure(machine, 0)].sort()).toEqual([0, 1, 2])
    expect([...computeEpsilonClosure(machine, 2)].sort()).toEqual([0, 1, 2])
    expect([...computeEpsilonClosure(machine, 3)]).toEqual([3])
    expect([...computeEpsilonClosure(machine, 4)].sort()).toEqual([4, 5])
    expect([...computeEpsilonClosure(machine, 5)]).toEqual([5])
  })

  test('every state belongs to its own closure', () => {
    const table = computeClosureTable(machine)
    expect(table).toHaveLength(6)
    table.forEach((closure, state) => expect(closure.has(state)).toBe(true))
  })

  test('closure is a fixed point', () => {
    const table = computeClosureTable(machine)
    table.forEach(closure => expect(closureOfSet(table, closure)).toEqual(closure))
  })

  test('unions closures of a set by lookup', () => {
    const table = computeClosureTable(machine)
    expect([...closureOfSet(table, [3, 4])].sort()).toEqual([3, 4, 5])
    expect(closureOfSet(table, []).size).toBe(0)
  })

  test('closure table of a grammar automaton', () => {
    const tables = createSymbolTables(['a'], ['S', 'A'], 'S')
    const nfa = NondeterministicAutomaton.buildFromGrammar(tables, [
      { shape: 'epsilon', source: 'S' },
      { shape: 'terminalTarget', source: 'S', terminal: 'a', target: 'A' },
    ])
    expect(computeClosureTable(nfa)).toEqual([new Set([0, 2]), new Set([1]), new Set([2])])
  })
})

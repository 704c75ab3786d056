import { accepts, simulate, toSymbols } from './Simulator'
import { computeClosureTable } from './EpsilonClosure'
import { NondeterministicAutomaton } from './NondeterministicAutomaton'
import { createSymbolTables } from '../grammar/SymbolTables'

describe('simulate', () => {
  // S -> aA, A -> b
  const tables = createSymbolTables(['a', 'b'], ['S', 'A'], 'S')
  const nfa = NondeterministicAutomaton.buildFromGrammar(tables, [
    { shape: 'terminalTarget', source: 'S', terminal: 'a', target: 'A' },
    { shape: 'terminal', source: 'A', terminal: 'b' },
  ])
  const closures = computeClosureTable(nfa)

  test('accepts exactly the generated string', () => {
    expect(accepts(nfa, closures, 'ab')).toBe(true)
    expect(accepts(nfa, closures, 'a')).toBe(false)
    expect(accepts(nfa, closures, 'ba')).toBe(false)
    expect(accepts(nfa, closures, 'abb')).toBe(false)
    expect(accepts(nfa, closures, '')).toBe(false)
  })

  test('records the frontier after every symbol', () => {
    const result = simulate(nfa, closures, 'ab')
    expect(result.accepted).toBe(true)
    expect(result.frontiers).toEqual([new Set([0]), new Set([1]), new Set([2])])
  })

  test('an empty frontier stays empty', () => {
    const result = simulate(nfa, closures, 'bab')
    expect(result.accepted).toBe(false)
    expect(result.frontiers.map(frontier => frontier.size)).toEqual([1, 0, 0, 0])
  })

  test('symbols outside the alphabet reject without failing', () => {
    const result = simulate(nfa, closures, 'ac')
    expect(result.accepted).toBe(false)
    expect(result.frontiers).toEqual([new Set([0]), new Set([1]), new Set()])
  })

  test('takes a symbol sequence', () => {
    expect(accepts(nfa, closures, ['a', 'b'])).toBe(true)
    expect(accepts(nfa, closures, ['ab'])).toBe(false)
  })

  test('serves independent runs from one automaton', () => {
    const first = simulate(nfa, closures, 'ab')
    const second = simulate(nfa, closures, 'a')
    expect(first.accepted).toBe(true)
    expect(second.accepted).toBe(false)
    expect(simulate(nfa, closures, 'ab')).toEqual(first)
  })
})

describe('simulate with epsilon rules', () => {
  test('decides the empty string from the initial closure', () => {
    // S -> ε
    const tables = createSymbolTables(['a'], ['S'], 'S')
    const nfa = NondeterministicAutomaton.buildFromGrammar(tables, [{ shape: 'epsilon', source: 'S' }])
    const closures = computeClosureTable(nfa)
    expect(accepts(nfa, closures, '')).toBe(true)
    expect(accepts(nfa, closures, 'a')).toBe(false)
  })

  test('follows non-deterministic branches', () => {
    // S -> 0S | 1S | 0A, A -> 1B, B -> ε
    const tables = createSymbolTables(['0', '1'], ['S', 'A', 'B'], 'S')
    const nfa = NondeterministicAutomaton.buildFromGrammar(tables, [
      { shape: 'terminalTarget', source: 'S', terminal: '0', target: 'S' },
      { shape: 'terminalTarget', source: 'S', terminal: '1', target: 'S' },
      { shape: 'terminalTarget', source: 'S', terminal: '0', target: 'A' },
      { shape: 'terminalTarget', source: 'A', terminal: '1', target: 'B' },
      { shape: 'epsilon', source: 'B' },
    ])
    const closures = computeClosureTable(nfa)
    expect(accepts(nfa, closures, '01')).toBe(true)
    expect(accepts(nfa, closures, '1101')).toBe(true)
    expect(accepts(nfa, closures, '10')).toBe(false)
    expect(accepts(nfa, closures, '0')).toBe(false)
    expect(accepts(nfa, closures, '')).toBe(false)
    expect(simulate(nfa, closures, '1101').frontiers[4]).toEqual(new Set([0, 2, 3]))
  })
})

describe('toSymbols', () => {
  test('splits strings into characters and copies arrays', () => {
    expect(toSymbols('ab')).toEqual(['a', 'b'])
    expect(toSymbols('')).toEqual([])
    expect(toSymbols(['id', '+'])).toEqual(['id', '+'])
  })
})

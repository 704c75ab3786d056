import { findForeignSymbols, formatAutomaton, formatStateSet, formatVerdict, reportString, tokenizeInput } from './Reporter'
import { compileGrammar, runGrammar } from '../core/GrammarCompiler'
import { parseRuleLines } from '../generator/grammar/GrammarFileParser'

describe('Reporter', () => {
  const compiled = compileGrammar({
    terminals: ['a', 'b'],
    nonTerminals: ['S', 'A'],
    startSymbol: 'S',
    rules: parseRuleLines(['S -> aA', 'A -> b']),
  })

  test('findForeignSymbols', () => {
    expect(findForeignSymbols(['a', 'b'], 'cabc d')).toEqual(['c', ' ', 'd'])
    expect(findForeignSymbols(['a', 'b'], 'abba')).toEqual([])
  })

  test('formatStateSet', () => {
    expect(formatStateSet(compiled.automaton, new Set([2, 0]))).toBe('{S, [accept]}')
    expect(formatStateSet(compiled.automaton, new Set())).toBe('∅')
    expect(formatStateSet(compiled.automaton, new Set([9]))).toBe('{#9}')
  })

  test('formatVerdict', () => {
    expect(formatVerdict('ab', ['a', 'b'], runGrammar(compiled, 'ab'), ['a', 'b'])).toBe("串 'ab'：接受")
    expect(formatVerdict('ba', ['b', 'a'], runGrammar(compiled, 'ba'), ['a', 'b'])).toBe("串 'ba'：拒绝")
    expect(formatVerdict('', [], runGrammar(compiled, ''), ['a', 'b'])).toBe("串 ''：拒绝")
  })

  test('reportString with frontiers', () => {
    expect(reportString(compiled, 'ab')).toEqual(["串 'ab'：接受"])
    expect(reportString(compiled, 'ac', true)).toEqual([
      "串 'ac'：拒绝（含有字母表之外的符号：c）",
      '  初始: {S}',
      "  读入 'a': {A}",
      "  读入 'c': ∅",
    ])
  })

  test('formatAutomaton', () => {
    expect(formatAutomaton(compiled.automaton)).toEqual([
      '状态: S, A, [accept]',
      '字母表: a, b',
      '开始状态: S',
      '接受状态: [accept]',
      '转移:',
      '  (S, a) -> {A}',
      '  (A, b) -> {[accept]}',
    ])
  })
})

describe('tokenizeInput', () => {
  test('splits per character for a single-character alphabet', () => {
    expect(tokenizeInput('abc', ['a', 'b'])).toEqual(['a', 'b', 'c'])
    expect(tokenizeInput('', ['a', 'b'])).toEqual([])
  })

  test('splits on whitespace when the input has any', () => {
    expect(tokenizeInput(' a  b ', ['a', 'b'])).toEqual(['a', 'b'])
  })

  test('splits on whitespace when the alphabet has a multi-character symbol', () => {
    expect(tokenizeInput('id', ['id', '+'])).toEqual(['id'])
    expect(tokenizeInput('id + id', ['id', '+'])).toEqual(['id', '+', 'id'])
    expect(tokenizeInput('', ['id', '+'])).toEqual([])
  })
})

describe('Reporter with multi-character terminals', () => {
  // E -> id T | id, T -> + E
  const symbols = ['id', '+', 'E', 'T']
  const compiled = compileGrammar({
    terminals: ['id', '+'],
    nonTerminals: ['E', 'T'],
    startSymbol: 'E',
    rules: parseRuleLines(['E -> id T | id', 'T -> + E'], symbols),
  })

  test('accepts whole-symbol input', () => {
    expect(reportString(compiled, 'id + id')).toEqual(["串 'id + id'：接受"])
    expect(reportString(compiled, 'id')).toEqual(["串 'id'：接受"])
    expect(reportString(compiled, 'id +')).toEqual(["串 'id +'：拒绝"])
  })

  test('names only the symbols really outside the alphabet', () => {
    expect(reportString(compiled, 'id x')).toEqual(["串 'id x'：拒绝（含有字母表之外的符号：x）"])
  })

  test('traces frontiers per symbol', () => {
    expect(reportString(compiled, 'id + id', true)).toEqual([
      "串 'id + id'：接受",
      '  初始: {E}',
      "  读入 'id': {T, [accept]}",
      "  读入 '+': {E}",
      "  读入 'id': {T, [accept]}",
    ])
  })
})

/**
 * 符号表的创建与校验
 */

import { GrammarErrorKind, requireGrammar } from '../GrammarError'
import { isEpsilonMarker, uniqueInOrder } from '../utils'
import { SymbolTables } from './GrammarTypes'

/**
 * 创建符号表
 * 终结符与非终结符保序去重，两者必须非空且不相交，开始符号必须是已声明的非终结符
 */
export function createSymbolTables(
  terminals: Iterable<string>,
  nonTerminals: Iterable<string>,
  startSymbol: string
): SymbolTables {
  const terminalList = uniqueInOrder(terminals)
  const nonTerminalList = uniqueInOrder(nonTerminals)

  requireGrammar(terminalList.length > 0, GrammarErrorKind.EmptySymbolSet, '至少需要声明一个终结符')
  requireGrammar(nonTerminalList.length > 0, GrammarErrorKind.EmptySymbolSet, '至少需要声明一个非终结符')

  const reserved = [...terminalList, ...nonTerminalList].filter(isEpsilonMarker)
  requireGrammar(
    reserved.length === 0,
    GrammarErrorKind.ReservedSymbol,
    `空产生式标记不能用作符号：${reserved.join(', ')}`
  )

  const overlap = terminalList.filter(symbol => nonTerminalList.includes(symbol))
  requireGrammar(
    overlap.length === 0,
    GrammarErrorKind.OverlappingSymbols,
    `终结符与非终结符不能重叠：${overlap.join(', ')}`
  )

  requireGrammar(
    nonTerminalList.includes(startSymbol),
    GrammarErrorKind.UndeclaredStartSymbol,
    `开始符号 '${startSymbol}' 不在非终结符集合 {${nonTerminalList.join(', ')}} 中`
  )

  return Object.freeze({
    terminals: Object.freeze(terminalList),
    nonTerminals: Object.freeze(nonTerminalList),
    startSymbol,
  })
}

export function isTerminal(tables: SymbolTables, symbol: string): boolean {
  return tables.terminals.includes(symbol)
}

export function isNonTerminal(tables: SymbolTables, symbol: string): boolean {
  return tables.nonTerminals.includes(symbol)
}

/**
 * 文法构建错误
 */

import { CompilerError } from './utils'

/**
 * 错误类型
 */
export enum GrammarErrorKind {
  InvalidRuleShape = 'InvalidRuleShape',
  UnknownSymbol = 'UnknownSymbol',
  NonTerminalStartRequired = 'NonTerminalStartRequired',
  EmptyGrammar = 'EmptyGrammar',
  UndeclaredStartSymbol = 'UndeclaredStartSymbol',
  EmptySymbolSet = 'EmptySymbolSet',
  OverlappingSymbols = 'OverlappingSymbols',
  ReservedSymbol = 'ReservedSymbol',
}

const KIND_LABELS: Record<GrammarErrorKind, string> = {
  [GrammarErrorKind.InvalidRuleShape]: '产生式形式错误',
  [GrammarErrorKind.UnknownSymbol]: '未声明的符号',
  [GrammarErrorKind.NonTerminalStartRequired]: '左部必须是非终结符',
  [GrammarErrorKind.EmptyGrammar]: '文法为空',
  [GrammarErrorKind.UndeclaredStartSymbol]: '开始符号未声明',
  [GrammarErrorKind.EmptySymbolSet]: '符号集为空',
  [GrammarErrorKind.OverlappingSymbols]: '符号集重叠',
  [GrammarErrorKind.ReservedSymbol]: '保留符号',
}

/**
 * 获取错误类型的可读名称
 */
export function getErrorKindLabel(kind: GrammarErrorKind): string {
  return KIND_LABELS[kind]
}

/**
 * 扩展的编译器错误类，包含出错规则的编号和原文
 */
export class GrammarBuildError extends CompilerError {
  public readonly kind: GrammarErrorKind
  public readonly ruleNumber: number
  public readonly ruleText: string

  constructor(kind: GrammarErrorKind, message: string, ruleNumber: number = 0, ruleText: string = '') {
    super(GrammarBuildError.formatMessage(kind, message, ruleNumber, ruleText))
    this.kind = kind
    this.ruleNumber = ruleNumber
    this.ruleText = ruleText
    this.name = 'GrammarBuildError'
  }

  private static formatMessage(kind: GrammarErrorKind, message: string, ruleNumber: number, ruleText: string): string {
    const location = ruleNumber > 0 ? `规则${ruleNumber}` : ''
    const text = ruleText ? `「${ruleText}」` : ''
    const prefix = location || text ? `${location}${text}：` : ''
    return `[${getErrorKindLabel(kind)}] ${prefix}${message}`
  }
}

/**
 * 条件不成立时抛出指定类型的文法错误
 */
export function requireGrammar(
  condition: unknown,
  kind: GrammarErrorKind,
  message: string,
  ruleNumber?: number,
  ruleText?: string
): asserts condition {
  if (!condition) throw new GrammarBuildError(kind, message, ruleNumber, ruleText)
}

/**
 * 产生式校验
 * 只接受三种右线性形式，按以下优先级尝试：
 *   1. A -> ε
 *   2. A -> aB
 *   3. A -> a
 */

import { GrammarErrorKind, requireGrammar, GrammarBuildError } from '../GrammarError'
import { isEpsilonMarker, RULE_ARROW } from '../utils'
import { ProductionRule, RawRule, SymbolTables } from './GrammarTypes'
import { isNonTerminal, isTerminal } from './SymbolTables'

/**
 * 规则的可读文本，报错时使用
 */
export function describeRawRule(raw: RawRule): string {
  return raw.text ?? `${raw.source} ${RULE_ARROW} ${raw.body.join(' ')}`.trimEnd()
}

/**
 * 校验一条规则，返回对应的产生式
 * @param raw 未经校验的规则
 * @param tables 符号表
 */
export function validateRule(raw: RawRule, tables: SymbolTables): ProductionRule {
  const ruleNumber = raw.ruleNumber ?? 0
  const ruleText = describeRawRule(raw)
  const fail = (kind: GrammarErrorKind, message: string) => new GrammarBuildError(kind, message, ruleNumber, ruleText)

  if (!isNonTerminal(tables, raw.source)) {
    throw fail(GrammarErrorKind.NonTerminalStartRequired, `左部符号 '${raw.source}' 不是已声明的非终结符`)
  }

  const body = raw.body
  if (body.length === 0) {
    throw fail(GrammarErrorKind.InvalidRuleShape, '右部为空，空产生式请写作 epsilon 或 ε')
  }
  if (body.includes(RULE_ARROW)) {
    throw fail(GrammarErrorKind.InvalidRuleShape, `右部中出现多余的 '${RULE_ARROW}'`)
  }

  // 形式1：A -> ε
  if (body.length === 1 && isEpsilonMarker(body[0])) {
    return { shape: 'epsilon', source: raw.source }
  }

  for (const token of body) {
    requireGrammar(
      isTerminal(tables, token) || isNonTerminal(tables, token) || isEpsilonMarker(token),
      GrammarErrorKind.UnknownSymbol,
      `符号 '${token}' 既不是终结符也不是非终结符`,
      ruleNumber,
      ruleText
    )
  }

  // 形式2：A -> aB
  if (body.length === 2) {
    const [terminal, target] = body
    requireGrammar(
      isTerminal(tables, terminal),
      GrammarErrorKind.InvalidRuleShape,
      `'${terminal}' 处需要终结符`,
      ruleNumber,
      ruleText
    )
    requireGrammar(
      isNonTerminal(tables, target),
      GrammarErrorKind.InvalidRuleShape,
      `'${target}' 处需要非终结符`,
      ruleNumber,
      ruleText
    )
    return { shape: 'terminalTarget', source: raw.source, terminal, target }
  }

  // 形式3：A -> a
  if (body.length === 1) {
    requireGrammar(
      isTerminal(tables, body[0]),
      GrammarErrorKind.InvalidRuleShape,
      `'${body[0]}' 处需要终结符`,
      ruleNumber,
      ruleText
    )
    return { shape: 'terminal', source: raw.source, terminal: body[0] }
  }

  throw fail(
    GrammarErrorKind.InvalidRuleShape,
    `右部有 ${body.length} 个符号，只允许 'a'、'aB' 或 epsilon 形式`
  )
}

/**
 * 依次校验所有规则，遇到第一条非法规则即中止
 */
export function validateRules(rules: readonly RawRule[], tables: SymbolTables): ProductionRule[] {
  return rules.map(raw => validateRule(raw, tables))
}

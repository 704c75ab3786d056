/**
 * 文法定义文件解析器
 * 文件由声明行与规则行组成，例如：
 *
 *   terminals: a b
 *   nonterminals: S A
 *   start: S
 *   S -> aA | b
 *   A -> epsilon
 *
 * 以 # 开头的行与空行被忽略
 */

import * as fs from 'fs'
import { requireCondition, isEpsilonMarker, splitByWhitespace, uniqueInOrder, RULE_ARROW } from '../../core/utils'
import { GrammarErrorKind, requireGrammar } from '../../core/GrammarError'
import { GrammarDeclaration, RawRule } from '../../core/grammar/GrammarTypes'

const DECLARATION_PATTERN = /^(terminals|nonterminals|start)\s*:(.*)$/i
const COMMENT_PREFIX = '#'
const ALTERNATIVE_SEPARATOR = '|'

type DeclarationName = 'terminals' | 'nonterminals' | 'start'

/**
 * 解析空白分隔的符号声明
 */
export function parseSymbolList(text: string): string[] {
  return uniqueInOrder(splitByWhitespace(text))
}

/**
 * 切分产生式右部：含空白时按空白切分；整体是已声明符号时不切分；否则逐字符切分
 * @param symbols 已声明的符号
 */
export function tokenizeBody(body: string, symbols: readonly string[] = []): string[] {
  if (isEpsilonMarker(body) || symbols.includes(body)) {
    return [body]
  }
  if (/\s/.test(body)) {
    return splitByWhitespace(body)
  }
  return [...body]
}

/**
 * 解析一行规则，每个 | 分隔的候选式生成一条规则
 * @param line 规则文本，如 "S -> aA | b"
 * @param lineNumber 行号（从1开始）
 * @param symbols 已声明的符号
 */
export function parseRuleLine(line: string, lineNumber: number, symbols: readonly string[] = []): RawRule[] {
  const text = line.trim()
  const arrowIndex = text.indexOf(RULE_ARROW)
  requireGrammar(arrowIndex !== -1, GrammarErrorKind.InvalidRuleShape, `缺少 '${RULE_ARROW}'`, lineNumber, text)

  const head = text.slice(0, arrowIndex).trim()
  const body = text.slice(arrowIndex + RULE_ARROW.length)
  requireGrammar(head.length > 0, GrammarErrorKind.InvalidRuleShape, '规则左部为空', lineNumber, text)
  requireGrammar(
    !body.includes(RULE_ARROW),
    GrammarErrorKind.InvalidRuleShape,
    `出现重复的 '${RULE_ARROW}'`,
    lineNumber,
    text
  )

  const alternatives = body.split(ALTERNATIVE_SEPARATOR).map(alternative => alternative.trim())
  requireGrammar(
    alternatives.every(alternative => alternative.length > 0),
    GrammarErrorKind.InvalidRuleShape,
    `'${head}' 的右部为空或含有空候选式，空产生式请写作 epsilon`,
    lineNumber,
    text
  )

  return alternatives.map(alternative => ({
    source: head,
    body: tokenizeBody(alternative, symbols),
    ruleNumber: lineNumber,
    text: `${head} ${RULE_ARROW} ${alternative}`,
  }))
}

function isSkippedLine(line: string): boolean {
  const trimmed = line.trim()
  return trimmed.length === 0 || trimmed.startsWith(COMMENT_PREFIX)
}

/**
 * 解析多行规则，忽略空行与注释行
 */
export function parseRuleLines(lines: readonly string[], symbols: readonly string[] = []): RawRule[] {
  const rules: RawRule[] = []
  lines.forEach((line, index) => {
    if (!isSkippedLine(line)) {
      rules.push(...parseRuleLine(line, index + 1, symbols))
    }
  })
  return rules
}

/**
 * 文法定义文件解析器
 */
export class GrammarFileParser {
  private readonly _declarations: Map<DeclarationName, string> = new Map()
  private readonly _rules: RawRule[] = []

  get terminals(): string[] {
    return parseSymbolList(this._declarations.get('terminals') ?? '')
  }

  get nonTerminals(): string[] {
    return parseSymbolList(this._declarations.get('nonterminals') ?? '')
  }

  get startSymbol(): string {
    return (this._declarations.get('start') ?? '').trim()
  }

  get rules(): RawRule[] {
    return [...this._rules]
  }

  get declaration(): GrammarDeclaration {
    return {
      terminals: this.terminals,
      nonTerminals: this.nonTerminals,
      startSymbol: this.startSymbol,
      rules: this.rules,
    }
  }

  constructor(content: string) {
    this._parse(content.replace(/\r\n/g, '\n').split('\n'))
  }

  /**
   * 从文件读取并解析
   */
  static fromFile(filePath: string): GrammarFileParser {
    requireCondition(fs.existsSync(filePath), `找不到文法文件: ${filePath}`)
    return new GrammarFileParser(fs.readFileSync(filePath, 'utf-8'))
  }

  private _parse(lines: string[]): void {
    // 先收集声明，规则在声明齐全后再切分
    const ruleLines: [string, number][] = []
    lines.forEach((line, index) => {
      if (isSkippedLine(line)) {
        return
      }
      const match = DECLARATION_PATTERN.exec(line.trim())
      const name = match ? match[1].toLowerCase() : ''
      if (match && isDeclarationName(name)) {
        requireCondition(!this._declarations.has(name), `文法文件结构错误：第${index + 1}行重复声明 ${name}`)
        this._declarations.set(name, match[2])
        return
      }
      ruleLines.push([line, index + 1])
    })

    requireCondition(this._declarations.has('terminals'), '文法文件结构错误：缺少 terminals 声明')
    requireCondition(this._declarations.has('nonterminals'), '文法文件结构错误：缺少 nonterminals 声明')
    requireCondition(this.startSymbol.length > 0, '文法文件结构错误：缺少 start 声明')

    const symbols = [...this.terminals, ...this.nonTerminals]
    for (const [line, lineNumber] of ruleLines) {
      this._rules.push(...parseRuleLine(line, lineNumber, symbols))
    }
  }
}

function isDeclarationName(name: string): name is DeclarationName {
  return name === 'terminals' || name === 'nonterminals' || name === 'start'
}

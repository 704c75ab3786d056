#!/usr/bin/env node
/**
 * 右线性文法 -> ε-NFA 主入口文件
 * 用法: node main.js <path_to_grammar> [options]
 * 选项:
 *   -s <string>  要检查的串，可重复；不提供时从标准输入逐行读取
 *   -t           输出每一步的状态集合
 *   -v           显示构造过程详细信息与自动机结构
 */

import * as readline from 'readline'
import minimist from 'minimist'
import { requireCondition, CompilerError } from './core/utils'
import { GrammarFileParser } from './generator/grammar/GrammarFileParser'
import { compileGrammar, CompiledGrammar } from './core/GrammarCompiler'
import { formatAutomaton, reportString } from './report/Reporter'

const args = minimist(process.argv.slice(2), {
  string: ['s'],
  boolean: ['t', 'v'],
})

// 整理参数
const trace = !!args.t
const verbose = !!args.v

// 输出函数
const print = (message: string) => {
  if (verbose) {
    console.log(message)
  }
}

function collectStrings(value: string | string[] | undefined): string[] | undefined {
  if (value === undefined) return undefined
  return Array.isArray(value) ? value : [value]
}

function checkString(compiled: CompiledGrammar, input: string): void {
  for (const line of reportString(compiled, input, trace)) {
    console.log(line)
  }
}

async function main(): Promise<void> {
  // 检查参数
  requireCondition(args._.length === 1, '[用法]: node main.js <path_to_grammar> [-s <string> ...] [-t] [-v]')
  const grammarPath = String(args._[0])

  print('*** 基本信息 ***')
  print(`  文法文件: ${grammarPath}`)
  print('')

  print('  读取文法文件...')
  const parser = GrammarFileParser.fromFile(grammarPath)
  const declaration = parser.declaration
  print(`  终结符: ${declaration.terminals.join(' ')}`)
  print(`  非终结符: ${declaration.nonTerminals.join(' ')}`)
  print(`  开始符号: ${declaration.startSymbol}`)
  print(`  共 ${declaration.rules.length} 条产生式。`)

  print('  构造NFA...')
  const compiled = compileGrammar(declaration)
  print('  NFA构造完成。')
  formatAutomaton(compiled.automaton).forEach(line => print(`  ${line}`))
  print('')

  const strings = collectStrings(args.s)
  if (strings) {
    strings.forEach(input => checkString(compiled, input))
    return
  }

  const rl = readline.createInterface({ input: process.stdin, terminal: false })
  for await (const line of rl) {
    checkString(compiled, line.replace(/\r$/, ''))
  }
}

main().catch((ex: unknown) => {
  if (ex instanceof CompilerError) {
    console.error(`[文法错误] ${ex.message}`)
    process.exit(1)
  } else {
    console.error(ex)
    process.exit(2)
  }
})

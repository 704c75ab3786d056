/**
 * epsilon闭包预计算
 */

import { StateMachineBase, SpecialSymbol } from './StateMachine'

/**
 * 每个状态（按索引）的epsilon闭包
 */
export type EpsilonClosureTable = readonly ReadonlySet<number>[]

/**
 * 计算单个状态的epsilon闭包：只通过epsilon边能到达的所有状态（包括自身）
 * 广度优先，已访问的状态不再入队，epsilon环也能终止
 * @param machine 自动机
 * @param state 起始状态索引
 */
export function computeEpsilonClosure(machine: StateMachineBase, state: number): Set<number> {
  const visited = new Set<number>([state])
  const queue: number[] = [state]

  while (queue.length > 0) {
    const current = queue.shift()
    if (current === undefined) break
    for (const neighbor of machine.getTargets(current, SpecialSymbol.EPSILON)) {
      if (!visited.has(neighbor)) {
        visited.add(neighbor)
        queue.push(neighbor)
      }
    }
  }

  return visited
}

/**
 * 为所有状态预计算epsilon闭包，模拟前必须完成
 */
export function computeClosureTable(machine: StateMachineBase): EpsilonClosureTable {
  const table: ReadonlySet<number>[] = []
  for (let state = 0; state < machine.stateCount; state++) {
    table.push(computeEpsilonClosure(machine, state))
  }
  return Object.freeze(table)
}

/**
 * 状态集合的epsilon闭包：各状态闭包的并集，只查表
 */
export function closureOfSet(table: EpsilonClosureTable, states: Iterable<number>): Set<number> {
  const result = new Set<number>()
  for (const state of states) {
    for (const reachable of table[state] ?? [state]) {
      result.add(reachable)
    }
  }
  return result
}

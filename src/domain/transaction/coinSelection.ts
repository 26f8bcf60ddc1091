/**
 * Unspent Source Selection
 *
 * Picks the shortest prefix of caller-ordered sources whose total covers
 * the fee that prefix itself would incur. Sources are taken in the order
 * given; nothing is sorted. All functions are pure.
 *
 * @module domain/transaction/coinSelection
 */

import type { FeeParams, SelectionReport, UnspentSource, UnspentSources } from '../types'
import { unspentValue } from '../types'
import { feeTarget } from './fees'

/**
 * Take sources until the accumulated amount reaches the fee target.
 *
 * The target starts at `feeBase` and rises by `feePerInput` with every
 * source taken. Stops as soon as `acc >= target`. If the sources run out
 * first, everything consumed is returned anyway; use
 * `inspectUnspentSelection` to tell the two apart.
 *
 * @example
 * ```typescript
 * const params = { feeBase: 170000n, feePerInput: 5000n }
 * takeUntilFeePaid(params, [a100k, b100k, c100k])
 * // [a100k, b100k]: 200000 >= 170000 + 2 * 5000
 * ```
 */
export function takeUntilFeePaid(params: FeeParams, sources: UnspentSources): UnspentSource[] {
  const taken: UnspentSource[] = []
  let target = params.feeBase
  let acc = 0n

  for (const source of sources) {
    if (acc >= target) break
    taken.push(source)
    acc += source.amount
    target += params.feePerInput
  }

  return taken
}

/**
 * Sources to spend for the vote transaction fee.
 *
 * @returns The consumed prefix, or null if it is empty (no sources given,
 * or a zero fee target that needs no input at all)
 */
export function selectUnspentSources(params: FeeParams, sources: UnspentSources): UnspentSources | null {
  const taken = takeUntilFeePaid(params, sources)
  return taken.length === 0 ? null : taken
}

/**
 * Run the selection and report whether the prefix actually covers its fee.
 */
export function inspectUnspentSelection(params: FeeParams, sources: UnspentSources): SelectionReport {
  const selected = takeUntilFeePaid(params, sources)
  const total = unspentValue(selected)
  const target = feeTarget(params, selected.length)

  return {
    selected,
    total,
    target,
    sufficient: selected.length > 0 && total >= target
  }
}

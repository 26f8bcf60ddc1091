import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { planVoteTransactionFees } from './feePlanning'
import { ErrorCodes, InsufficientFundsError, NoSourcesError, OracleFailureError } from './errors'
import { isErr, isOk } from '../domain/result'
import { MAINNET } from '../domain/types'
import { makeTransactionMetadata } from '../domain/metadata'
import { candidateLedger } from '../domain/transaction'
import { scriptedLedger, sourceOf } from '../test/factories'

const protocolParams = { minFeeA: 44n, minFeeB: 155381n }
const metadata = makeTransactionMetadata([])

describe('planVoteTransactionFees', () => {
  beforeEach(() => {
    vi.spyOn(console, 'debug').mockImplementation(() => {})
    vi.spyOn(console, 'info').mockImplementation(() => {})
    vi.spyOn(console, 'warn').mockImplementation(() => {})
    vi.spyOn(console, 'error').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
  })

  it('should select a funded prefix and compute the change', () => {
    const { ledger } = scriptedLedger(170000n, 175000n)
    const a = sourceOf(100000n)
    const b = sourceOf(100000n)
    const c = sourceOf(100000n)

    const result = planVoteTransactionFees({ ledger, network: MAINNET, protocolParams, metadata, sources: [a, b, c] })

    expect(isOk(result)).toBe(true)
    if (isOk(result)) {
      expect(result.value).toEqual({
        feeParams: { feeBase: 170000n, feePerInput: 5000n },
        inputs: [a, b],
        total: 200000n,
        fee: 180000n,
        change: 20000n
      })
    }
  })

  it('should report no sources for an empty candidate list', () => {
    const { ledger } = scriptedLedger(170000n, 175000n)

    const result = planVoteTransactionFees({ ledger, network: MAINNET, protocolParams, metadata, sources: [] })

    expect(isErr(result)).toBe(true)
    if (isErr(result)) {
      expect(result.error).toBeInstanceOf(NoSourcesError)
      expect(result.error.code).toBe(ErrorCodes.NO_SOURCES)
    }
  })

  it('should report insufficient funds when every source is consumed', () => {
    const { ledger } = scriptedLedger(170000n, 175000n)

    const result = planVoteTransactionFees({
      ledger,
      network: MAINNET,
      protocolParams,
      metadata,
      sources: [sourceOf(1000n)]
    })

    expect(isErr(result)).toBe(true)
    if (isErr(result)) {
      expect(result.error).toBeInstanceOf(InsufficientFundsError)
      expect(result.error.message).toBe('Insufficient funds: need 175000 lovelace for 1 input, have 1000 lovelace')
    }
  })

  it('should return oracle failures as errors', () => {
    const result = planVoteTransactionFees({
      ledger: candidateLedger,
      network: MAINNET,
      protocolParams: { minFeeA: -1n, minFeeB: 0n },
      metadata,
      sources: [sourceOf(1000000n)]
    })

    expect(isErr(result)).toBe(true)
    if (isErr(result)) {
      expect(result.error).toBeInstanceOf(OracleFailureError)
      expect(result.error.code).toBe(ErrorCodes.ORACLE_FAILURE)
    }
  })

  it('should pass the probe expiry through to estimation', () => {
    const { ledger, estimateTransactionFee } = scriptedLedger(170000n, 175000n)

    planVoteTransactionFees({ ledger, network: MAINNET, protocolParams, metadata, sources: [], ttl: 99 })

    expect(estimateTransactionFee.mock.calls[0][0].tx.ttl).toBe(99)
  })

  it('should work end to end with the reference ledger', () => {
    const funded = sourceOf(2_000_000n)

    const result = planVoteTransactionFees({
      ledger: candidateLedger,
      network: MAINNET,
      protocolParams,
      metadata,
      sources: [funded]
    })

    expect(isOk(result)).toBe(true)
    if (isOk(result)) {
      expect(result.value.inputs).toEqual([funded])
      expect(result.value.fee).toBe(163521n + 1452n)
      expect(result.value.change).toBe(2_000_000n - 164973n)
    }
  })

  it('should log the selected inputs', () => {
    const { ledger } = scriptedLedger(170000n, 175000n)
    const info = vi.spyOn(console, 'info').mockImplementation(() => {})

    planVoteTransactionFees({ ledger, network: MAINNET, protocolParams, metadata, sources: [sourceOf(500000n)] })

    expect(info).toHaveBeenCalledTimes(1)
    expect(info.mock.calls[0][0]).toContain('INFO: Selected inputs for vote transaction')
  })
})

/**
 * Fee Model Estimation
 *
 * Derives a linear fee model for vote transactions from a fee oracle:
 *
 *   1. A base fee, the fee of the vote transaction with no inputs.
 *   2. A per-input fee. If the first source cannot cover the fee we need
 *      more inputs, and each input raises the fee. In the pathological
 *      case every extra input adds more fee than funds; the per-input
 *      estimate is what lets selection detect that.
 *
 * Both probes use the deterministic probe identity, so the result is a
 * pure function of network, protocol parameters and metadata.
 *
 * @module domain/transaction/fees
 */

import { TRANSACTION } from '../../config'
import { NegativeMarginalFeeError, OracleFailureError } from '../errors'
import type { FeeParams, Money, NetworkId, ProtocolParams, TxIn } from '../types'
import type { TxMetadata } from '../metadata'
import { PROBE_TX_IN, probeAddress } from '../wallet/probeIdentity'
import { txExtraContentEmpty, type TxOut } from './builder'
import type { LedgerCapabilities } from './oracle'

/**
 * A single candidate vote transaction to price.
 */
export interface VoteTxFeeRequest {
  network: NetworkId
  protocolParams: ProtocolParams
  /** Slot after which the transaction is invalid */
  ttl: number
  inputs: readonly TxIn[]
  /** Raw address bytes of the single output */
  address: number[]
  outputValue: Money
  metadata: TxMetadata
}

export interface FeeEstimationOptions {
  /** Expiry used for the probe transactions (default: `TRANSACTION.PROBE_TTL`) */
  ttl?: number
}

/**
 * Estimate the fee of a vote transaction: one output, the given metadata,
 * no certificates, withdrawals or update proposal, fee field zero, and no
 * witnesses yet (one signature is announced to the oracle).
 */
export function estimateTxFee<TBody, TTx>(
  ledger: LedgerCapabilities<TBody, TTx>,
  request: VoteTxFeeRequest
): Money {
  const outputs: TxOut[] = [{ address: request.address, value: request.outputValue }]
  const body = ledger.builder.makeTransactionBody({
    ...txExtraContentEmpty,
    metadata: request.metadata,
    inputs: request.inputs,
    outputs,
    ttl: request.ttl,
    fee: 0n
  })
  const tx = ledger.builder.makeSignedTransaction([], body)

  return ledger.oracle.estimateTransactionFee({
    network: request.network,
    txFeeFixed: request.protocolParams.minFeeB,
    txFeePerByte: request.protocolParams.minFeeA,
    tx,
    numInputs: request.inputs.length,
    numOutputs: outputs.length,
    numShelleyWitnesses: TRANSACTION.SHELLEY_WITNESS_COUNT,
    numByronWitnesses: TRANSACTION.BYRON_WITNESS_COUNT
  })
}

function probe<TBody, TTx>(
  ledger: LedgerCapabilities<TBody, TTx>,
  request: VoteTxFeeRequest,
  stage: string
): Money {
  let fee: Money
  try {
    fee = estimateTxFee(ledger, request)
  } catch (e) {
    throw OracleFailureError.wrap(e, stage)
  }
  if (fee < 0n) {
    throw new OracleFailureError(`Fee oracle returned a negative fee during ${stage}`, {
      stage,
      fee: fee.toString()
    })
  }
  return fee
}

/**
 * Estimate the fee characteristics of a vote transaction: the base fee,
 * and how the fee grows as inputs are added.
 *
 * The result is only valid for this exact network, protocol parameters
 * and metadata payload.
 *
 * @throws OracleFailureError if the oracle or builder fails
 * @throws NegativeMarginalFeeError if one input costs less than none
 *
 * @example
 * ```typescript
 * const params = estimateFeeParams(candidateLedger, MAINNET, { minFeeA: 44n, minFeeB: 155381n }, meta)
 * // params.feeBase, params.feePerInput
 * ```
 */
export function estimateFeeParams<TBody, TTx>(
  ledger: LedgerCapabilities<TBody, TTx>,
  network: NetworkId,
  protocolParams: ProtocolParams,
  metadata: TxMetadata,
  options: FeeEstimationOptions = {}
): FeeParams {
  const base: VoteTxFeeRequest = {
    network,
    protocolParams,
    ttl: options.ttl ?? TRANSACTION.PROBE_TTL,
    inputs: [],
    address: probeAddress(network),
    outputValue: TRANSACTION.PROBE_OUTPUT_VALUE,
    metadata
  }

  const feeBase = probe(ledger, base, 'base probe')
  const feeWithOneInput = probe(ledger, { ...base, inputs: [PROBE_TX_IN] }, 'marginal probe')

  const feePerInput = feeWithOneInput - feeBase
  if (feePerInput < 0n) {
    throw new NegativeMarginalFeeError(feeBase, feeWithOneInput)
  }

  return Object.freeze({ feeBase, feePerInput })
}

/**
 * Fee owed by a transaction spending `inputCount` inputs.
 */
export function feeTarget(params: FeeParams, inputCount: number): Money {
  return params.feeBase + BigInt(inputCount) * params.feePerInput
}

/**
 * Fee planning for vote transactions
 *
 * Composes estimation and selection the way a caller does before building
 * the real transaction: derive the fee model for the payload, walk the
 * candidate sources, and either return the inputs to spend or explain why
 * there are none.
 */

import { err, fromTry, ok, type Result } from '../domain/result'
import type { FeeParams, Money, NetworkId, ProtocolParams, UnspentSource, UnspentSources } from '../domain/types'
import { formatTxIn } from '../domain/types'
import type { TxMetadata } from '../domain/metadata'
import { estimateFeeParams, inspectUnspentSelection, type LedgerCapabilities } from '../domain/transaction'
import { AppError, ErrorCodes, InsufficientFundsError, NoSourcesError } from './errors'
import { networkName } from './config'
import { feeLogger } from './logger'

export interface FeePlanRequest<TBody, TTx> {
  ledger: LedgerCapabilities<TBody, TTx>
  network: NetworkId
  protocolParams: ProtocolParams
  metadata: TxMetadata
  /** Candidate sources in spending order */
  sources: UnspentSources
  /** Expiry used for the probes */
  ttl?: number
}

export interface FeePlan {
  feeParams: FeeParams
  /** Inputs to spend, a prefix of the candidates */
  inputs: UnspentSource[]
  /** Sum of the selected amounts */
  total: Money
  /** Fee for a transaction with that many inputs */
  fee: Money
  /** What is left for the output after the fee */
  change: Money
}

/**
 * Estimate the fee model and pick the inputs that pay for it.
 *
 * @returns Err(NO_SOURCES) when no input is selected, Err(INSUFFICIENT_FUNDS)
 * when every source was consumed without covering the fee, Err(ORACLE_FAILURE)
 * or Err(NEGATIVE_MARGINAL_FEE) when estimation fails
 */
export function planVoteTransactionFees<TBody, TTx>(
  request: FeePlanRequest<TBody, TTx>
): Result<FeePlan, AppError> {
  const { ledger, network, protocolParams, metadata, sources, ttl } = request

  const estimated = fromTry(
    () => estimateFeeParams(ledger, network, protocolParams, metadata, { ttl }),
    e => AppError.fromUnknown(e, ErrorCodes.ORACLE_FAILURE)
  )
  if (!estimated.ok) {
    feeLogger.error('Fee estimation failed', estimated.error, { network: networkName(network) })
    return estimated
  }
  const feeParams = estimated.value

  feeLogger.debug('Estimated fee parameters', {
    network: networkName(network),
    feeBase: feeParams.feeBase,
    feePerInput: feeParams.feePerInput
  })

  const report = inspectUnspentSelection(feeParams, sources)

  if (report.selected.length === 0) {
    feeLogger.warn('No unspent sources selected', { available: sources.length })
    return err(new NoSourcesError(sources.length))
  }

  if (!report.sufficient) {
    feeLogger.warn('Unspent sources exhausted before the fee was covered', {
      required: report.target,
      available: report.total,
      inputs: report.selected.length
    })
    return err(new InsufficientFundsError(report.target, report.total, report.selected.length))
  }

  feeLogger.info('Selected inputs for vote transaction', {
    inputs: report.selected.map(source => formatTxIn(source.reference)),
    total: report.total,
    fee: report.target
  })

  return ok({
    feeParams,
    inputs: report.selected,
    total: report.total,
    fee: report.target,
    change: report.total - report.target
  })
}

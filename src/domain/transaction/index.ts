/**
 * Transaction Domain - fee model estimation, source selection, ledger capabilities
 */

export {
  estimateFeeParams,
  estimateTxFee,
  feeTarget
} from './fees'

export type { VoteTxFeeRequest, FeeEstimationOptions } from './fees'

export {
  takeUntilFeePaid,
  selectUnspentSources,
  inspectUnspentSelection
} from './coinSelection'

export {
  candidateTransactionBuilder,
  encodeTxBody,
  txExtraContentEmpty
} from './builder'

export type {
  TransactionBuilder,
  TxBodyContent,
  TxExtraContent,
  TxOut,
  Withdrawal,
  ShelleyWitness,
  CandidateTxBody,
  CandidateTransaction
} from './builder'

export {
  linearFeeOracle,
  candidateLedger,
  estimatedTxSize
} from './oracle'

export type { FeeOracle, FeeOracleRequest, LedgerCapabilities } from './oracle'

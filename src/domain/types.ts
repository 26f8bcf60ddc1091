/**
 * Core domain types for vote transaction fee planning
 * These are pure data types with no dependencies on infrastructure
 */

// ============================================
// Money
// ============================================

/**
 * An amount in lovelace, the smallest ledger unit.
 *
 * Kept as a bigint: the ledger's total supply in lovelace does not fit
 * in a double without loss, and fee arithmetic must be exact.
 */
export type Money = bigint

// ============================================
// Network Types
// ============================================

export type NetworkId =
  | { kind: 'mainnet' }
  | { kind: 'testnet'; magic: number }

export const MAINNET: NetworkId = { kind: 'mainnet' }

export function testnet(magic: number): NetworkId {
  return { kind: 'testnet', magic }
}

/**
 * Protocol parameters consulted by the fee oracle.
 * The estimator never interprets them.
 */
export interface ProtocolParams {
  /** Fee per byte of serialized transaction */
  minFeeA: Money
  /** Constant fee added to every transaction */
  minFeeB: Money
}

// ============================================
// UTXO Types
// ============================================

/** Reference to a transaction output being spent */
export interface TxIn {
  /** Transaction id, 64 hex characters */
  txId: string
  /** Output index within that transaction */
  index: number
}

/**
 * A candidate fund the caller is willing to spend.
 * No uniqueness is assumed: duplicates are processed in order.
 */
export interface UnspentSource {
  reference: TxIn
  amount: Money
}

/** Caller-ordered candidates. Order is significant; nothing sorts it. */
export type UnspentSources = readonly UnspentSource[]

// ============================================
// Fee Types
// ============================================

/**
 * Linear fee model for one (network, protocol params, metadata) combination.
 * Any change to the metadata payload invalidates it.
 */
export interface FeeParams {
  /** Fee of the vote transaction with no inputs */
  readonly feeBase: Money
  /** Increase in fee for each input added */
  readonly feePerInput: Money
}

/**
 * Outcome of walking the sources against the fee target.
 * `selected` is always a prefix of the input.
 */
export interface SelectionReport {
  selected: UnspentSource[]
  /** Sum of the selected amounts */
  total: Money
  /** Fee the selected prefix would incur */
  target: Money
  /** Whether a non-empty prefix covers its own fee */
  sufficient: boolean
}

// ============================================
// Helpers
// ============================================

/**
 * Total amount of unspent value.
 */
export function unspentValue(sources: UnspentSources): Money {
  return sources.reduce((acc, source) => acc + source.amount, 0n)
}

/**
 * Input references of the sources, in the order given.
 */
export function unspentReferences(sources: UnspentSources): TxIn[] {
  return sources.map(source => source.reference)
}

export function formatTxIn(txIn: TxIn): string {
  return `${txIn.txId}#${txIn.index}`
}

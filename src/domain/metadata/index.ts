/**
 * Metadata Domain - payload model, encoding, vote registration
 */

export {
  makeTransactionMetadata,
  encodeMetadata,
  writeUInt64LE,
  metaInt,
  metaBytes,
  metaText,
  metaList,
  metaMap
} from './metadata'

export type { TxMetadata, TxMetadataValue } from './metadata'

export { voteRegistrationMetadata } from './registration'

export type { VoteRegistration } from './registration'

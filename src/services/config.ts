/**
 * Configuration Service
 *
 * Resolves the network, protocol fee coefficients, expiry and log level
 * from environment variables, falling back to the defaults in config.
 * Invalid values are reported, never silently replaced.
 */

import { LOGGING, PROTOCOL, TRANSACTION } from '../config'
import { err, ok, type Result } from '../domain/result'
import { MAINNET, testnet, type NetworkId, type ProtocolParams } from '../domain/types'
import { ConfigError } from './errors'
import { isLogLevel, logger, type LogLevel } from './logger'

export type NetworkType = 'mainnet' | 'testnet'

export interface FeeConfig {
  network: NetworkId
  protocolParams: ProtocolParams
  /** Slots before the vote transaction expires */
  ttl: number
  logLevel: LogLevel
}

export type Env = Readonly<Record<string, string | undefined>>

const envName = (name: string): string => `${LOGGING.ENV_PREFIX}${name}`

function readNetwork(env: Env): Result<NetworkId, ConfigError> {
  const name = envName('NETWORK')
  const kind = env[name] ?? 'mainnet'
  if (kind === 'mainnet') return ok(MAINNET)
  if (kind !== 'testnet') return err(new ConfigError(name, kind, "'mainnet' or 'testnet'"))

  const magicName = envName('TESTNET_MAGIC')
  const rawMagic = env[magicName]
  if (rawMagic === undefined) return ok(testnet(PROTOCOL.DEFAULT_TESTNET_MAGIC))
  const magic = Number(rawMagic)
  if (!/^\d+$/.test(rawMagic) || !Number.isSafeInteger(magic) || magic > 0xffffffff) {
    return err(new ConfigError(magicName, rawMagic, 'a 32-bit unsigned integer'))
  }
  return ok(testnet(magic))
}

function readLovelace(env: Env, variable: string, fallback: bigint): Result<bigint, ConfigError> {
  const name = envName(variable)
  const raw = env[name]
  if (raw === undefined) return ok(fallback)
  if (!/^\d+$/.test(raw)) return err(new ConfigError(name, raw, 'a non-negative integer'))
  return ok(BigInt(raw))
}

function readTtl(env: Env): Result<number, ConfigError> {
  const name = envName('TTL')
  const raw = env[name]
  if (raw === undefined) return ok(TRANSACTION.DEFAULT_TTL_SLOTS)
  const ttl = Number(raw)
  if (!/^\d+$/.test(raw) || !Number.isSafeInteger(ttl)) {
    return err(new ConfigError(name, raw, 'a number of slots'))
  }
  return ok(ttl)
}

function readLogLevel(env: Env): Result<LogLevel, ConfigError> {
  const name = envName('LOG_LEVEL')
  const raw = env[name]
  if (raw === undefined) return ok(env.NODE_ENV === 'production' ? 'info' : 'debug')
  if (!isLogLevel(raw)) return err(new ConfigError(name, raw, 'debug, info, warn or error'))
  return ok(raw)
}

/**
 * Load configuration. The first invalid variable is returned as an error.
 *
 * @example
 * ```typescript
 * const config = loadConfig({ VOTE_FEES_NETWORK: 'testnet' })
 * // config.value.network = { kind: 'testnet', magic: 1097911063 }
 * ```
 */
export function loadConfig(env: Env = process.env): Result<FeeConfig, ConfigError> {
  const network = readNetwork(env)
  if (!network.ok) return network
  const minFeeA = readLovelace(env, 'MIN_FEE_A', PROTOCOL.DEFAULT_MIN_FEE_A)
  if (!minFeeA.ok) return minFeeA
  const minFeeB = readLovelace(env, 'MIN_FEE_B', PROTOCOL.DEFAULT_MIN_FEE_B)
  if (!minFeeB.ok) return minFeeB
  const ttl = readTtl(env)
  if (!ttl.ok) return ttl
  const logLevel = readLogLevel(env)
  if (!logLevel.ok) return logLevel

  return ok({
    network: network.value,
    protocolParams: { minFeeA: minFeeA.value, minFeeB: minFeeB.value },
    ttl: ttl.value,
    logLevel: logLevel.value
  })
}

/**
 * Load configuration and apply its log level to the shared logger. An
 * invalid configuration leaves the logger untouched.
 */
export function configureFromEnv(env: Env = process.env): Result<FeeConfig, ConfigError> {
  const config = loadConfig(env)
  if (config.ok) {
    logger.configure({ minLevel: config.value.logLevel })
  }
  return config
}

export function networkName(network: NetworkId): NetworkType {
  return network.kind
}

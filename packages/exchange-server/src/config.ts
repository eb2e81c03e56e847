// src/config.ts

/**
 * Centralized configuration for the exchange server.
 * Environment variables are loaded from `.env.exchange-server` (package root, then cwd)
 * and validated with zod so a bad deployment fails at boot instead of mid-request.
 */
import dotenv from 'dotenv'
import fs from 'fs'
import path from 'path'
import { z } from 'zod'
import { getAddress, isAddress } from 'ethers'

const packageRoot = path.resolve(__dirname, '..')

export function loadEnvFile(): string | undefined {
  const candidates = [
    path.join(packageRoot, '.env.exchange-server'),
    path.join(process.cwd(), '.env.exchange-server')
  ]
  for (const p of candidates) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p })
      return p
    }
  }
  return undefined
}

// dotenv leaves unset keys as empty strings
const blankToUndefined = (v: unknown) => (v === '' ? undefined : v)

const address = z
  .string()
  .refine((v) => isAddress(v), { message: 'expected a 20-byte hex address' })
  .transform((v) => getAddress(v))

const uint = z
  .string()
  .regex(/^\d+$/, 'expected an unsigned integer')
  .transform((v) => BigInt(v))

export const ConfigSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().positive().default(4000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // EIP-712 domain
  CHAIN_ID: uint.default('1'),
  DOMAIN_NAME: z.string().min(1).default('VotingPowerExchange'),
  DOMAIN_VERSION: z.string().min(1).default('1'),
  EXCHANGE_ADDRESS: address,

  UTIL_TOKEN_ADDRESS: address,
  GOV_TOKEN_ADDRESS: address,

  INITIAL_VOTING_POWER_CAP: uint.default((100n * 10n ** 18n).toString()),

  // enables ERC-1271 verification for contract accounts
  RPC_URL: z.preprocess(blankToUndefined, z.string().url().optional()),

  // addresses granted roles on the in-memory access control at boot
  OPERATOR_ADDRESS: z.preprocess(blankToUndefined, address.optional()),
  MANAGER_ADDRESS: z.preprocess(blankToUndefined, address.optional()),

  REJECTION_AUDIT_PATH: z.preprocess(blankToUndefined, z.string().optional())
})

export type AppConfig = z.infer<typeof ConfigSchema>

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const res = ConfigSchema.safeParse(env)
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`invalid exchange-server configuration: ${issues}`)
  }
  return res.data
}

export const CONSTANTS = {
  APP_NAME: 'govex exchange server',
  ENV_FILE: '.env.exchange-server'
}

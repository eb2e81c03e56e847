/* Validates request bodies for the exchange HTTP surface.
   Amounts travel as decimal strings and come out as bigint; addresses come out checksummed. */

import { z } from 'zod'
import { getAddress, isAddress, isHexString } from 'ethers'
import type { ExchangeIntent } from '@govex/dto'
import { MAX_UINT256 } from '@govex/math'
import { reject } from '@govex/reasons'

export const AddressSchema = z
  .string()
  .refine((v) => isAddress(v), { message: 'expected a 20-byte hex address' })
  .transform((v) => getAddress(v))

// JSON numbers past 2^53 arrive already rounded; larger values must be decimal strings
export const UintSchema = z
  .union([
    z.string().regex(/^\d+$/, 'expected an unsigned integer string'),
    z
      .number()
      .int()
      .nonnegative()
      .refine((v) => Number.isSafeInteger(v), { message: 'expected a safe integer; send larger values as decimal strings' }),
  ])
  .transform((v, ctx) => {
    const n = BigInt(v)
    if (n > MAX_UINT256) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'exceeds the uint256 range' })
      return z.NEVER
    }
    return n
  })

export const ExchangeIntentSchema = z.object({
  requester: AddressSchema,
  amount: UintSchema,
  nonce: z.string().refine((v) => isHexString(v, 32), { message: 'expected a 0x-prefixed 32-byte hex nonce' }),
  expiration: UintSchema,
  signature: z.string().refine((v) => isHexString(v) && v.length > 2, { message: 'expected a 0x-prefixed hex signature' }),
})

export const PreviewSchema = z.object({
  requester: AddressSchema,
  amount: UintSchema,
})

export const SetCapSchema = z.object({
  newCap: UintSchema,
})

function parseOrReject<S extends z.ZodTypeAny>(schema: S, body: unknown, label = '(body)'): z.output<S> {
  const res = schema.safeParse(body)
  if (!res.success) {
    const issues = res.error.issues.map((i) => `${i.path.join('.') || label}: ${i.message}`).join('; ')
    throw reject('CLIENT_BAD_REQUEST', { context: { issues } })
  }
  return res.data
}

export function parseExchangeIntent(body: unknown): ExchangeIntent {
  return parseOrReject(ExchangeIntentSchema, body)
}

export function parsePreview(body: unknown): { requester: string; amount: bigint } {
  return parseOrReject(PreviewSchema, body)
}

export function parseSetCap(body: unknown): { newCap: bigint } {
  return parseOrReject(SetCapSchema, body)
}

export function parseAddress(value: string | undefined, label: string): string {
  return parseOrReject(AddressSchema, value ?? '', label)
}

export function parseCaller(header: string | undefined): string {
  return parseAddress(header, 'x-caller-address')
}

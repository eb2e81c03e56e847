import pino from 'pino'
import { HDNodeWallet, Wallet, getAddress, hexlify, randomBytes } from 'ethers'
import type { ExchangeDomain, ExchangeIntent } from '@govex/dto'
import { createExchangeStack, ExchangeStack } from '../src/bootstrap'
import { EXCHANGER_ROLE, MANAGER_ROLE } from '../src/collaborators/accessControl'
import { EXCHANGE_TYPES } from '../src/services/AuthorizationVerifier'
import { ContractReader } from '../src/services/SignatureVerifier'
import { setLogger } from '../src/utils/logger'

export const E18 = 10n ** 18n
export const NOW = 1_800_000_000n
export const DEFAULT_CAP = 100n * E18

export const DOMAIN: ExchangeDomain = {
  name: 'VotingPowerExchange',
  version: '1',
  chainId: 31337n,
  verifyingContract: getAddress('0x00000000000000000000000000000000000000e1'),
}

export const TOKENS = {
  utilToken: getAddress('0x00000000000000000000000000000000000000a1'),
  govToken: getAddress('0x00000000000000000000000000000000000000b1'),
}

export function silenceLogs() {
  setLogger(pino({ level: 'silent' }))
}

export function freshNonce(): string {
  return hexlify(randomBytes(32))
}

export async function signIntent(
  signer: Wallet | HDNodeWallet,
  fields: { amount: bigint; requester?: string; nonce?: string; expiration?: bigint },
  domain: ExchangeDomain = DOMAIN
): Promise<ExchangeIntent> {
  const message = {
    requester: fields.requester ?? signer.address,
    amount: fields.amount,
    nonce: fields.nonce ?? freshNonce(),
    expiration: fields.expiration ?? NOW + 3600n,
  }
  const signature = await signer.signTypedData(domain, EXCHANGE_TYPES, message)
  return { ...message, signature }
}

export type Harness = ExchangeStack & { operator: HDNodeWallet; manager: HDNodeWallet }

/**
 * Stack with a funded operator (exchanger role, allowance to the exchange) and a manager.
 */
export async function makeHarness(opts: { initialCap?: bigint; reader?: ContractReader; operatorFunds?: bigint; allowance?: bigint } = {}): Promise<Harness> {
  const stack = createExchangeStack({
    domain: DOMAIN,
    tokens: TOKENS,
    initialCap: opts.initialCap ?? DEFAULT_CAP,
    reader: opts.reader,
    clock: () => NOW,
  })
  const operator = Wallet.createRandom()
  const manager = Wallet.createRandom()
  stack.accessControl.grantRole(EXCHANGER_ROLE, operator.address)
  stack.accessControl.grantRole(MANAGER_ROLE, manager.address)
  const funds = opts.operatorFunds ?? 1_000_000n * E18
  await stack.utilityLedger.mint(operator.address, funds)
  await stack.utilityLedger.approve(operator.address, stack.engine.address, opts.allowance ?? funds)
  return { ...stack, operator, manager }
}

/** Puts a holder directly on the curve: `votingPower` minted, `burned` recorded. */
export async function seedHolder(h: Harness, account: string, votingPower: bigint, burned: bigint) {
  await h.governanceLedger.mint(account, votingPower)
  await h.governanceLedger.setBurnedAmountOfUtilToken(account, burned)
}

import { EventEmitter } from 'events'
import { ZeroAddress, getAddress, isAddress } from 'ethers'
import {
  ExchangeDomain,
  ExchangeIntent,
  ExchangePreview,
  ExchangeReceipt,
  ExchangeState,
  LedgerMutation,
} from '@govex/dto'
import {
  MAX_UINT256,
  MINIMUM_EXCHANGE_AMOUNT,
  PRECISION,
  PRECISION_FIX,
  incrementalBurnedAmount,
  incrementalVotingPower,
} from '@govex/math'
import { ReasonedRejection, reject } from '@govex/reasons'
import { AccessControl, EXCHANGER_ROLE } from '../collaborators/accessControl'
import { GovernanceLedger, LedgerBatchExecutor } from '../collaborators/ledgers'
import { AuthorizationVerifier, EXCHANGE_TYPE, EXCHANGE_TYPEHASH } from './AuthorizationVerifier'
import { CapPolicy } from './CapPolicy'
import { ReplayGuard } from './ReplayGuard'
import { SerialQueue } from './SerialQueue'
import { getLogger, logTransition } from '../utils/logger'
import { countCappedFill, countExchange, countRejection, observeLatency } from '../utils/metrics'
import { emitSafely } from '../utils/emitSafely'

export const VOTING_POWER_RECEIVED = 'VotingPowerReceived'

export type VotingPowerReceivedEvent = { requester: string; burnAmount: bigint; grantedPower: bigint }

export type Fill = { grantedPower: bigint; burnAmount: bigint; capped: boolean }

export type TokenPair = { utilToken: string; govToken: string }

export type ExchangeEngineDeps = {
  governanceLedger: GovernanceLedger
  batchExecutor: LedgerBatchExecutor
  accessControl: AccessControl
  replayGuard: ReplayGuard
  capPolicy: CapPolicy
  verifier: AuthorizationVerifier
  queue: SerialQueue
  tokens: TokenPair
  clock?: () => bigint
}

export type ExchangeConstants = {
  exchangeType: string
  exchangeTypeHash: string
  domainSeparator: string
  domain: ExchangeDomain
  precision: bigint
  precisionFix: bigint
  minimumExchangeAmount: bigint
  utilToken: string
  govToken: string
}

const unixNow = () => BigInt(Math.floor(Date.now() / 1000))

/**
 * computeFill
 * Full curve grant unless it would push the holder past the cap; then exactly the headroom,
 * charged at its exact inverse-curve cost.
 */
export function computeFill(amount: bigint, currentVotingPower: bigint, currentBurned: bigint, cap: bigint): Fill {
  const grantedPower = incrementalVotingPower(amount, currentBurned)
  if (currentVotingPower + grantedPower <= cap) {
    return { grantedPower, burnAmount: amount, capped: false }
  }
  const headroom = cap - currentVotingPower
  return { grantedPower: headroom, burnAmount: incrementalBurnedAmount(headroom, currentVotingPower), capped: true }
}

/**
 * ExchangeEngine
 * Turns a signed intent into one atomic ledger batch. Checks run in a fixed order and the
 * nonce is consumed only once every check has passed, immediately before the batch. If the
 * batch fails the nonce is released so the discarded request leaves no trace.
 */
export class ExchangeEngine extends EventEmitter {
  private readonly clock: () => bigint

  constructor(private readonly deps: ExchangeEngineDeps) {
    super()
    this.clock = deps.clock ?? unixNow
  }

  /** The verifying contract doubles as the spender the operator approves. */
  get address(): string {
    return this.deps.verifier.domain.verifyingContract
  }

  constants(): ExchangeConstants {
    return {
      exchangeType: EXCHANGE_TYPE,
      exchangeTypeHash: EXCHANGE_TYPEHASH,
      domainSeparator: this.deps.verifier.domainSeparator(),
      domain: this.deps.verifier.domain,
      precision: PRECISION,
      precisionFix: PRECISION_FIX,
      minimumExchangeAmount: MINIMUM_EXCHANGE_AMOUNT,
      utilToken: this.deps.tokens.utilToken,
      govToken: this.deps.tokens.govToken,
    }
  }

  isNonceConsumed(requester: string, nonce: string): boolean {
    return this.deps.replayGuard.isConsumed(requester, nonce)
  }

  async holder(account: string): Promise<{ votingPower: bigint; burnedAmount: bigint }> {
    const { governanceLedger } = this.deps
    const [votingPower, burnedAmount] = await Promise.all([
      governanceLedger.balanceOf(account),
      governanceLedger.burnedAmountOfUtilToken(account),
    ])
    return { votingPower, burnedAmount }
  }

  async exchange(operator: string, intent: ExchangeIntent, opts: { corr_id?: string } = {}): Promise<ExchangeReceipt> {
    return this.deps.queue.run(() => this.settle(operator, intent, opts.corr_id))
  }

  /** Same checks and arithmetic as `exchange`, without signature, nonce or mutation. */
  async previewExchange(requester: string, amount: bigint): Promise<ExchangePreview> {
    return this.deps.queue.run(async () => {
      this.checkRequest(requester, amount)
      const account = getAddress(requester)
      const { votingPower, burnedAmount } = await this.holder(account)
      const cap = this.checkHeadroom(votingPower)
      const fill = computeFill(amount, votingPower, burnedAmount, cap)
      return { requester: account, currentVotingPower: votingPower, currentBurnedAmount: burnedAmount, ...fill }
    })
  }

  private checkRequest(requester: string, amount: bigint) {
    if (!isAddress(requester)) {
      throw reject('CLIENT_BAD_REQUEST', { context: { issues: 'requester: expected a 20-byte hex address' } })
    }
    if (amount > MAX_UINT256) {
      throw reject('CLIENT_BAD_REQUEST', { context: { issues: 'amount: exceeds the uint256 range' } })
    }
    if (requester === ZeroAddress) throw reject('ADDRESS_IS_ZERO')
    if (amount < MINIMUM_EXCHANGE_AMOUNT) {
      throw reject('AMOUNT_IS_TOO_SMALL', { context: { amount, minimum: MINIMUM_EXCHANGE_AMOUNT } })
    }
  }

  private checkHeadroom(votingPower: bigint): bigint {
    const cap = this.deps.capPolicy.getCap()
    if (votingPower >= cap) {
      throw reject('VOTING_POWER_IS_HIGHER_THAN_CAP', { context: { votingPower, cap } })
    }
    return cap
  }

  private async settle(operator: string, intent: ExchangeIntent, corr_id?: string): Promise<ExchangeReceipt> {
    const started = Date.now()
    const { accessControl, replayGuard, verifier, governanceLedger } = this.deps
    let state = ExchangeState.RECEIVED
    const advance = (to: ExchangeState, reason_code?: string) => {
      logTransition({ requester: intent.requester, nonce: intent.nonce, from: state, to, corr_id, reason_code })
      state = to
    }

    let receipt: ExchangeReceipt
    try {
      if (!isAddress(operator)) {
        throw reject('CLIENT_BAD_REQUEST', { context: { issues: 'operator: expected a 20-byte hex address' } })
      }
      if (!(await accessControl.hasRole(EXCHANGER_ROLE, operator))) {
        throw reject('ACCESS_DENIED', { context: { caller: operator, role: 'EXCHANGER_ROLE' } })
      }

      this.checkRequest(intent.requester, intent.amount)
      if (intent.expiration < 0n || intent.expiration > MAX_UINT256) {
        throw reject('CLIENT_BAD_REQUEST', { context: { issues: 'expiration: outside the uint256 range' } })
      }
      const requester = getAddress(intent.requester)
      if (replayGuard.isConsumed(requester, intent.nonce)) {
        throw reject('INVALID_NONCE', { context: { requester, nonce: intent.nonce } })
      }
      const now = this.clock()
      if (verifier.isExpired(intent.expiration, now)) {
        throw reject('SIGNATURE_EXPIRED', { context: { expiration: intent.expiration, now } })
      }
      const votingPower = await governanceLedger.balanceOf(requester)
      const cap = this.checkHeadroom(votingPower)
      advance(ExchangeState.SCREENED)

      const { valid, digest, kind } = await verifier.verify(intent)
      if (!valid) {
        throw reject('INVALID_SIGNATURE', { context: { digest, signature: intent.signature, verifier: kind } })
      }
      advance(ExchangeState.AUTHORIZED)

      replayGuard.consume(requester, intent.nonce)
      const { fill, mutations } = await this.applyFill(operator, requester, intent.amount, votingPower, cap).catch((e: unknown) => {
        replayGuard.release(requester, intent.nonce)
        throw e
      })
      advance(ExchangeState.SETTLED)

      receipt = {
        requester,
        operator: getAddress(operator),
        digest,
        burnAmount: fill.burnAmount,
        grantedPower: fill.grantedPower,
        requestedAmount: intent.amount,
        capped: fill.capped,
        mutations,
      }
    } catch (e) {
      const rejection = e instanceof ReasonedRejection ? e : this.internal(e, corr_id)
      advance(ExchangeState.REJECTED, rejection.reason.code)
      countExchange('rejected')
      countRejection(rejection.reason.code)
      observeLatency('rejected', Date.now() - started)
      throw rejection
    }

    getLogger().info({
      event: 'exchange.settled',
      corr_id,
      requester: receipt.requester,
      burnAmount: receipt.burnAmount.toString(),
      grantedPower: receipt.grantedPower.toString(),
      capped: receipt.capped,
    })
    countExchange('settled')
    if (receipt.capped) countCappedFill()
    observeLatency('settled', Date.now() - started)

    const event: VotingPowerReceivedEvent = {
      requester: receipt.requester,
      burnAmount: receipt.burnAmount,
      grantedPower: receipt.grantedPower,
    }
    emitSafely(this, VOTING_POWER_RECEIVED, event)
    return receipt
  }

  private async applyFill(operator: string, requester: string, amount: bigint, votingPower: bigint, cap: bigint) {
    const burned = await this.deps.governanceLedger.burnedAmountOfUtilToken(requester)
    const fill = computeFill(amount, votingPower, burned, cap)
    const mutations: LedgerMutation[] = [
      { kind: 'utility.transferFrom', spender: this.address, from: getAddress(operator), to: requester, amount: fill.burnAmount },
      { kind: 'utility.burn', account: requester, amount: fill.burnAmount },
      { kind: 'governance.setBurnedAmount', account: requester, amount: burned + fill.burnAmount },
      { kind: 'governance.mint', account: requester, amount: fill.grantedPower },
    ]
    await this.deps.batchExecutor.applyBatch(mutations)
    return { fill, mutations }
  }

  private internal(e: unknown, corr_id?: string): ReasonedRejection {
    const message = e instanceof Error ? e.message : String(e)
    getLogger().error({ event: 'exchange.internal_error', corr_id, err: e })
    return reject('INTERNAL_ERROR', { context: { cause: message } })
  }
}

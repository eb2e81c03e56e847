/**
 * Wires the exchange engine to its collaborators. `main.ts` feeds it from configuration;
 * tests call it directly with fixed addresses and a fake clock.
 */
import type { ExchangeDomain } from '@govex/dto'
import { InMemoryAccessControl } from './collaborators/accessControl'
import { InMemoryBatchExecutor, InMemoryGovernanceLedger, InMemoryUtilityLedger } from './collaborators/InMemoryLedgers'
import { AuthorizationVerifier } from './services/AuthorizationVerifier'
import { CapPolicy } from './services/CapPolicy'
import { ExchangeEngine, TokenPair } from './services/ExchangeEngine'
import { ReplayGuard } from './services/ReplayGuard'
import { SerialQueue } from './services/SerialQueue'
import { ContractReader } from './services/SignatureVerifier'

export type StackOptions = {
  domain: ExchangeDomain
  tokens: TokenPair
  initialCap: bigint
  reader?: ContractReader
  clock?: () => bigint
}

export type ExchangeStack = ReturnType<typeof createExchangeStack>

export function createExchangeStack(opts: StackOptions) {
  const queue = new SerialQueue()
  const accessControl = new InMemoryAccessControl()
  const utilityLedger = new InMemoryUtilityLedger()
  const governanceLedger = new InMemoryGovernanceLedger()
  const batchExecutor = new InMemoryBatchExecutor(utilityLedger, governanceLedger)
  const replayGuard = new ReplayGuard()
  const verifier = new AuthorizationVerifier(opts.domain, opts.reader)
  const capPolicy = new CapPolicy(opts.initialCap, accessControl, queue)
  const engine = new ExchangeEngine({
    governanceLedger,
    batchExecutor,
    accessControl,
    replayGuard,
    capPolicy,
    verifier,
    queue,
    tokens: opts.tokens,
    clock: opts.clock,
  })
  return { queue, accessControl, utilityLedger, governanceLedger, batchExecutor, replayGuard, verifier, capPolicy, engine }
}

/**
 * AuthorizationVerifier
 * Proves an ExchangeIntent was authored by its requester. The digest is EIP-712 typed data
 * bound to a domain (name, version, chainId, verifying contract), so a signature for one
 * deployment never verifies against another.
 */
import { TypedDataEncoder, TypedDataField, getAddress, id } from 'ethers'
import type { ExchangeDomain, ExchangeIntent } from '@govex/dto'
import { ContractReader, SignatureVerifier, VerifierKind, contractVerifier, eoaVerifier } from './SignatureVerifier'

export const EXCHANGE_TYPE = 'Exchange(address requester,uint256 amount,bytes32 nonce,uint256 expiration)'
export const EXCHANGE_TYPEHASH = id(EXCHANGE_TYPE)

export const EXCHANGE_TYPES: Record<string, TypedDataField[]> = {
  Exchange: [
    { name: 'requester', type: 'address' },
    { name: 'amount', type: 'uint256' },
    { name: 'nonce', type: 'bytes32' },
    { name: 'expiration', type: 'uint256' }
  ]
}

export type VerificationResult = { valid: boolean; digest: string; kind: VerifierKind }

export class AuthorizationVerifier {
  private readonly verifiers: Record<VerifierKind, SignatureVerifier | undefined>

  constructor(public readonly domain: ExchangeDomain, private readonly reader?: ContractReader) {
    this.verifiers = {
      eoa: eoaVerifier,
      erc1271: reader ? contractVerifier(reader) : undefined
    }
  }

  /** Fields of the signed struct; `signature` is not part of the message. */
  static message(intent: ExchangeIntent) {
    return {
      requester: getAddress(intent.requester),
      amount: intent.amount,
      nonce: intent.nonce,
      expiration: intent.expiration
    }
  }

  digest(intent: ExchangeIntent): string {
    return TypedDataEncoder.hash(this.domain, EXCHANGE_TYPES, AuthorizationVerifier.message(intent))
  }

  domainSeparator(): string {
    return TypedDataEncoder.hashDomain(this.domain)
  }

  /** Contract accounts are only recognised when a reader is configured. */
  async resolveKind(signer: string): Promise<VerifierKind> {
    if (!this.reader) return 'eoa'
    const code = await this.reader.getCode(signer)
    return code && code !== '0x' ? 'erc1271' : 'eoa'
  }

  async verify(intent: ExchangeIntent): Promise<VerificationResult> {
    const digest = this.digest(intent)
    const kind = await this.resolveKind(intent.requester)
    const verifier = this.verifiers[kind]
    if (!verifier) return { valid: false, digest, kind }
    const valid = await verifier.verify(intent.requester, digest, intent.signature)
    return { valid, digest, kind }
  }

  isExpired(expiration: bigint, now: bigint): boolean {
    return expiration < now
  }
}

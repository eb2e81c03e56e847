/**
 * Signature verifiers
 * Two interchangeable capabilities behind one shape: direct ECDSA recovery for key-held
 * accounts, and ERC-1271 delegation for contract accounts. AuthorizationVerifier picks
 * one by `kind`.
 */
import { Interface, Provider, getAddress, isError, recoverAddress } from 'ethers'

export type VerifierKind = 'eoa' | 'erc1271'

export interface SignatureVerifier {
  readonly kind: VerifierKind
  verify(signer: string, digest: string, signature: string): Promise<boolean>
}

/** The slice of an ethers Provider needed to inspect and call contract accounts. */
export type ContractReader = Pick<Provider, 'getCode' | 'call'>

export const ERC1271_MAGIC_VALUE = '0x1626ba7e'

export const ERC1271_INTERFACE = new Interface([
  'function isValidSignature(bytes32 hash, bytes signature) view returns (bytes4 magicValue)'
])

export const eoaVerifier: SignatureVerifier = {
  kind: 'eoa',
  async verify(signer, digest, signature) {
    let recovered: string
    try {
      recovered = recoverAddress(digest, signature)
    } catch {
      // recovery is pure; a throw means the signature bytes are malformed
      return false
    }
    return getAddress(recovered) === getAddress(signer)
  }
}

export function contractVerifier(reader: ContractReader): SignatureVerifier {
  return {
    kind: 'erc1271',
    async verify(signer, digest, signature) {
      const data = ERC1271_INTERFACE.encodeFunctionData('isValidSignature', [digest, signature])
      let result: string
      try {
        result = await reader.call({ to: signer, data })
      } catch (e) {
        if (isError(e, 'CALL_EXCEPTION')) return false
        throw e
      }
      let magic: unknown
      try {
        magic = ERC1271_INTERFACE.decodeFunctionResult('isValidSignature', result)[0]
      } catch (e) {
        if (isError(e, 'BAD_DATA')) return false
        throw e
      }
      return typeof magic === 'string' && magic.toLowerCase() === ERC1271_MAGIC_VALUE
    }
  }
}

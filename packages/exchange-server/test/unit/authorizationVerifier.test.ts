import {
  AbiCoder,
  AddressLike,
  TransactionRequest,
  TypedDataEncoder,
  Wallet,
  concat,
  getAddress,
  keccak256,
  makeError,
  recoverAddress,
} from 'ethers'
import { AuthorizationVerifier, EXCHANGE_TYPE, EXCHANGE_TYPEHASH, EXCHANGE_TYPES } from '../../src/services/AuthorizationVerifier'
import { ContractReader, ERC1271_INTERFACE, ERC1271_MAGIC_VALUE } from '../../src/services/SignatureVerifier'
import { DOMAIN, E18, NOW, signIntent } from '../fixtures'

const WALLET_CONTRACT = getAddress('0x00000000000000000000000000000000000000c1')

/** A smart-wallet account at WALLET_CONTRACT that accepts signatures from `owner`. */
function smartWalletReader(owner: string, mode: 'ok' | 'empty' | 'revert' | 'transport' = 'ok'): ContractReader {
  return {
    async getCode(address: AddressLike) {
      return typeof address === 'string' && getAddress(address) === WALLET_CONTRACT ? '0x6080' : '0x'
    },
    async call(tx: TransactionRequest) {
      if (mode === 'empty') return '0x'
      if (mode === 'revert') throw makeError('execution reverted', 'CALL_EXCEPTION')
      if (mode === 'transport') throw new Error('connection refused')
      const [hash, signature] = ERC1271_INTERFACE.decodeFunctionData('isValidSignature', tx.data ?? '0x')
      const signer = recoverAddress(String(hash), String(signature))
      const magic = signer === getAddress(owner) ? ERC1271_MAGIC_VALUE : '0xffffffff'
      return ERC1271_INTERFACE.encodeFunctionResult('isValidSignature', [magic])
    },
  }
}

describe('AuthorizationVerifier', () => {
  const verifier = new AuthorizationVerifier(DOMAIN)

  test('type string matches the encoded struct definition', () => {
    expect(TypedDataEncoder.from(EXCHANGE_TYPES).encodeType('Exchange')).toBe(EXCHANGE_TYPE)
  })

  test('digest is 0x1901 || domainSeparator || hashStruct', async () => {
    const user = Wallet.createRandom()
    const intent = await signIntent(user, { amount: 25n * E18 })
    const structHash = keccak256(
      AbiCoder.defaultAbiCoder().encode(
        ['bytes32', 'address', 'uint256', 'bytes32', 'uint256'],
        [EXCHANGE_TYPEHASH, intent.requester, intent.amount, intent.nonce, intent.expiration]
      )
    )
    expect(verifier.digest(intent)).toBe(keccak256(concat(['0x1901', verifier.domainSeparator(), structHash])))
  })

  test("accepts the requester's own signature", async () => {
    const user = Wallet.createRandom()
    const intent = await signIntent(user, { amount: 25n * E18 })
    await expect(verifier.verify(intent)).resolves.toEqual({ valid: true, digest: verifier.digest(intent), kind: 'eoa' })
  })

  test('rejects a signature over a different field value', async () => {
    const user = Wallet.createRandom()
    const intent = await signIntent(user, { amount: 25n * E18 })
    const result = await verifier.verify({ ...intent, amount: 26n * E18 })
    expect(result.valid).toBe(false)
  })

  test('a signature for one domain does not verify against another', async () => {
    const user = Wallet.createRandom()
    const intent = await signIntent(user, { amount: 25n * E18 })
    const otherChain = new AuthorizationVerifier({ ...DOMAIN, chainId: 1n })
    const otherContract = new AuthorizationVerifier({ ...DOMAIN, verifyingContract: getAddress('0x00000000000000000000000000000000000000e2') })

    expect(otherChain.domainSeparator()).not.toBe(verifier.domainSeparator())
    expect((await otherChain.verify(intent)).valid).toBe(false)
    expect((await otherContract.verify(intent)).valid).toBe(false)
  })

  test('malformed signature bytes verify as false', async () => {
    const user = Wallet.createRandom()
    const intent = await signIntent(user, { amount: 25n * E18 })
    expect((await verifier.verify({ ...intent, signature: '0x1234' })).valid).toBe(false)
  })

  test('isExpired only once the deadline has passed', () => {
    expect(verifier.isExpired(NOW - 1n, NOW)).toBe(true)
    expect(verifier.isExpired(NOW, NOW)).toBe(false)
    expect(verifier.isExpired(NOW + 1n, NOW)).toBe(false)
  })

  describe('contract accounts', () => {
    test('delegates to isValidSignature and accepts the magic value', async () => {
      const owner = Wallet.createRandom()
      const withReader = new AuthorizationVerifier(DOMAIN, smartWalletReader(owner.address))
      const intent = await signIntent(owner, { amount: 25n * E18, requester: WALLET_CONTRACT })

      const result = await withReader.verify(intent)
      expect(result).toEqual({ valid: true, digest: withReader.digest(intent), kind: 'erc1271' })
    })

    test('any other return value is a failure', async () => {
      const owner = Wallet.createRandom()
      const withReader = new AuthorizationVerifier(DOMAIN, smartWalletReader(owner.address))
      const intent = await signIntent(Wallet.createRandom(), { amount: 25n * E18, requester: WALLET_CONTRACT })
      expect(await withReader.verify(intent)).toMatchObject({ valid: false, kind: 'erc1271' })
    })

    test('empty return data and reverts are failures', async () => {
      const owner = Wallet.createRandom()
      const intent = await signIntent(owner, { amount: 25n * E18, requester: WALLET_CONTRACT })
      const empty = new AuthorizationVerifier(DOMAIN, smartWalletReader(owner.address, 'empty'))
      const reverting = new AuthorizationVerifier(DOMAIN, smartWalletReader(owner.address, 'revert'))
      expect((await empty.verify(intent)).valid).toBe(false)
      expect((await reverting.verify(intent)).valid).toBe(false)
    })

    test('transport errors propagate', async () => {
      const owner = Wallet.createRandom()
      const intent = await signIntent(owner, { amount: 25n * E18, requester: WALLET_CONTRACT })
      const broken = new AuthorizationVerifier(DOMAIN, smartWalletReader(owner.address, 'transport'))
      await expect(broken.verify(intent)).rejects.toThrow('connection refused')
    })

    test('without a reader the account is checked by recovery and fails', async () => {
      const owner = Wallet.createRandom()
      const intent = await signIntent(owner, { amount: 25n * E18, requester: WALLET_CONTRACT })
      expect(await verifier.verify(intent)).toMatchObject({ valid: false, kind: 'eoa' })
    })

    test('key-held accounts still use recovery when a reader is configured', async () => {
      const user = Wallet.createRandom()
      const withReader = new AuthorizationVerifier(DOMAIN, smartWalletReader(user.address))
      const intent = await signIntent(user, { amount: 25n * E18 })
      expect(await withReader.verify(intent)).toMatchObject({ valid: true, kind: 'eoa' })
    })
  })
})

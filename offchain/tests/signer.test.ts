import { secp256k1 } from '@noble/curves/secp256k1';
import { bytesToHex, hexToBigInt, hexToBytes, keccak256, recoverAddress, stringToHex, type Hex } from 'viem';
import { privateKeyToAccount, sign } from 'viem/accounts';
import { SubmissionError } from '../infra/errors';
import { KmsSigner, LocalKeySigner, type KmsApi } from '../infra/signer';
import { test, expect, expectEqual, expectRejects } from './test_harness';

const PRIVATE_KEY: Hex = `0x${'11'.repeat(32)}`;
const CHAIN_ID = 17000;
const CURVE_ORDER = secp256k1.CURVE.n;
// DER prefix of a secp256k1 SubjectPublicKeyInfo, up to the BIT STRING payload
const SPKI_PREFIX = hexToBytes('0x3056301006072a8648ce3d020106052b8104000a034200');

const digest = keccak256(stringToHex('beacon timestamp keeper'));
const account = privateKeyToAccount(PRIVATE_KEY);

function derSignature(r: bigint, s: bigint): Uint8Array {
  return new secp256k1.Signature(r, s).toDERRawBytes();
}

function fakeKms(options: { highS?: boolean; der?: Uint8Array } = {}): KmsApi & { signed: number } {
  const api: KmsApi & { signed: number } = {
    signed: 0,
    async getPublicKey(): Promise<Uint8Array> {
      return Uint8Array.from([...SPKI_PREFIX, ...hexToBytes(account.publicKey)]);
    },
    async signDigest(_keyId: string, message: Uint8Array): Promise<Uint8Array> {
      api.signed += 1;
      if (options.der) return options.der;
      const sig = await sign({ hash: bytesToHex(message), privateKey: PRIVATE_KEY });
      const s = hexToBigInt(sig.s);
      return derSignature(hexToBigInt(sig.r), options.highS ? CURVE_ORDER - s : s);
    },
  };
  return api;
}

test('local signer signature recovers to its address', async () => {
  const signer = new LocalKeySigner(PRIVATE_KEY, CHAIN_ID);
  const signature = await signer.sign(CHAIN_ID, digest);
  const recovered = await recoverAddress({ hash: digest, signature });
  expectEqual(recovered, account.address);
});

test('local signer refuses another chain id', async () => {
  const signer = new LocalKeySigner(PRIVATE_KEY, CHAIN_ID);
  const err = await expectRejects(() => signer.sign(1, digest), SubmissionError);
  expectEqual(err.message, 'signer bound to chain 17000 asked to sign for chain 1');
});

test('kms signer derives the address from the SPKI public key', async () => {
  const signer = await KmsSigner.create(fakeKms(), 'test-key-id', CHAIN_ID);
  expectEqual(signer.address, account.address);
});

test('kms signer picks the recovery parity that matches its address', async () => {
  const kms = fakeKms();
  const signer = await KmsSigner.create(kms, 'test-key-id', CHAIN_ID);
  const signature = await signer.sign(CHAIN_ID, digest);
  const recovered = await recoverAddress({ hash: digest, signature });
  expectEqual(recovered, account.address);
  expectEqual(kms.signed, 1);
});

test('kms signer normalizes high-s signatures', async () => {
  const signer = await KmsSigner.create(fakeKms({ highS: true }), 'test-key-id', CHAIN_ID);
  const signature = await signer.sign(CHAIN_ID, digest);
  const expected = await sign({ hash: digest, privateKey: PRIVATE_KEY });
  expectEqual(signature.s, expected.s);
  expectEqual(signature.r, expected.r);
  expect(hexToBigInt(signature.s) <= CURVE_ORDER / 2n, 's should be in the lower half of the curve order');
  expectEqual(signature.yParity, expected.yParity);
});

test('kms signer refuses another chain id without calling KMS', async () => {
  const kms = fakeKms();
  const signer = await KmsSigner.create(kms, 'test-key-id', CHAIN_ID);
  await expectRejects(() => signer.sign(CHAIN_ID + 1, digest), SubmissionError);
  expectEqual(kms.signed, 0);
});

test('kms signer rejects a truncated DER signature', async () => {
  const der = derSignature(5n, 7n);
  const signer = await KmsSigner.create(fakeKms({ der: der.subarray(0, der.length - 1) }), 'test-key-id', CHAIN_ID);
  await expectRejects(() => signer.sign(CHAIN_ID, digest), Error);
});

test('kms signer rejects a signature that recovers to another key', async () => {
  const foreign = await sign({ hash: digest, privateKey: `0x${'22'.repeat(32)}` });
  const der = derSignature(hexToBigInt(foreign.r), hexToBigInt(foreign.s));
  const signer = await KmsSigner.create(fakeKms({ der }), 'test-key-id', CHAIN_ID);
  const err = await expectRejects(() => signer.sign(CHAIN_ID, digest), Error);
  expectEqual(err.message, `KMS signature for key test-key-id does not recover to ${account.address}`);
});

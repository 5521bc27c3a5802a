import { GetPublicKeyCommand, KMSClient, SignCommand } from '@aws-sdk/client-kms';
import { secp256k1 } from '@noble/curves/secp256k1';
import { bytesToHex, hexToBytes, isAddressEqual, numberToHex, recoverAddress, type Address, type Hex, type Signature } from 'viem';
import { privateKeyToAccount, publicKeyToAddress, sign } from 'viem/accounts';
import type { SignerCfg } from './config';
import { SubmissionError } from './errors';

/**
 * Signing capability used by the transaction sender. Implementations receive the keccak digest of
 * the serialized transaction and return its secp256k1 signature.
 */
export interface TransactionSigner {
  readonly address: Address;
  sign(chainId: number, digest: Hex): Promise<Signature>;
}

function assertChain(expected: number, actual: number): void {
  if (expected !== actual) {
    throw new SubmissionError(`signer bound to chain ${expected} asked to sign for chain ${actual}`);
  }
}

export class LocalKeySigner implements TransactionSigner {
  readonly address: Address;

  constructor(private readonly privateKey: Hex, private readonly chainId: number) {
    this.address = privateKeyToAccount(privateKey).address;
  }

  async sign(chainId: number, digest: Hex): Promise<Signature> {
    assertChain(this.chainId, chainId);
    return sign({ hash: digest, privateKey: this.privateKey });
  }
}

export interface KmsApi {
  /** DER-encoded SubjectPublicKeyInfo */
  getPublicKey(keyId: string): Promise<Uint8Array>;
  /** DER-encoded ECDSA signature over a precomputed digest */
  signDigest(keyId: string, digest: Uint8Array): Promise<Uint8Array>;
}

export function awsKmsApi(client: KMSClient): KmsApi {
  return {
    async getPublicKey(keyId) {
      const res = await client.send(new GetPublicKeyCommand({ KeyId: keyId }));
      if (!res.PublicKey) throw new Error(`KMS key ${keyId} returned no public key`);
      return res.PublicKey;
    },
    async signDigest(keyId, digest) {
      const res = await client.send(
        new SignCommand({
          KeyId: keyId,
          Message: digest,
          MessageType: 'DIGEST',
          SigningAlgorithm: 'ECDSA_SHA_256',
        }),
      );
      if (!res.Signature) throw new Error(`KMS key ${keyId} returned no signature`);
      return res.Signature;
    },
  };
}

// The uncompressed point (0x04 || X || Y) is the trailing BIT STRING payload of the SPKI.
export function uncompressedPointFromSpki(spki: Uint8Array): Hex {
  if (spki.length < 65) throw new Error(`public key too short (${spki.length} bytes)`);
  const point = spki.subarray(spki.length - 65);
  if (point[0] !== 0x04) throw new Error('public key is not an uncompressed secp256k1 point');
  return bytesToHex(point);
}

export class KmsSigner implements TransactionSigner {
  private constructor(
    readonly address: Address,
    private readonly api: KmsApi,
    private readonly keyId: string,
    private readonly chainId: number,
  ) {}

  static async create(api: KmsApi, keyId: string, chainId: number): Promise<KmsSigner> {
    const spki = await api.getPublicKey(keyId);
    const address = publicKeyToAddress(uncompressedPointFromSpki(spki));
    return new KmsSigner(address, api, keyId, chainId);
  }

  async sign(chainId: number, digest: Hex): Promise<Signature> {
    assertChain(this.chainId, chainId);
    const der = await this.api.signDigest(this.keyId, hexToBytes(digest));
    // KMS may return the high-s form, which EIP-2 rejects
    const { r, s } = secp256k1.Signature.fromDER(der).normalizeS();
    const rHex = numberToHex(r, { size: 32 });
    const sHex = numberToHex(s, { size: 32 });

    for (const yParity of [0, 1]) {
      const signature: Signature = { r: rHex, s: sHex, yParity };
      const recovered = await recoverAddress({ hash: digest, signature });
      if (isAddressEqual(recovered, this.address)) return signature;
    }
    throw new Error(`KMS signature for key ${this.keyId} does not recover to ${this.address}`);
  }
}

export async function createSigner(cfg: SignerCfg, chainId: number): Promise<TransactionSigner> {
  if (cfg.kind === 'local') {
    return new LocalKeySigner(cfg.privateKey, chainId);
  }
  const client = new KMSClient({
    region: cfg.region,
    credentials: { accessKeyId: cfg.accessKeyId, secretAccessKey: cfg.secretAccessKey },
  });
  return KmsSigner.create(awsKmsApi(client), cfg.keyId, chainId);
}

import {
  encodeFunctionData,
  keccak256,
  serializeTransaction,
  type Address,
  type TransactionSerializableEIP1559,
} from 'viem';
import { BeaconOracleAbi } from '../abis/BeaconOracleAbi';
import { SubmissionError } from '../infra/errors';
import { instrument } from '../infra/instrument';
import type { ManagedClient } from '../infra/rpc_clients';
import type { TransactionSigner } from '../infra/signer';
import type { OracleWriter, SubmittedTx } from '../pipeline/types';

type WriterParams = {
  client: ManagedClient;
  signer: TransactionSigner;
  chainId: number;
  contract: Address;
  receiptTimeoutMs: number;
  target?: string;
};

/**
 * Sends addTimestamp through the signing capability: the payload is built and serialized here,
 * only its digest leaves the process.
 */
export function createOracleWriter(params: WriterParams): OracleWriter {
  const { client, signer, chainId, contract, receiptTimeoutMs, target } = params;

  async function send(timestamp: bigint): Promise<SubmittedTx> {
    const call = {
      address: contract,
      abi: BeaconOracleAbi,
      functionName: 'addTimestamp',
      args: [timestamp],
    } as const;

    const [nonce, fees, gas] = await Promise.all([
      instrument('getTransactionCount', () => client.getTransactionCount({ address: signer.address, blockTag: 'pending' }), { target }),
      instrument('estimateFeesPerGas', () => client.estimateFeesPerGas(), { target }),
      instrument('estimateContractGas', () => client.estimateContractGas({ ...call, account: signer.address }), { target }),
    ]);

    const tx: TransactionSerializableEIP1559 = {
      type: 'eip1559',
      chainId,
      to: contract,
      data: encodeFunctionData(call),
      value: 0n,
      nonce,
      gas,
      maxFeePerGas: fees.maxFeePerGas,
      maxPriorityFeePerGas: fees.maxPriorityFeePerGas,
    };

    const signature = await signer.sign(chainId, keccak256(serializeTransaction(tx)));
    const serializedTransaction = serializeTransaction(tx, signature);

    const hash = await instrument('sendRawTransaction', () => client.sendRawTransaction({ serializedTransaction }), { target });
    const receipt = await instrument('waitForTransactionReceipt', () =>
      client.waitForTransactionReceipt({ hash, timeout: receiptTimeoutMs }),
      { target },
    );
    if (receipt.status !== 'success') {
      throw new Error(`transaction ${hash} reverted in block ${receipt.blockNumber}`);
    }
    return { txHash: receipt.transactionHash, blockNumber: receipt.blockNumber };
  }

  return {
    from: signer.address,
    async addTimestamp(timestamp: bigint, candidate: bigint): Promise<SubmittedTx> {
      try {
        return await send(timestamp);
      } catch (err) {
        throw SubmissionError.wrap(candidate, timestamp, err);
      }
    },
  };
}

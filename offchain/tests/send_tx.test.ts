import {
  createPublicClient,
  custom,
  decodeFunctionData,
  isHex,
  keccak256,
  parseTransaction,
  recoverTransactionAddress,
  type Address,
  type Hex,
} from 'viem';
import { BeaconOracleAbi } from '../abis/BeaconOracleAbi';
import { createOracleWriter } from '../executor/send_tx';
import { SubmissionError } from '../infra/errors';
import { LocalKeySigner } from '../infra/signer';
import { test, expect, expectEqual, expectRejects } from './test_harness';

const CONTRACT: Address = '0x00000000000000000000000000000000000000aa';
const PRIVATE_KEY: Hex = `0x${'11'.repeat(32)}`;
const CHAIN_ID = 17000;
const TIMESTAMP = 1_700_006_000n;
const CANDIDATE = 100_500n;
const GWEI = 1_000_000_000n;

type NodeOptions = {
  receiptStatus?: '0x0' | '0x1';
  failEstimate?: boolean;
};

/** JSON-RPC node answering just what the writer asks for; records every raw transaction it receives. */
function fakeNode(options: NodeOptions = {}) {
  const methods: string[] = [];
  const rawTransactions: Hex[] = [];

  const client = createPublicClient({
    transport: custom(
      {
        async request({ method, params }: { method: string; params?: unknown }) {
          methods.push(method);
          switch (method) {
            case 'eth_getTransactionCount':
              return '0x7';
            case 'eth_getBlockByNumber':
              return {
                number: '0x10',
                hash: `0x${'ab'.repeat(32)}`,
                parentHash: `0x${'cd'.repeat(32)}`,
                timestamp: '0x6553f100',
                baseFeePerGas: '0x3b9aca00',
                gasLimit: '0x1c9c380',
                gasUsed: '0x0',
                transactions: [],
              };
            case 'eth_maxPriorityFeePerGas':
              return '0x3b9aca00';
            case 'eth_estimateGas':
              if (options.failEstimate) throw new Error('execution reverted');
              return '0xc350';
            case 'eth_sendRawTransaction': {
              const raw = Array.isArray(params) ? params[0] : undefined;
              if (!isHex(raw)) throw new Error('raw transaction missing');
              rawTransactions.push(raw);
              return keccak256(raw);
            }
            case 'eth_blockNumber':
              return '0x10';
            case 'eth_getTransactionReceipt': {
              const hash = Array.isArray(params) ? params[0] : undefined;
              return {
                blockHash: `0x${'ef'.repeat(32)}`,
                blockNumber: '0x10',
                contractAddress: null,
                cumulativeGasUsed: '0xc350',
                effectiveGasPrice: '0x47868c00',
                from: '0x00000000000000000000000000000000000000bb',
                gasUsed: '0xc350',
                logs: [],
                logsBloom: `0x${'00'.repeat(256)}`,
                status: options.receiptStatus ?? '0x1',
                to: CONTRACT,
                transactionHash: hash,
                transactionIndex: '0x0',
                type: '0x2',
              };
            }
            default:
              throw new Error(`unexpected RPC method ${method}`);
          }
        },
      },
      { retryCount: 0 },
    ),
  });

  return { client, methods, rawTransactions };
}

function writerFor(node: ReturnType<typeof fakeNode>, signerChainId = CHAIN_ID) {
  const signer = new LocalKeySigner(PRIVATE_KEY, signerChainId);
  const writer = createOracleWriter({
    client: node.client,
    signer,
    chainId: CHAIN_ID,
    contract: CONTRACT,
    receiptTimeoutMs: 5_000,
    target: 'test',
  });
  return { signer, writer };
}

test('writer sends a signed EIP-1559 addTimestamp from the signer address', async () => {
  const node = fakeNode();
  const { signer, writer } = writerFor(node);

  const tx = await writer.addTimestamp(TIMESTAMP, CANDIDATE);

  expectEqual(writer.from, signer.address);
  expectEqual(node.rawTransactions.length, 1);
  const raw = node.rawTransactions[0];
  expectEqual(await recoverTransactionAddress({ serializedTransaction: raw }), signer.address);

  const parsed = parseTransaction(raw);
  if (parsed.type !== 'eip1559') throw new Error(`expected an eip1559 transaction, got ${parsed.type}`);
  expectEqual(parsed.chainId, CHAIN_ID);
  expectEqual(parsed.nonce, 7);
  expectEqual(parsed.gas, 50_000n);
  expectEqual(parsed.to, CONTRACT);
  expectEqual(parsed.maxPriorityFeePerGas, GWEI);
  expect(parsed.data !== undefined, 'calldata should be present');
  if (parsed.data) {
    const call = decodeFunctionData({ abi: BeaconOracleAbi, data: parsed.data });
    expectEqual(call.functionName, 'addTimestamp');
    expectEqual(call.args?.[0], TIMESTAMP);
  }

  expectEqual(tx.txHash, keccak256(raw));
  expectEqual(tx.blockNumber, 16n);
});

test('writer turns a reverted receipt into SubmissionError', async () => {
  const node = fakeNode({ receiptStatus: '0x0' });
  const { writer } = writerFor(node);

  const err = await expectRejects(() => writer.addTimestamp(TIMESTAMP, CANDIDATE), SubmissionError);
  const hash = keccak256(node.rawTransactions[0]);
  expectEqual(err.message, `addTimestamp(${TIMESTAMP}) for block ${CANDIDATE} failed: transaction ${hash} reverted in block 16`);
  expectEqual(err.candidate, CANDIDATE);
  expectEqual(err.timestamp, TIMESTAMP);
});

test('writer broadcasts nothing when gas estimation fails', async () => {
  const node = fakeNode({ failEstimate: true });
  const { writer } = writerFor(node);

  const err = await expectRejects(() => writer.addTimestamp(TIMESTAMP, CANDIDATE), SubmissionError);
  expectEqual(err.candidate, CANDIDATE);
  expectEqual(node.rawTransactions.length, 0);
  expect(!node.methods.includes('eth_sendRawTransaction'), 'no transaction should be broadcast');
});

test('writer broadcasts nothing when the signer is bound to another chain', async () => {
  const node = fakeNode();
  const { writer } = writerFor(node, 1);

  const err = await expectRejects(() => writer.addTimestamp(TIMESTAMP, CANDIDATE), SubmissionError);
  expectEqual(
    err.message,
    `addTimestamp(${TIMESTAMP}) for block ${CANDIDATE} failed: signer bound to chain 1 asked to sign for chain ${CHAIN_ID}`,
  );
  expectEqual(node.rawTransactions.length, 0);
});

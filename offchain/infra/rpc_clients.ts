import { createPublicClient, getAbiItem, http, type Address, type Hex, type PublicClient } from 'viem';
import { BeaconOracleAbi } from '../abis/BeaconOracleAbi';
import type { RpcBatchCfg } from './config';
import type { OracleReader, OracleUpdateLog } from '../pipeline/types';
import { BlockFetchError, ProviderError } from './errors';
import { instrument, metricTargetFromRpc } from './instrument';
import { log } from './logger';

export type ManagedClient = PublicClient;

const UPDATE_EVENT = getAbiItem({ abi: BeaconOracleAbi, name: 'EigenLayerBeaconOracleUpdate' });

export function createHttpClient(rpcUrl: string, batch: RpcBatchCfg): ManagedClient {
  const client = createPublicClient({
    transport: http(rpcUrl, {
      batch: { batchSize: batch.batchSize, wait: batch.waitMs },
    }),
  });
  log.debug({ rpc: metricTargetFromRpc(rpcUrl), batchSize: batch.batchSize }, 'rpc-http-client-created');
  return client;
}

type ReaderOptions = {
  /** metric label; the RPC host by default */
  target?: string;
  timeoutMs?: number;
};

export function createOracleReader(client: ManagedClient, contract: Address, options: ReaderOptions = {}): OracleReader {
  const { target, timeoutMs } = options;

  async function call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await instrument(operation, fn, { target, timeoutMs });
    } catch (err) {
      if (err instanceof ProviderError) throw err;
      throw new ProviderError(operation, err);
    }
  }

  return {
    contract,

    getHeadBlock: () => call('getBlockNumber', () => client.getBlockNumber({ cacheTime: 0 })),

    async getUpdateLogs(fromBlock: bigint, toBlock: bigint): Promise<OracleUpdateLog[]> {
      const logs = await call('getLogs', () =>
        client.getLogs({ address: contract, event: UPDATE_EVENT, fromBlock, toBlock }),
      );
      return logs.map((entry) => ({
        blockNumber: entry.blockNumber,
        timestamp: entry.args.timestamp,
        blockRoot: entry.args.blockRoot,
      }));
    },

    async getBlockTimestamp(blockNumber: bigint): Promise<bigint> {
      try {
        const block = await instrument('getBlock', () => client.getBlock({ blockNumber }), { target, timeoutMs });
        return block.timestamp;
      } catch (err) {
        throw new BlockFetchError(blockNumber, err);
      }
    },

    timestampToBeaconRoot: (timestamp: bigint): Promise<Hex> =>
      call('timestampToBlockRoot', () =>
        client.readContract({
          address: contract,
          abi: BeaconOracleAbi,
          functionName: 'timestampToBlockRoot',
          args: [timestamp],
        }),
      ),
  };
}

import type { AppConfig } from '../infra/config';
import { createOracleWriter } from '../executor/send_tx';
import { metricTargetFromRpc } from '../infra/instrument';
import { createHttpClient, createOracleReader, type ManagedClient } from '../infra/rpc_clients';
import { createSigner, type TransactionSigner } from '../infra/signer';
import type { OracleBindings } from './types';

export type LiveBindings = OracleBindings & {
  client: ManagedClient;
  signer: TransactionSigner;
};

/** Fresh client and signer for one cycle; nothing is carried across the scheduler's sleep. */
export async function connectBindings(cfg: AppConfig): Promise<LiveBindings> {
  const target = metricTargetFromRpc(cfg.rpcUrl);
  const client = createHttpClient(cfg.rpcUrl, cfg.rpcBatch);
  const signer = await createSigner(cfg.signer, cfg.chainId);
  const reader = createOracleReader(client, cfg.contract, { target, timeoutMs: cfg.rpcTimeoutMs });
  const writer = createOracleWriter({
    client,
    signer,
    chainId: cfg.chainId,
    contract: cfg.contract,
    receiptTimeoutMs: cfg.receiptTimeoutMs,
    target,
  });
  return { client, signer, reader, writer };
}

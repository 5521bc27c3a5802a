import type { Address, Hex } from 'viem';

export type OracleUpdateLog = {
  /** null while the log belongs to a pending block */
  blockNumber: bigint | null;
  timestamp?: bigint;
  blockRoot?: Hex;
};

/** Read side of the chain, bound to one oracle contract. */
export interface OracleReader {
  readonly contract: Address;
  getHeadBlock(): Promise<bigint>;
  getUpdateLogs(fromBlock: bigint, toBlock: bigint): Promise<OracleUpdateLog[]>;
  getBlockTimestamp(blockNumber: bigint): Promise<bigint>;
  timestampToBeaconRoot(timestamp: bigint): Promise<Hex>;
}

export type SubmittedTx = {
  txHash: Hex;
  blockNumber: bigint;
};

export interface OracleWriter {
  readonly from: Address;
  /** `candidate` is the block whose timestamp is being recorded; it only labels failures. */
  addTimestamp(timestamp: bigint, candidate: bigint): Promise<SubmittedTx>;
}

export type OracleBindings = {
  reader: OracleReader;
  writer: OracleWriter;
};

export type SkipReason = 'not-due' | 'already-recorded' | 'dry-run' | 'kill-switch';

export type FailureStage = 'connect' | 'head' | 'locate' | 'block-fetch' | 'root-lookup' | 'submission';

export type Outcome =
  | { kind: 'skipped'; reason: SkipReason; candidate: bigint; timestamp?: bigint }
  | { kind: 'submitted'; candidate: bigint; timestamp: bigint; txHash: Hex; blockNumber: bigint }
  | { kind: 'failed'; stage: FailureStage; error: Error; candidate?: bigint };

export type CycleReport = {
  head?: bigint;
  checkpoint?: bigint;
  gap?: bigint;
  outcome: Outcome;
};

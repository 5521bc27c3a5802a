import { CheckpointNotFoundError } from '../infra/errors';
import { log } from '../infra/logger';
import type { OracleReader } from '../pipeline/types';

export const LOG_WINDOW_BLOCKS = 500n;
// ~1 day of 12s blocks
export const MAX_SEARCH_DISTANCE = 7200n;

const locatorLog = log.child({ module: 'indexer.checkpoint_locator' });

export type LocateOptions = {
  /** chain head already read by the caller; fetched from the reader otherwise */
  head?: bigint;
  windowSize?: bigint;
  maxDistance?: bigint;
};

/**
 * Finds the block of the most recent oracle update event by scanning backwards from the head in
 * fixed windows. Windows tile `[head - maxDistance, head]` exactly: each one ends one block below
 * the previous start, and the walk stops after the window that reaches the floor.
 */
export async function locateLatestCheckpoint(reader: OracleReader, options: LocateOptions = {}): Promise<bigint> {
  const windowSize = options.windowSize ?? LOG_WINDOW_BLOCKS;
  const maxDistance = options.maxDistance ?? MAX_SEARCH_DISTANCE;
  if (windowSize <= 0n) throw new RangeError('windowSize must be positive');

  const head = options.head ?? (await reader.getHeadBlock());
  const floor = head > maxDistance ? head - maxDistance : 0n;

  let toBlock = head;
  while (toBlock >= floor) {
    const fromBlock = toBlock - windowSize + 1n > floor ? toBlock - windowSize + 1n : floor;
    locatorLog.debug({ contract: reader.contract, fromBlock, toBlock }, 'checkpoint-window-scan');

    const logs = await reader.getUpdateLogs(fromBlock, toBlock);
    let latest: bigint | undefined;
    for (const entry of logs) {
      if (entry.blockNumber === null) continue;
      if (latest === undefined || entry.blockNumber > latest) latest = entry.blockNumber;
    }
    if (latest !== undefined) {
      return latest;
    }

    if (fromBlock === floor) break;
    toBlock = fromBlock - 1n;
  }

  throw new CheckpointNotFoundError(head, floor);
}

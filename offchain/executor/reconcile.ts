import { zeroHash } from 'viem';
import type { Logger } from 'pino';
import { describeError, ProviderError } from '../infra/errors';
import { log } from '../infra/logger';
import type { KillSwitch } from '../infra/kill_switch';
import type { FailureStage, OracleReader, OracleWriter, Outcome } from '../pipeline/types';

// Blocks kept between the candidate and the head so a lagging RPC node or a tip reorg cannot bite.
export const SAFETY_MARGIN = 5n;

export type ReconcileOptions = {
  dryRun?: boolean;
  killSwitch?: KillSwitch;
  logger?: Logger;
};

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function failed(stage: FailureStage, err: unknown, candidate: bigint): Outcome {
  return { kind: 'failed', stage, error: toError(err), candidate };
}

export function isCandidateDue(candidate: bigint, head: bigint): boolean {
  return candidate < head - SAFETY_MARGIN;
}

/**
 * Decides whether the next checkpoint is due and, when its timestamp is not yet recorded, sends
 * exactly one addTimestamp. Never throws: every failure is reported as an Outcome so the next
 * cycle can re-derive the decision from chain state.
 */
export async function reconcile(
  reader: OracleReader,
  writer: OracleWriter,
  checkpoint: bigint,
  head: bigint,
  interval: bigint,
  options: ReconcileOptions = {},
): Promise<Outcome> {
  const candidate = checkpoint + interval;
  const rlog = (options.logger ?? log).child({ module: 'executor.reconcile', candidate, head });

  if (!isCandidateDue(candidate, head)) {
    rlog.debug({ confirmedHead: head - SAFETY_MARGIN }, 'candidate-not-due');
    return { kind: 'skipped', reason: 'not-due', candidate };
  }

  rlog.info('candidate-due');

  let timestamp: bigint;
  try {
    timestamp = await reader.getBlockTimestamp(candidate);
  } catch (err) {
    rlog.warn({ err: describeError(err) }, 'candidate-block-fetch-failed');
    return failed('block-fetch', err, candidate);
  }

  let root: string;
  try {
    root = await reader.timestampToBeaconRoot(timestamp);
  } catch (err) {
    rlog.warn({ err: describeError(err), timestamp }, 'beacon-root-lookup-failed');
    return failed('root-lookup', err instanceof ProviderError ? err : new ProviderError('timestampToBlockRoot', err), candidate);
  }

  if (root !== zeroHash) {
    rlog.info({ timestamp, root }, 'timestamp-already-recorded');
    return { kind: 'skipped', reason: 'already-recorded', candidate, timestamp };
  }

  if (options.killSwitch?.isActive()) {
    rlog.warn({ timestamp, killSwitch: options.killSwitch.path() }, 'kill-switch-active');
    return { kind: 'skipped', reason: 'kill-switch', candidate, timestamp };
  }

  if (options.dryRun) {
    rlog.info({ timestamp, contract: reader.contract, from: writer.from }, 'dry-run-add-timestamp');
    return { kind: 'skipped', reason: 'dry-run', candidate, timestamp };
  }

  try {
    const tx = await writer.addTimestamp(timestamp, candidate);
    rlog.info({ timestamp, txHash: tx.txHash, includedIn: tx.blockNumber }, 'timestamp-added');
    return { kind: 'submitted', candidate, timestamp, txHash: tx.txHash, blockNumber: tx.blockNumber };
  } catch (err) {
    rlog.error({ err: describeError(err), timestamp }, 'add-timestamp-failed');
    return failed('submission', err, candidate);
  }
}

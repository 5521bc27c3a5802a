import { setTimeout as delay } from 'timers/promises';
import { performance } from 'perf_hooks';
import type { Logger } from 'pino';
import { reconcile, type ReconcileOptions } from '../executor/reconcile';
import { locateLatestCheckpoint, type LocateOptions } from '../indexer/checkpoint_locator';
import { CheckpointNotFoundError, describeError } from '../infra/errors';
import { log } from '../infra/logger';
import { counter, gauge, histogram } from '../infra/metrics';
import type { CycleReport, FailureStage, OracleBindings, Outcome } from './types';

export const DEFAULT_POLL_INTERVAL_MS = 60_000;

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export async function abortableSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal.aborted) return;
    throw err;
  }
}

export type SchedulerDeps = {
  /** Builds fresh provider/signer bindings; called once per cycle. */
  connect: () => Promise<OracleBindings>;
  interval: bigint;
  pollIntervalMs?: number;
  sleep?: SleepFn;
  now?: () => number;
  reconcileOptions?: Omit<ReconcileOptions, 'logger'>;
  locateOptions?: Omit<LocateOptions, 'head'>;
  onFailure?: (report: CycleReport) => Promise<void>;
  logger?: Logger;
};

function failure(stage: FailureStage, err: unknown): Outcome {
  return { kind: 'failed', stage, error: err instanceof Error ? err : new Error(String(err)) };
}

/**
 * Runs locate → reconcile on a fixed cadence. Cycles never overlap, which the read-then-write
 * duplicate guard in reconcile relies on.
 */
export class OracleScheduler {
  private readonly schedulerLog: Logger;
  private readonly abort = new AbortController();
  private readonly sleep: SleepFn;
  private readonly now: () => number;
  private readonly pollIntervalMs: number;
  private cycles = 0;

  constructor(private readonly deps: SchedulerDeps) {
    this.schedulerLog = (deps.logger ?? log).child({ module: 'pipeline.scheduler' });
    this.sleep = deps.sleep ?? abortableSleep;
    this.now = deps.now ?? (() => performance.now());
    this.pollIntervalMs = deps.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
  }

  get running(): boolean {
    return !this.abort.signal.aborted;
  }

  get completedCycles(): number {
    return this.cycles;
  }

  stop(reason: string): void {
    if (!this.running) return;
    this.schedulerLog.warn({ reason }, 'scheduler-stopping');
    this.abort.abort();
  }

  async run(): Promise<void> {
    this.schedulerLog.info({ pollIntervalMs: this.pollIntervalMs, interval: this.deps.interval }, 'scheduler-started');
    while (this.running) {
      await this.runCycle();
      if (!this.running) break;
      await this.sleep(this.pollIntervalMs, this.abort.signal);
    }
    this.schedulerLog.info({ cycles: this.cycles }, 'scheduler-stopped');
  }

  async runCycle(): Promise<CycleReport> {
    const started = this.now();
    const report = await this.evaluate();
    this.cycles += 1;

    const { outcome } = report;
    histogram.cycleDuration.observe((this.now() - started) / 1000);
    counter.cycles.inc({ outcome: outcome.kind });
    if (outcome.kind === 'submitted') counter.submissions.inc();

    if (outcome.kind === 'failed') {
      counter.failures.inc({ stage: outcome.stage });
      this.schedulerLog.error(
        {
          stage: outcome.stage,
          err: describeError(outcome.error),
          head: report.head,
          checkpoint: report.checkpoint,
          candidate: outcome.candidate,
        },
        'cycle-failed',
      );
      if (this.deps.onFailure) {
        try {
          await this.deps.onFailure(report);
        } catch (err) {
          this.schedulerLog.warn({ err: describeError(err) }, 'failure-hook-error');
        }
      }
    }
    return report;
  }

  private async evaluate(): Promise<CycleReport> {
    let bindings: OracleBindings;
    try {
      bindings = await this.deps.connect();
    } catch (err) {
      return { outcome: failure('connect', err) };
    }
    const { reader, writer } = bindings;

    let head: bigint;
    try {
      head = await reader.getHeadBlock();
    } catch (err) {
      return { outcome: failure('head', err) };
    }
    gauge.headBlock.set(Number(head));

    let checkpoint: bigint;
    try {
      checkpoint = await locateLatestCheckpoint(reader, { ...this.deps.locateOptions, head });
    } catch (err) {
      if (err instanceof CheckpointNotFoundError) {
        this.schedulerLog.error({ head: err.head, floor: err.floor, contract: reader.contract }, 'checkpoint-not-found');
      }
      return { head, outcome: failure('locate', err) };
    }

    const gap = head - checkpoint;
    gauge.checkpointBlock.set(Number(checkpoint));
    gauge.checkpointGap.set(Number(gap));
    this.schedulerLog.info({ checkpoint, head, gap }, 'oracle-status');

    const outcome = await reconcile(reader, writer, checkpoint, head, this.deps.interval, {
      ...this.deps.reconcileOptions,
      logger: this.deps.logger,
    });
    return { head, checkpoint, gap, outcome };
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class CheckpointNotFoundError extends Error {
  readonly head: bigint;
  readonly floor: bigint;

  constructor(head: bigint, floor: bigint) {
    super(`no oracle update event between blocks ${floor} and ${head}`);
    this.name = 'CheckpointNotFoundError';
    this.head = head;
    this.floor = floor;
  }
}

/** Transient RPC failure. The cycle is abandoned and retried on the next tick. */
export class ProviderError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${describeError(cause)}`, { cause });
    this.name = 'ProviderError';
    this.operation = operation;
  }
}

export class BlockFetchError extends ProviderError {
  readonly blockNumber: bigint;

  constructor(blockNumber: bigint, cause: unknown) {
    super(`getBlock(${blockNumber})`, cause);
    this.name = 'BlockFetchError';
    this.blockNumber = blockNumber;
  }
}

export type SubmissionContext = {
  candidate?: bigint;
  timestamp?: bigint;
};

/** Signing, broadcast, confirmation or revert failure of an addTimestamp transaction. */
export class SubmissionError extends Error {
  readonly candidate?: bigint;
  readonly timestamp?: bigint;

  constructor(message: string, context: SubmissionContext = {}, cause?: unknown) {
    super(message, { cause });
    this.name = 'SubmissionError';
    this.candidate = context.candidate;
    this.timestamp = context.timestamp;
  }

  static wrap(candidate: bigint, timestamp: bigint, cause: unknown): SubmissionError {
    return new SubmissionError(
      `addTimestamp(${timestamp}) for block ${candidate} failed: ${describeError(cause)}`,
      { candidate, timestamp },
      cause,
    );
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    // viem errors carry a multi-line message; the short one is enough for logs
    if ('shortMessage' in err && typeof err.shortMessage === 'string' && err.shortMessage.length > 0) {
      return err.shortMessage;
    }
    return err.message;
  }
  return String(err);
}

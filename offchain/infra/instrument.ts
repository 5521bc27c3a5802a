import { histogram, counter } from './metrics';
import { ProviderError } from './errors';

export function metricTargetFromRpc(rpc: string, fallback = 'public'): string {
  try {
    const url = new URL(rpc);
    return url.host;
  } catch {
    return fallback;
  }
}

type InstrumentOptions = {
  target?: string;
  /** Per-call deadline. Expiry rejects with a ProviderError; the underlying request is left to the transport. */
  timeoutMs?: number;
};

function withDeadline<T>(name: string, operation: Promise<T>, timeoutMs: number | undefined): Promise<T> {
  if (!timeoutMs || timeoutMs <= 0) return operation;
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new ProviderError(name, new Error(`timed out after ${timeoutMs}ms`)));
    }, timeoutMs);
  });
  return Promise.race([operation, deadline]).finally(() => {
    if (timer) clearTimeout(timer);
  });
}

export async function instrument<T>(
  name: string,
  operation: () => Promise<T>,
  options: InstrumentOptions = {},
): Promise<T> {
  const end = histogram.rpcCallDuration.startTimer();
  const target = options.target ?? 'public';
  const baseLabels = {
    operation: name,
    target,
  };

  try {
    const result = await withDeadline(name, operation(), options.timeoutMs);
    end({ ...baseLabels, status: 'success' });
    return result;
  } catch (error) {
    end({ ...baseLabels, status: 'error' });
    counter.rpcErrors.inc(baseLabels);
    throw error;
  }
}

import { ProviderError } from '../infra/errors';
import { instrument, metricTargetFromRpc } from '../infra/instrument';
import { registry } from '../infra/metrics';
import { test, expect, expectEqual, expectRejects } from './test_harness';

test('metric target is the RPC host', () => {
  expectEqual(metricTargetFromRpc('https://rpc.example:8545/v1/test-key'), 'rpc.example:8545');
  expectEqual(metricTargetFromRpc('not a url'), 'public');
});

test('instrument passes results through', async () => {
  const value = await instrument('fast', async () => 42n, { timeoutMs: 1_000 });
  expectEqual(value, 42n);
});

test('instrument enforces the per-call deadline', async () => {
  const err = await expectRejects(
    () => instrument('slow', () => new Promise<void>((resolve) => setTimeout(resolve, 200)), { timeoutMs: 10 }),
    ProviderError,
  );
  expectEqual(err.operation, 'slow');
  expectEqual(err.message, 'slow failed: timed out after 10ms');
});

test('instrument rethrows operation errors unchanged', async () => {
  const original = new Error('boom');
  try {
    await instrument('broken', async () => {
      throw original;
    });
    throw new Error('expected rejection');
  } catch (err) {
    expect(err === original, 'the original error should propagate');
  }
});

test('every keeper metric is registered for scraping', async () => {
  const exposed = await registry.metrics();
  for (const name of [
    'oracle_checkpoint_block',
    'chain_head_block',
    'oracle_checkpoint_gap_blocks',
    'rpc_call_duration_seconds',
    'keeper_cycle_duration_seconds',
    'keeper_cycles_total',
    'keeper_failures_total',
    'oracle_submissions_total',
    'rpc_errors_total',
  ]) {
    expect(registry.getSingleMetric(name) !== undefined, `${name} should be registered`);
    expect(exposed.includes(`# TYPE ${name} `), `${name} should be exposed`);
  }
});

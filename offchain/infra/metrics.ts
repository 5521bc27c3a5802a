import client from 'prom-client';

export const registry = new client.Registry();

export const gauge = {
  checkpointBlock: new client.Gauge({ name: 'oracle_checkpoint_block', help: 'Block number of the latest oracle update event' }),
  headBlock: new client.Gauge({ name: 'chain_head_block', help: 'Chain head observed at the start of the cycle' }),
  checkpointGap: new client.Gauge({ name: 'oracle_checkpoint_gap_blocks', help: 'Blocks between the chain head and the oracle checkpoint' }),
};
registry.registerMetric(gauge.checkpointBlock);
registry.registerMetric(gauge.headBlock);
registry.registerMetric(gauge.checkpointGap);

export const histogram = {
  rpcCallDuration: new client.Histogram({
    name: 'rpc_call_duration_seconds',
    help: 'Duration of RPC calls in seconds',
    labelNames: ['operation', 'status', 'target'],
  }),
  cycleDuration: new client.Histogram({
    name: 'keeper_cycle_duration_seconds',
    help: 'Time spent on one locate/reconcile cycle',
    buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 30, 60, 180],
  }),
};
registry.registerMetric(histogram.rpcCallDuration);
registry.registerMetric(histogram.cycleDuration);

export const counter = {
  cycles: new client.Counter({ name: 'keeper_cycles_total', help: 'Completed keeper cycles by outcome', labelNames: ['outcome'] }),
  failures: new client.Counter({ name: 'keeper_failures_total', help: 'Failed keeper cycles by stage', labelNames: ['stage'] }),
  submissions: new client.Counter({ name: 'oracle_submissions_total', help: 'addTimestamp transactions confirmed on-chain' }),
  rpcErrors: new client.Counter({ name: 'rpc_errors_total', help: 'Total RPC errors', labelNames: ['operation', 'target'] }),
};
registry.registerMetric(counter.cycles);
registry.registerMetric(counter.failures);
registry.registerMetric(counter.submissions);
registry.registerMetric(counter.rpcErrors);

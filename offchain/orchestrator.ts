import './infra/env';
import type { Server } from 'http';
import { loadConfig } from './infra/config';
import { ConfigError, describeError } from './infra/errors';
import { log } from './infra/logger';
import { startMetricsServer } from './infra/metrics_server';
import { createAlertSender, createAlertThrottle, failureAlertFromReport } from './infra/alerts';
import { createKillSwitch } from './infra/kill_switch';
import { connectBindings } from './pipeline/bindings';
import { OracleScheduler } from './pipeline/scheduler';

const ALERT_COOLDOWN_MS = 15 * 60 * 1000;

async function main() {
  const cfg = loadConfig();
  log.info(
    {
      contract: cfg.contract,
      chainId: cfg.chainId,
      blockInterval: cfg.blockInterval,
      signer: cfg.signer.kind,
      dryRun: cfg.dryRun,
      pollIntervalMs: cfg.pollIntervalMs,
    },
    'boot',
  );

  const metricsServer: Server | undefined = cfg.metricsEnabled ? startMetricsServer(cfg.metricsPort) : undefined;
  const alert = createAlertThrottle(createAlertSender(cfg.alerts), ALERT_COOLDOWN_MS);

  const scheduler = new OracleScheduler({
    connect: () => connectBindings(cfg),
    interval: cfg.blockInterval,
    pollIntervalMs: cfg.pollIntervalMs,
    reconcileOptions: {
      dryRun: cfg.dryRun,
      killSwitch: createKillSwitch(cfg.killSwitchFile),
    },
    onFailure: async (report) => {
      const failure = failureAlertFromReport(report);
      if (failure) await alert(failure);
    },
  });

  // The in-flight cycle (including a pending receipt) completes before the loop exits.
  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => scheduler.stop(signal));
  }

  await scheduler.run();
  metricsServer?.close();
  log.info('keeper-exited');
}

main().catch((e) => {
  if (e instanceof ConfigError) {
    log.fatal({ issues: e.issues }, 'config-invalid');
  } else {
    log.fatal({ err: describeError(e) }, 'orchestrator-fatal');
    console.error(e);
  }
  process.exit(1);
});

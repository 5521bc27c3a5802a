import '../infra/env';
import { formatEther } from 'viem';
import { loadConfig, type AppConfig } from '../infra/config';
import { describeError } from '../infra/errors';
import { log } from '../infra/logger';
import { createKillSwitch } from '../infra/kill_switch';
import { isCandidateDue, SAFETY_MARGIN } from '../executor/reconcile';
import { locateLatestCheckpoint } from '../indexer/checkpoint_locator';
import { connectBindings, type LiveBindings } from '../pipeline/bindings';

type DiagnosticStatus = 'ok' | 'warn' | 'error';
type Diagnostic = {
  component: string;
  status: DiagnosticStatus;
  message: string;
  meta?: Record<string, unknown>;
};

const diagnostics: Diagnostic[] = [];

function record(component: string, status: DiagnosticStatus, message: string, meta?: Record<string, unknown>): boolean {
  diagnostics.push({ component, status, message, meta });
  return status !== 'error';
}

async function checkChain(cfg: AppConfig, bindings: LiveBindings): Promise<boolean> {
  try {
    const chainId = await bindings.client.getChainId();
    if (chainId !== cfg.chainId) {
      return record('rpc', 'error', 'chain id mismatch', { expected: cfg.chainId, actual: chainId });
    }
    return record('rpc', 'ok', 'chain id matches', { chainId });
  } catch (err) {
    return record('rpc', 'error', describeError(err));
  }
}

async function checkSignerBalance(bindings: LiveBindings): Promise<boolean> {
  try {
    const balance = await bindings.client.getBalance({ address: bindings.signer.address });
    const status: DiagnosticStatus = balance === 0n ? 'warn' : 'ok';
    return record('signer', status, `balance ${formatEther(balance)} native`, { address: bindings.signer.address });
  } catch (err) {
    return record('signer', 'error', describeError(err), { address: bindings.signer.address });
  }
}

async function checkCheckpoint(cfg: AppConfig, bindings: LiveBindings): Promise<boolean> {
  try {
    const head = await bindings.reader.getHeadBlock();
    const checkpoint = await locateLatestCheckpoint(bindings.reader, { head });
    const candidate = checkpoint + cfg.blockInterval;
    return record('oracle', 'ok', isCandidateDue(candidate, head) ? 'candidate due' : 'up to date', {
      checkpoint: checkpoint.toString(),
      head: head.toString(),
      gap: (head - checkpoint).toString(),
      candidate: candidate.toString(),
      safetyMargin: SAFETY_MARGIN.toString(),
    });
  } catch (err) {
    return record('oracle', 'error', describeError(err));
  }
}

function checkKillSwitchStatus(cfg: AppConfig): boolean {
  const killSwitch = createKillSwitch(cfg.killSwitchFile);
  if (killSwitch.isActive({ force: true })) {
    return record('kill-switch', 'warn', 'submissions paused', { path: killSwitch.path() });
  }
  return record('kill-switch', 'ok', killSwitch.path() ? 'armed' : 'not configured');
}

async function main() {
  const cfg = loadConfig();
  const bindings = await connectBindings(cfg);
  const results = [
    await checkChain(cfg, bindings),
    await checkSignerBalance(bindings),
    await checkCheckpoint(cfg, bindings),
    checkKillSwitchStatus(cfg),
  ];

  log.info({ diagnostics }, 'preflight-diagnostics');

  if (!results.every(Boolean)) {
    log.error({}, 'preflight-failed');
    process.exit(1);
  }
  log.info({}, 'preflight-ok');
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});

import type { Address, Hex } from 'viem';
import { z } from 'zod';
import { EvmAddressSchema, PrivateKeySchema } from './address';
import type { AlertSinks } from './alerts';
import { ConfigError } from './errors';

export type KmsSignerCfg = {
  kind: 'kms';
  accessKeyId: string;
  secretAccessKey: string;
  keyId: string;
  region: string;
};

export type LocalSignerCfg = {
  kind: 'local';
  privateKey: Hex;
};

export type SignerCfg = KmsSignerCfg | LocalSignerCfg;

export type RpcBatchCfg = {
  batchSize: number;
  waitMs: number;
};

export type AppConfig = {
  rpcUrl: string;
  contract: Address;
  blockInterval: bigint;
  chainId: number;
  signer: SignerCfg;
  pollIntervalMs: number;
  rpcTimeoutMs: number;
  rpcBatch: RpcBatchCfg;
  receiptTimeoutMs: number;
  dryRun: boolean;
  killSwitchFile?: string;
  metricsPort: number;
  metricsEnabled: boolean;
  alerts: AlertSinks;
};

// Blank variables are treated as unset so that `FOO=` in .env falls back to defaults.
function env<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (typeof value === 'string' && value.trim() === '' ? undefined : value), schema);
}

const PositiveIntString = z.string().trim().regex(/^[1-9]\d*$/, 'must be a positive integer');

const flag = env(
  z
    .enum(['0', '1', 'true', 'false'])
    .optional()
    .transform((value) => value === '1' || value === 'true'),
);

const millis = (fallback: number) => env(z.coerce.number().int().positive().default(fallback));

const BaseEnvSchema = z.object({
  RPC_URL: env(z.string().url()),
  CONTRACT_ADDRESS: env(EvmAddressSchema),
  BLOCK_INTERVAL: env(PositiveIntString.transform((value) => BigInt(value))),
  CHAIN_ID: env(PositiveIntString.transform((value) => Number(value))),
  SIGNER_BACKEND: env(z.enum(['kms', 'local']).default('kms')),
  POLL_INTERVAL_MS: millis(60_000),
  RPC_TIMEOUT_MS: millis(30_000),
  RECEIPT_TIMEOUT_MS: millis(180_000),
  RPC_HTTP_BATCH_SIZE: env(z.coerce.number().int().positive().default(20)),
  RPC_HTTP_BATCH_DELAY_MS: env(z.coerce.number().int().nonnegative().default(10)),
  DRY_RUN: flag,
  KILL_SWITCH_FILE: env(z.string().trim().optional()),
  PROM_PORT: env(z.coerce.number().int().min(1).max(65_535).default(9464)),
  METRICS_DISABLED: flag,
  SLACK_WEBHOOK_URL: env(z.string().url().optional()),
  PAGERDUTY_API_KEY: env(z.string().trim().optional()),
});

const KmsEnvSchema = z.object({
  ACCESS_KEY: env(z.string()),
  SECRET_ACCESS_KEY: env(z.string()),
  KEY_ID: env(z.string()),
  REGION: env(z.string()),
});

const LocalEnvSchema = z.object({
  SIGNER_PRIVATE_KEY: env(PrivateKeySchema),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

function parseSigner(backend: 'kms' | 'local', source: NodeJS.ProcessEnv): { signer?: SignerCfg; issues: string[] } {
  if (backend === 'local') {
    const parsed = LocalEnvSchema.safeParse(source);
    if (!parsed.success) return { issues: formatIssues(parsed.error) };
    return { signer: { kind: 'local', privateKey: parsed.data.SIGNER_PRIVATE_KEY }, issues: [] };
  }
  const parsed = KmsEnvSchema.safeParse(source);
  if (!parsed.success) return { issues: formatIssues(parsed.error) };
  return {
    signer: {
      kind: 'kms',
      accessKeyId: parsed.data.ACCESS_KEY,
      secretAccessKey: parsed.data.SECRET_ACCESS_KEY,
      keyId: parsed.data.KEY_ID,
      region: parsed.data.REGION,
    },
    issues: [],
  };
}

/**
 * Validates the process environment. Every problem is collected before failing so an operator
 * can fix the whole .env in one pass.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): AppConfig {
  const base = BaseEnvSchema.safeParse(source);
  const backendRaw = source.SIGNER_BACKEND?.trim();
  const backend = base.success
    ? base.data.SIGNER_BACKEND
    : backendRaw === 'local'
      ? 'local'
      : 'kms';
  const { signer, issues: signerIssues } = parseSigner(backend, source);

  const issues = [...(base.success ? [] : formatIssues(base.error)), ...signerIssues];
  if (!base.success || !signer || issues.length > 0) {
    throw new ConfigError(issues);
  }

  const cfg = base.data;
  return {
    rpcUrl: cfg.RPC_URL,
    contract: cfg.CONTRACT_ADDRESS,
    blockInterval: cfg.BLOCK_INTERVAL,
    chainId: cfg.CHAIN_ID,
    signer,
    pollIntervalMs: cfg.POLL_INTERVAL_MS,
    rpcTimeoutMs: cfg.RPC_TIMEOUT_MS,
    rpcBatch: { batchSize: cfg.RPC_HTTP_BATCH_SIZE, waitMs: cfg.RPC_HTTP_BATCH_DELAY_MS },
    receiptTimeoutMs: cfg.RECEIPT_TIMEOUT_MS,
    dryRun: cfg.DRY_RUN,
    killSwitchFile: cfg.KILL_SWITCH_FILE,
    metricsPort: cfg.PROM_PORT,
    metricsEnabled: !cfg.METRICS_DISABLED,
    alerts: { slackWebhookUrl: cfg.SLACK_WEBHOOK_URL, pagerDutyKey: cfg.PAGERDUTY_API_KEY },
  };
}

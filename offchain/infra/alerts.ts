import type { CycleReport, FailureStage } from '../pipeline/types';
import { describeError } from './errors';
import { log } from './logger';

const PAGERDUTY_EVENTS_URL = 'https://events.pagerduty.com/v2/enqueue';
const SOURCE = 'beacon-timestamp-keeper';

export type AlertSinks = {
  slackWebhookUrl?: string;
  pagerDutyKey?: string;
};

export type CycleFailureAlert = {
  stage: FailureStage;
  error: string;
  head?: bigint;
  checkpoint?: bigint;
  candidate?: bigint;
};

export type PostJson = (url: string, payload: unknown) => Promise<void>;

export function failureAlertFromReport(report: CycleReport): CycleFailureAlert | undefined {
  const { outcome } = report;
  if (outcome.kind !== 'failed') return undefined;
  return {
    stage: outcome.stage,
    error: describeError(outcome.error),
    head: report.head,
    checkpoint: report.checkpoint,
    candidate: outcome.candidate,
  };
}

function block(value: bigint | undefined): string {
  return value === undefined ? 'n/a' : value.toString();
}

function summary(alert: CycleFailureAlert): string {
  return `beacon oracle keeper failed at ${alert.stage}: ${alert.error}`;
}

export function slackText(alert: CycleFailureAlert): string {
  return [
    `:rotating_light: ${summary(alert)}`,
    `• *head*: ${block(alert.head)}`,
    `• *checkpoint*: ${block(alert.checkpoint)}`,
    `• *candidate*: ${block(alert.candidate)}`,
  ].join('\n');
}

// One open incident per failing stage; repeats fold into it on the PagerDuty side.
export function pagerDutyEvent(routingKey: string, alert: CycleFailureAlert) {
  return {
    routing_key: routingKey,
    event_action: 'trigger',
    dedup_key: `${SOURCE}:${alert.stage}`,
    payload: {
      summary: summary(alert),
      source: SOURCE,
      severity: alert.stage === 'submission' ? 'error' : 'warning',
      custom_details: {
        stage: alert.stage,
        head: block(alert.head),
        checkpoint: block(alert.checkpoint),
        candidate: block(alert.candidate),
      },
    },
  };
}

async function postJson(url: string, payload: unknown): Promise<void> {
  try {
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'content-type': 'application/json' },
      body: JSON.stringify(payload),
    });
    if (!res.ok) {
      log.warn({ status: res.status, text: await res.text() }, 'alert-post-failed');
    }
  } catch (err) {
    log.warn({ err: describeError(err) }, 'alert-post-exception');
  }
}

/** Fans a failed cycle out to whichever of Slack and PagerDuty is configured. */
export function createAlertSender(sinks: AlertSinks, post: PostJson = postJson) {
  return async (alert: CycleFailureAlert): Promise<void> => {
    log.warn(
      { stage: alert.stage, err: alert.error, head: alert.head, checkpoint: alert.checkpoint, candidate: alert.candidate },
      'cycle-failure-alert',
    );
    const sends: Promise<void>[] = [];
    if (sinks.slackWebhookUrl) sends.push(post(sinks.slackWebhookUrl, { text: slackText(alert) }));
    if (sinks.pagerDutyKey) sends.push(post(PAGERDUTY_EVENTS_URL, pagerDutyEvent(sinks.pagerDutyKey, alert)));
    await Promise.all(sends);
  };
}

/** Drops alerts raised within `cooldownMs` of the previous one. */
export function createAlertThrottle<T>(
  send: (alert: T) => Promise<void>,
  cooldownMs: number,
  now: () => number = Date.now,
) {
  let lastSentMs: number | undefined;
  return async (alert: T): Promise<boolean> => {
    const ts = now();
    if (lastSentMs !== undefined && ts - lastSentMs < cooldownMs) return false;
    lastSentMs = ts;
    await send(alert);
    return true;
  };
}

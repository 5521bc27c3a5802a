import { mkdirSync } from 'fs';
import { dirname, resolve } from 'path';
import pino, { TransportMultiOptions } from 'pino';

type Target = TransportMultiOptions['targets'][number];

const level = process.env.LOG_LEVEL || 'info';
const logFile = process.env.LOG_FILE?.trim();

function buildTargets(file: string): Target[] {
  const targets: Target[] = [];
  if (process.env.LOG_DISABLE_STDOUT !== '1') {
    targets.push({
      target: 'pino/file',
      options: { destination: 1 },
      level,
    });
  }
  const destination = resolve(process.cwd(), file);
  try {
    mkdirSync(dirname(destination), { recursive: true });
    targets.push({
      target: 'pino/file',
      options: { destination },
      level,
    });
  } catch (err) {
    // eslint-disable-next-line no-console
    console.warn('logger-file-init-failed', (err as Error).message);
  }
  return targets;
}

// stdout-only logging stays on the main thread; a worker transport is only spun up for the file target
const transport = logFile ? pino.transport({ targets: buildTargets(logFile) }) : undefined;

export const log = transport ? pino({ level }, transport) : pino({ level });

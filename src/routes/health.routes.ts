import { Router, type Request, type Response } from 'express';
import { query, pool } from '../db';

const router = Router();

const DB_TIMEOUT_MS = Number(process.env.HEALTH_DB_TIMEOUT_MS || 1500);
const REQUIRED_SCHEMA_VERSION = process.env.REQUIRED_SCHEMA_VERSION;

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} check timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

router.get('/health/live', (_req: Request, res: Response) => {
  res.json({ status: 'ok', timestamp: new Date().toISOString() });
});

router.get('/health/ready', async (_req: Request, res: Response) => {
  const start = Date.now();
  const details: Record<string, unknown> = {};
  let ready = true;

  try {
    await withTimeout(query('SELECT 1'), DB_TIMEOUT_MS, 'db');
    details.db = { ok: true };
  } catch (error) {
    details.db = { ok: false, error: errorMessage(error) };
    ready = false;
  }

  // Soft unless REQUIRED_SCHEMA_VERSION names the migration that must be applied.
  try {
    const result = await withTimeout(
      query<{ name: string | null }>('SELECT name FROM pgmigrations ORDER BY run_on DESC, id DESC LIMIT 1'),
      DB_TIMEOUT_MS,
      'migrations'
    );
    const latest = result.rows[0]?.name ?? null;
    const ok = !REQUIRED_SCHEMA_VERSION || latest === REQUIRED_SCHEMA_VERSION;
    details.migrations = { ok, latest, required: REQUIRED_SCHEMA_VERSION ?? null };
    if (!ok) ready = false;
  } catch (error) {
    details.migrations = { ok: false, error: errorMessage(error) };
    if (REQUIRED_SCHEMA_VERSION) {
      ready = false;
    }
  }

  details.durationMs = Date.now() - start;
  details.pool = {
    total: pool.totalCount,
    idle: pool.idleCount,
    waiting: pool.waitingCount
  };

  res.status(ready ? 200 : 503).json({
    status: ready ? 'ok' : 'not_ready',
    ready,
    timestamp: new Date().toISOString(),
    details
  });
});

export default router;

// GET /health: liveness plus index health. 503 while the index is flagged corrupted.
import type { Request, Response } from 'express';
import type { Engine } from '@/services/engine';
import type { HttpResult } from '@/utils/errorResponse';

export interface HealthJson {
  status: 'OK' | 'DEGRADED';
  timestamp: string;
  uptime: number;
  documents: number;
  index: ReturnType<Engine['health']['getCurrent']>;
  extractionCircuit: string;
}

export function healthCheck(engine: Pick<Engine, 'store' | 'health' | 'breaker'>): HttpResult<HealthJson> {
  const index = engine.health.getCurrent();
  const corrupted = index.status === 'corrupted';
  return {
    status: corrupted ? 503 : 200,
    body: {
      success: true,
      data: {
        status: corrupted ? 'DEGRADED' : 'OK',
        timestamp: new Date().toISOString(),
        uptime: process.uptime(),
        documents: engine.store.size,
        index,
        extractionCircuit: engine.breaker.getState(),
      },
    },
  };
}

export function healthRoute(engine: Engine) {
  return (_req: Request, res: Response) => {
    const result = healthCheck(engine);
    res.status(result.status).json(result.body);
  };
}

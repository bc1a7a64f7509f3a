import { Hono } from 'hono';

export const LIVENESS_PAYLOAD = { status: 'alive' } as const;

export const healthRoute = new Hono();

healthRoute.get('/', (c) => c.json(LIVENESS_PAYLOAD));
healthRoute.get('/health', (c) => c.json(LIVENESS_PAYLOAD));

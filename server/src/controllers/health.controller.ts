/**
 * Health & Info Endpoints
 *
 * - /healthz: liveness, plain "ok"
 * - /info: service identity and endpoint map
 */

import type { Request, Response } from 'express';

export const SERVICE_NAME = 'sse-session-server';
export const SERVICE_VERSION = '1.0.0';

const ENDPOINTS = {
  sse: 'GET /sse?user_id=&session_id=',
  message: 'POST /message/:sessionId',
  disconnect: 'DELETE /message/:sessionId',
  health: 'GET /healthz',
  info: 'GET /info',
  admin: '/admin/*'
} as const;

export function healthzHandler(_req: Request, res: Response): void {
  res.status(200).send('ok');
}

export function infoHandler(_req: Request, res: Response): void {
  res.json({
    name: SERVICE_NAME,
    version: SERVICE_VERSION,
    transport: 'sse',
    endpoints: ENDPOINTS
  });
}

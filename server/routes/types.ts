import type { Response } from 'express';

/**
 * Framework-free result of a route handler; the router writes it out.
 */
export interface RouteResult {
  status: number;
  body: unknown;
}

export function sendResult(res: Response, result: RouteResult): void {
  res.status(result.status).json(result.body);
}

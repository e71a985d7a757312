import type { Request, Response } from 'express';

/** JSON 404 for any route no router claimed */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: 'Not Found', message: `Cannot ${req.method} ${req.path}` });
}

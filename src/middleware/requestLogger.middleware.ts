import type { Request, Response, NextFunction } from 'express';

type RequestLogEntry = {
  event: 'http_request';
  requestId?: string;
  method: string;
  path: string;
  status: number;
  durationMs: number;
  bytesIn: number;
  bytesOut: number;
  userId?: string;
  userName?: string;
  userAgent?: string;
  timestamp: string;
};

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = process.hrtime.bigint();
  const bytesIn = Number(req.headers['content-length'] ?? 0);

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1e6;

    const entry: RequestLogEntry = {
      event: 'http_request',
      requestId: req.requestId,
      method: req.method,
      path: req.path,
      status: res.statusCode,
      durationMs: Math.round(durationMs * 100) / 100,
      bytesIn,
      bytesOut: Number(res.getHeader('content-length') ?? 0),
      userId: req.auth?.userId,
      userName: req.auth?.userName,
      userAgent: req.header('user-agent') ?? undefined,
      timestamp: new Date().toISOString()
    };

    console.log(JSON.stringify(entry));
  });

  next();
}

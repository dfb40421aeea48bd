import { Request, Response, NextFunction } from 'express';

export const requestLogger = (req: Request, res: Response, next: NextFunction) => {
  const startedAt = Date.now();
  res.on('finish', () => {
    const duration = Date.now() - startedAt;
    const marker = res.statusCode >= 500 ? '❌' : res.statusCode >= 400 ? '⚠️' : '→';
    console.log(`${marker} ${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms`);
  });
  next();
};

import { Request, Response, NextFunction } from 'express';
import { AsyncLocalStorage } from 'async_hooks';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '@/utils/logger';

interface RequestContext {
  correlationId: string;
  requestId: string;
  ipAddress: string;
  userAgent?: string;
}

const correlationIdStorage = new AsyncLocalStorage<RequestContext>();

const headerValue = (value: string | string[] | undefined): string | undefined =>
  Array.isArray(value) ? value[0] : value;

// Request logging middleware with correlation ID support
export const requestLogger = (req: Request, res: Response, next: NextFunction): void => {
  const startTime = Date.now();

  const correlationId = headerValue(req.headers['x-correlation-id']) ||
                        headerValue(req.headers['x-request-id']) ||
                        uuidv4();
  const requestId = uuidv4();

  const context: RequestContext = {
    correlationId,
    requestId,
    ipAddress: req.ip || 'unknown',
    userAgent: req.get('User-Agent'),
  };

  res.setHeader('X-Correlation-ID', correlationId);
  res.setHeader('X-Request-ID', requestId);

  res.on('finish', () => {
    const duration = Date.now() - startTime;
    const logLevel = res.statusCode >= 500 ? 'error' :
                     res.statusCode >= 400 ? 'warn' : 'info';

    logger[logLevel]('HTTP Request Completed', {
      correlationId,
      requestId,
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration,
      userAgent: context.userAgent,
      ip: context.ipAddress,
      slow: duration > 1000,
    });
  });

  correlationIdStorage.run(context, () => next());
};

export const getRequestContext = (): RequestContext | undefined => correlationIdStorage.getStore();

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import { v4 as uuidv4 } from 'uuid';
import type { AppConfig } from './config';
import { withRequestId, type Logger } from './logger';
import { RateLimitedError, formatErrorResponse } from './errors';

// Request ID middleware
export const requestIdMiddleware = (req: Request, res: Response, next: NextFunction): void => {
  const requestId = req.get('x-request-id') || uuidv4();
  req.headers['x-request-id'] = requestId;
  res.setHeader('X-Request-ID', requestId);

  // Run the rest of the request in the context of this request ID
  withRequestId(requestId, () => next());
};

// Request logging middleware
export const createRequestLoggingMiddleware = (logger: Logger): RequestHandler => {
  return (req, res, next) => {
    const start = Date.now();

    logger.debug({
      method: req.method,
      url: req.url,
      userAgent: req.get('User-Agent'),
      ip: req.ip,
    }, 'Incoming request');

    res.on('finish', () => {
      const responseTime = Date.now() - start;
      const level = res.statusCode >= 400 ? 'warn' : 'info';

      logger[level]({
        method: req.method,
        url: req.url,
        statusCode: res.statusCode,
        responseTime,
        contentLength: res.get('content-length'),
      }, 'Request completed');
    });

    next();
  };
};

// CORS middleware configuration
export const createCorsMiddleware = (config: AppConfig): RequestHandler =>
  cors({
    origin: config.cors.origin,
    optionsSuccessStatus: 200,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Request-ID', 'Accept', 'Origin', 'User-Agent'],
    exposedHeaders: ['X-Request-ID'],
  });

// Security headers middleware
export const securityMiddleware = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'self'"],
      styleSrc: ["'self'", "'unsafe-inline'"],
      scriptSrc: ["'self'"],
      imgSrc: ["'self'", 'data:', 'https:'],
      connectSrc: ["'self'"],
      objectSrc: ["'none'"],
      frameSrc: ["'none'"],
    },
  },
  crossOriginEmbedderPolicy: false,
});

// General API rate limiter
export const createApiRateLimiter = (config: AppConfig, logger: Logger): RequestHandler =>
  rateLimit({
    windowMs: config.rateLimit.windowMs,
    limit: config.rateLimit.max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (req: Request, res: Response) => {
      const error = new RateLimitedError('Too many requests from this IP, please try again later');
      logger.warn({
        ip: req.ip,
        url: req.url,
        method: req.method,
      }, 'Rate limit exceeded');

      res.status(429).json(formatErrorResponse(error, {
        requestId: req.get('x-request-id'),
        exposeDetails: false,
      }));
    },
  });

import express, { Express, Request, Response, NextFunction } from 'express';
import { Server } from 'http';
import cors from 'cors';
import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { logger } from '../services/utils/Logger';
import { parseErrorMessage } from '../services/utils/ErrorHandler';
import { bigintReplacer } from '../services/utils/PriceFormatter';

// Import routes
import statusRouter from './routes/status';
import analysesRouter from './routes/analyses';
import largePurchasesRouter from './routes/largePurchases';

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigin?: string | string[];
  rateLimitWindowMs?: number;
  rateLimitMaxRequests?: number;
}

const DEFAULT_CONFIG: ServerConfig = {
  port: 3000,
  host: '0.0.0.0',
  corsOrigin: '*',
  rateLimitWindowMs: 15 * 60 * 1000, // 15 minutes
  rateLimitMaxRequests: 100, // 100 requests per window
};

/**
 * Read-only HTTP access to stored analysis results
 */
export class APIServer {
  private app: Express;
  private config: ServerConfig;
  private limiter: RateLimitRequestHandler;
  private server: Server | null = null;

  constructor(config: Partial<ServerConfig> = {}) {
    this.app = express();
    this.config = { ...DEFAULT_CONFIG, ...config };

    this.limiter = rateLimit({
      windowMs: this.config.rateLimitWindowMs,
      max: this.config.rateLimitMaxRequests,
      message: 'Too many requests from this IP, please try again later.',
      standardHeaders: true,
      legacyHeaders: false,
    });

    // Amounts are bigints
    this.app.set('json replacer', bigintReplacer);

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    this.app.use(
      cors({
        origin: this.config.corsOrigin,
        methods: ['GET', 'OPTIONS'],
        allowedHeaders: ['Content-Type', 'Authorization'],
      })
    );

    this.app.use(this.limiter);

    // Request logging middleware
    this.app.use((req: Request, _res: Response, next: NextFunction) => {
      logger.debug(`${req.method} ${req.path}`);
      next();
    });
  }

  /**
   * Setup routes
   */
  private setupRoutes(): void {
    this.app.get('/health', (_req: Request, res: Response) => {
      res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
    });

    this.app.use('/api/status', statusRouter);
    this.app.use('/api/analyses', analysesRouter);
    this.app.use('/api/large-purchases', largePurchasesRouter);

    // 404 handler
    this.app.use((req: Request, res: Response) => {
      res.status(404).json({
        error: 'Not Found',
        path: req.path,
      });
    });
  }

  /**
   * Setup error handling middleware
   */
  private setupErrorHandling(): void {
    this.app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
      const message = parseErrorMessage(err);
      logger.error(`Error: ${message}`);

      res.status(500).json({
        success: false,
        error: message || 'Internal Server Error',
      });
    });
  }

  /**
   * Start the server
   */
  async start(): Promise<void> {
    return new Promise((resolve) => {
      this.server = this.app.listen(this.config.port, this.config.host, () => {
        logger.info(`Server running on http://${this.config.host}:${this.config.port}`);
        resolve();
      });
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;

    logger.info('Stopping server...');
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
    this.server = null;
  }

  /**
   * Get the Express app instance
   */
  getApp(): Express {
    return this.app;
  }
}

export default APIServer;

import express from 'express';
import cors, { CorsOptions } from 'cors';
import { appConfig } from './connections/config/app.config';
import { createRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import { AppContext } from './types/context.types';
import { logger } from './utils/logging';

const DEV_ORIGINS = ['http://localhost:3000', 'http://localhost:5173'];

// CORS Configuration
const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Allow requests with no origin (mobile apps, curl)
    if (!origin) {
      return callback(null, true);
    }

    const allowedOrigins =
      appConfig.nodeEnv === 'development' ? [...appConfig.corsOrigins, ...DEV_ORIGINS] : appConfig.corsOrigins;

    if (allowedOrigins.includes(origin)) {
      callback(null, true);
    } else if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      // In development, allow all origins if CORS_ORIGINS is not set
      callback(null, true);
    } else {
      callback(new Error('Not allowed by CORS'));
    }
  },
  credentials: true,
  methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
  maxAge: 86400, // 24 hours
};

export const createApp = (ctx: AppContext) => {
  const app = express();

  // Middleware
  app.use(cors(corsOptions));
  app.use(express.json());

  // Health check
  app.get('/health', async (_req, res) => {
    try {
      await ctx.db.ping();
      res.json({ status: 'ok', database: 'connected' });
    } catch (error) {
      logger.error('Health check failed', { error: error instanceof Error ? error.message : String(error) });
      res.status(503).json({ status: 'error', database: 'disconnected' });
    }
  });

  // API Routes
  app.use('/api', createRoutes(ctx));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

import express, { Application, Request, Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import compression from 'compression';
import dotenv from 'dotenv';
import path from 'path';
import fs from 'fs';
import { loadResolutionConfig } from './config/resolution';
import { errorHandler } from './middleware/errorHandler';
import { createTaxonomyRouter } from './routes/taxonomy';
import { createResolutionEngine, TaxonomicResolutionEngine } from './services/taxonomy';
import logger, { httpLogStream } from './utils/logger';

export interface AppDependencies {
  engine: TaxonomicResolutionEngine;
}

export const loadEnvironment = (): void => {
  // Later files override earlier values
  const candidateEnvPaths = [
    path.resolve(process.cwd(), '.env'),
    path.resolve(__dirname, '../.env'),
  ];
  dotenv.config();
  for (const p of candidateEnvPaths) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p, override: true });
    }
  }
};

export const createApp = ({ engine }: AppDependencies): Application => {
  const app: Application = express();

  app.use(helmet());
  app.use(cors({
    origin: process.env.CORS_ORIGIN || 'http://localhost:3000',
    credentials: true,
  }));
  app.use(compression());
  app.use(express.json({ limit: '50mb' }));
  if (process.env.NODE_ENV !== 'test') {
    app.use(morgan('combined', { stream: httpLogStream }));
  }

  // Health check
  app.get('/health', (req: Request, res: Response) => {
    res.json({ status: 'healthy', timestamp: new Date().toISOString() });
  });

  app.use('/api/taxonomy', createTaxonomyRouter(engine));

  // 404 handler
  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Route not found' });
  });

  app.use(errorHandler);

  return app;
};

export const startServer = (): void => {
  loadEnvironment();
  const PORT = Number(process.env.PORT) || 5000;

  try {
    // Invalid settings or an unreadable local reference file stop startup here
    const engine = createResolutionEngine({ config: loadResolutionConfig() });
    const app = createApp({ engine });

    app.listen(PORT, () => {
      logger.info(`🚀 Server running on port ${PORT}`);
      logger.info(`🧬 Taxonomic backbone: ${engine.config.provider} (${engine.workers} worker(s))`);
    });
  } catch (error) {
    logger.error('Failed to start server:', error);
    process.exit(1);
  }
};

if (require.main === module) {
  startServer();
}

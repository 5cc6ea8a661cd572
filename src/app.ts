import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { Database } from 'sqlite';
import { AppConfig, hasGmailCredentials } from './config';
import { createRoutes } from './routes';
import { IngestionRunRepository } from './repositories/IngestionRunRepository';
import { ReviewService } from './services/review/ReviewService';
import { IngestionService } from './services/ingestion/IngestionService';
import { GmailMessageSource } from './services/mail/GmailMessageSource';
import { MailSource } from './services/mail/MailSource';
import { PipelineFactory, createPipelineFactory, createStores } from './services/pipeline/createPipeline';

export interface AppOverrides {
  mailSource?: MailSource | null;
  pipelineFactory?: PipelineFactory;
}

export interface AppContext {
  app: express.Express;
  ingestionService: IngestionService;
}

/**
 * Wire repositories, services and routes onto an Express app
 */
export function createApp(db: Database, config: AppConfig, overrides: AppOverrides = {}): AppContext {
  const stores = createStores(db);
  const pipelineFactory = overrides.pipelineFactory ?? createPipelineFactory(config, stores);

  let mailSource: MailSource | null;
  if (overrides.mailSource !== undefined) {
    mailSource = overrides.mailSource;
  } else if (hasGmailCredentials(config)) {
    mailSource = GmailMessageSource.fromConfig(config.gmail);
  } else {
    console.warn('⚠️ Gmail credentials not configured; ingestion runs will fail until they are set');
    mailSource = null;
  }

  const ingestionService = new IngestionService(
    mailSource,
    pipelineFactory,
    new IngestionRunRepository(db),
    { lookbackDays: config.syncLookbackDays }
  );
  const reviewService = new ReviewService(stores.reviewQueue, stores.applications);

  const app = express();

  // Middleware
  app.use(helmet());
  app.use(cors({
    origin: config.frontendUrl,
    credentials: true
  }));
  app.use(express.json({ limit: '2mb' }));
  app.use(express.urlencoded({ extended: true, limit: '2mb' }));

  // Health check endpoint
  app.get('/health', (req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      service: 'application-mail-tracker',
      ingestionRunning: ingestionService.isRunning()
    });
  });

  app.use('/api', createRoutes({
    applications: stores.applications,
    reviewService,
    ingestionService,
    pipelineFactory
  }));

  // 404 handler
  app.use((req, res) => {
    res.status(404).json({
      error: 'Not Found',
      message: `Route ${req.method} ${req.originalUrl} not found`
    });
  });

  // Error handler
  app.use((error: unknown, req: express.Request, res: express.Response, next: express.NextFunction) => {
    if (res.headersSent) {
      next(error);
      return;
    }
    if (error instanceof SyntaxError) {
      res.status(400).json({
        error: 'Invalid JSON',
        message: 'Request body could not be parsed'
      });
      return;
    }
    console.error('❌ Unhandled error:', error);
    res.status(500).json({
      error: 'Internal Server Error',
      message: 'An unexpected error occurred'
    });
  });

  return { app, ingestionService };
}

import { loadConfigFromEnvironment } from './config';
import { getDatabase, closeDatabase } from './config/database';
import { runMigrations } from './database/migrations';
import { IngestionRunRepository } from './repositories/IngestionRunRepository';
import { IngestionScheduler } from './services/ingestion/IngestionScheduler';
import { createApp } from './app';

async function startServer(): Promise<void> {
  try {
    console.log('🔧 Initializing services...');
    const config = loadConfigFromEnvironment();

    // Initialize database and run migrations
    console.log('📊 Setting up database...');
    const db = await getDatabase(config.databasePath);
    await runMigrations(db);

    const interrupted = await new IngestionRunRepository(db).failStaleRuns();
    if (interrupted > 0) {
      console.warn(`⚠️ Marked ${interrupted} interrupted ingestion run(s) as failed`);
    }

    const { app, ingestionService } = createApp(db, config);

    const server = app.listen(config.port, () => {
      console.log(`🚀 Server running on port ${config.port}`);
      console.log(`🏥 Health check: http://localhost:${config.port}/health`);
      console.log(`📚 API endpoints: http://localhost:${config.port}/api`);
    });

    const scheduler = new IngestionScheduler(ingestionService, config.ingestCron);
    if (config.ingestEnabled) {
      scheduler.start();
    }

    const shutdown = (signal: string) => {
      console.log(`👋 ${signal} received, shutting down`);
      scheduler.stop();
      ingestionService.cancel();
      server.close(() => {
        closeDatabase()
          .then(() => process.exit(0))
          .catch(error => {
            console.error('❌ Failed to close database:', error);
            process.exit(1);
          });
      });
    };
    process.on('SIGINT', () => shutdown('SIGINT'));
    process.on('SIGTERM', () => shutdown('SIGTERM'));
  } catch (error) {
    console.error('❌ Failed to start server:', error);
    process.exit(1);
  }
}

// Start the server
void startServer();

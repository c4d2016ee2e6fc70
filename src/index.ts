// Main application entry point
import { Server } from 'http';
import { getEnvConfig, printConfigSummary } from './config';
import { Database, ReplyRepository, createDatabase, runMigrations } from './database';
import { GeminiClient, ReplyGenerator } from './generator';
import { ReplyServiceImpl } from './replies';
import { createServer, startServer, stopServer } from './api/server';

// Application state
let database: Database | null = null;
let server: Server | null = null;
let isShuttingDown = false;

/**
 * Initialize the application
 */
async function initialize(): Promise<void> {
  console.log('AI Email Responder API');
  console.log('Initializing...');

  try {
    // Missing GEMINI_API_KEY or DATABASE_URL throws here and aborts startup
    const envConfig = getEnvConfig();
    console.log('✓ Environment configuration loaded');
    printConfigSummary(envConfig);
    console.log('');

    const generator = new ReplyGenerator(new GeminiClient(envConfig.geminiApiKey), envConfig.geminiModel);
    console.log(`✓ Gemini client initialized (model: ${envConfig.geminiModel})`);

    let repository: ReplyRepository | undefined;
    if (envConfig.storageMode === 'persisted' && envConfig.databaseUrl) {
      database = createDatabase(envConfig.databaseUrl);
      await database.connect();
      console.log(`✓ Database connected (${database.driver})`);

      await runMigrations(database);
      console.log('✓ Database migrations completed');

      repository = new ReplyRepository(database);
    } else {
      console.log('⚠ Running in stateless mode, reply history is disabled');
    }

    const replyService = new ReplyServiceImpl({ generator, repository });

    const app = createServer({
      replyService,
      geminiApiConfigured: Boolean(envConfig.geminiApiKey),
      database: database ?? undefined,
      historyMaxLimit: envConfig.historyMaxLimit,
    });

    server = await startServer(app, envConfig.port);
    console.log('✓ API server started');
    console.log('  Press Ctrl+C to stop\n');
  } catch (error) {
    console.error('Failed to initialize application:', error);
    await shutdown(1);
  }
}

/**
 * Graceful shutdown
 */
async function shutdown(exitCode: number = 0): Promise<void> {
  if (isShuttingDown) {
    return;
  }

  isShuttingDown = true;
  console.log('\nShutting down gracefully...');

  try {
    if (server) {
      await stopServer(server);
      console.log('✓ API server stopped');
    }

    // Close database connection
    if (database) {
      await database.close();
      console.log('✓ Database connection closed');
    }

    console.log('✓ Shutdown complete');
    process.exit(exitCode);
  } catch (error) {
    console.error('Error during shutdown:', error);
    process.exit(1);
  }
}

// Signal handlers for graceful shutdown
process.on('SIGINT', () => {
  console.log('\nReceived SIGINT signal');
  void shutdown();
});

process.on('SIGTERM', () => {
  console.log('\nReceived SIGTERM signal');
  void shutdown();
});

// Handle uncaught errors
process.on('uncaughtException', (error) => {
  console.error('Uncaught exception:', error);
  void shutdown(1);
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
  void shutdown(1);
});

// Start the application
initialize().catch((error) => {
  console.error('Failed to start application:', error);
  process.exit(1);
});

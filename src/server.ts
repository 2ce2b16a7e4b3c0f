import express, { type Application } from 'express';
import morgan from 'morgan';
import type { Server } from 'node:http';
import type { Note } from './types.js';
import { createApiRoutes } from './routes/api.js';

/**
 * Server configuration
 */
export interface ServerConfig {
  /** Port to listen on */
  port: number;
  /** Log each request */
  verbose?: boolean;
}

/**
 * Create and configure the Express application
 */
export function createApp(notes: readonly Note[], options: { verbose?: boolean } = {}): Application {
  const app = express();

  if (options.verbose) {
    app.use(morgan('dev'));
  }

  app.use('/api', createApiRoutes(notes));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      notes: notes.length
    });
  });

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return app;
}

/**
 * Serve the notes until SIGINT/SIGTERM
 */
export function startServer(notes: readonly Note[], config: ServerConfig): Server {
  const app = createApp(notes, { verbose: config.verbose });

  const server = app.listen(config.port, () => {
    console.log(`Frontmatter query API listening on http://localhost:${config.port}`);
  });

  server.on('error', (err: Error) => {
    console.error(`Error: Could not listen on port ${config.port}: ${err.message}`);
    process.exitCode = 1;
  });

  // Graceful shutdown handler
  const shutdown = (signal: string) => {
    console.log(`\nReceived ${signal}, shutting down gracefully...`);

    server.close(() => {
      console.log('Server closed');
      process.exit(0);
    });

    // Force exit after 10 seconds
    setTimeout(() => {
      console.error('Forced shutdown after timeout');
      process.exit(1);
    }, 10000).unref();
  };

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));

  return server;
}

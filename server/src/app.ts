import express, { Express, NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { AppConfig } from './config/app.config';
import { createEmoteRouter } from './routes/emote.routes';
import { EmoteConverterService } from './services/emote-converter.service';
import { SizeCatalog } from './services/size-catalog.service';

/**
 * Build the Express app. Socket.IO is attached by the caller via app.locals.io.
 */
export function createApp(config: AppConfig, catalog: SizeCatalog = new SizeCatalog()): Express {
  const app = express();

  const converter = new EmoteConverterService({
    catalog,
    concurrency: config.concurrency,
    extendedFormats: config.extendedFormats,
  });

  app.use(cors({ origin: config.corsOrigins }));
  app.use(express.json({ limit: '1mb' }));

  app.use('/api/emotes', createEmoteRouter({ converter }));

  // Health check
  app.get('/api/health', (req: Request, res: Response) => {
    res.json({ status: 'ok', message: 'Emote API is running' });
  });

  // Error handling middleware
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    console.error('Error occurred:', err);

    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Malformed JSON body', message: err.message });
    }

    res.status(500).json({
      error: 'Internal Server Error',
      message: err instanceof Error ? err.message : String(err),
    });
  });

  return app;
}

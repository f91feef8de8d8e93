import { NextFunction, Request, Response, Router } from 'express';
import { Server as SocketIOServer } from 'socket.io';
import { v4 as uuidv4 } from 'uuid';
import { EmoteError, describeCauseChain } from '../services/errors';
import { EmoteConverterService } from '../services/emote-converter.service';
import { PreviewService } from '../services/preview.service';

export interface EmoteRouterDeps {
  converter: EmoteConverterService;
  preview?: PreviewService;
}

function readPath(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

export function createEmoteRouter({ converter, preview = new PreviewService() }: EmoteRouterDeps): Router {
  const router = Router();

  /**
   * List the sizes every conversion produces
   */
  router.get('/catalog', (req: Request, res: Response) => {
    res.json({ sizes: converter.catalog.entries });
  });

  /**
   * Extension check for a selected file
   */
  router.post('/validate', (req: Request, res: Response) => {
    const inputPath = readPath(req.body?.path);
    if (!inputPath) {
      return res.status(400).json({ error: 'Missing required "path" parameter' });
    }

    const selection = converter.validateSelection(inputPath);
    if (!selection.accepted) {
      return res.status(400).json({ error: selection.reason });
    }
    res.json(selection);
  });

  /**
   * Convert one image into its emote bundle.
   * With a socketId, lifecycle events are also pushed to that socket.
   */
  router.post('/convert', async (req: Request, res: Response) => {
    const inputPath = readPath(req.body?.path);
    if (!inputPath) {
      return res.status(400).json({ error: 'Missing required "path" parameter' });
    }

    const socketId = readPath(req.body?.socketId);
    const io: SocketIOServer | undefined = req.app.locals.io;
    const jobId = uuidv4();
    const emit = (event: string, payload: object) => {
      if (socketId && io) {
        io.to(socketId).emit(event, { jobId, ...payload });
      }
    };

    console.log(`[Emotes] Starting conversion job ${jobId} (socket: ${socketId || 'none'})`);

    const result = await converter.convert(inputPath, {
      onStarted: (resolvedPath) => emit('conversion:started', { path: resolvedPath }),
      onProgress: (progress) => emit('conversion:progress', progress),
      onSucceeded: (done) => emit('conversion:succeeded', {
        bundleDirectory: done.bundleDirectory,
        writtenFiles: done.writtenFiles,
      }),
      onFailed: (failed) => emit('conversion:failed', { error: failed.error }),
    });

    if (result.error) {
      const status = result.error.kind === 'VALIDATION' ? 400 : 422;
      return res.status(status).json({
        jobId,
        error: result.error,
        writtenFiles: result.writtenFiles,
      });
    }

    res.json({
      jobId,
      bundleDirectory: result.bundleDirectory,
      writtenFiles: result.writtenFiles,
    });
  });

  /**
   * PNG preview of the selected file
   */
  router.get('/preview', async (req: Request, res: Response, next: NextFunction) => {
    const inputPath = readPath(req.query.path);
    if (!inputPath) {
      return res.status(400).json({ error: 'Missing required "path" parameter' });
    }

    const selection = converter.validateSelection(inputPath);
    if (!selection.accepted) {
      return res.status(400).json({ error: selection.reason });
    }

    try {
      const png = await preview.render(inputPath);
      res.type('png').send(png);
    } catch (error) {
      if (error instanceof EmoteError) {
        return res.status(422).json({
          error: { kind: error.code, message: error.message, causeChain: describeCauseChain(error) },
        });
      }
      next(error);
    }
  });

  return router;
}

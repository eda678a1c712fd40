import express from 'express';
import cors from 'cors';
import uploadRouter from './routes/upload.js';
import eventsRouter from './routes/events.js';
import deviceRouter from './routes/device.js';

/**
 * Build the API without binding a port. No route reads a JSON body, so
 * there is no body parser; uploads go through multer.
 */
export function createApp(): express.Express {
  const app = express();
  app.use(cors());

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use('/api/upload', uploadRouter);
  app.use('/api/events', eventsRouter);
  app.use('/api/device', deviceRouter);

  app.use('/api', (req, res) => {
    res.status(404).json({ error: `No route for ${req.method} ${req.originalUrl}` });
  });

  app.use((err: Error, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    console.error(`[critical-events] Unhandled error: ${err.message}`);
    res.status(500).json({ error: err.message });
  });

  return app;
}

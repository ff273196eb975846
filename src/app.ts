import cors from 'cors';
import express, { NextFunction, Request, Response } from 'express';
import multer from 'multer';
import { HttpError } from './errors';
import { PaymentFailedError, FlowService } from './flow/service';
import { OrderStore } from './orders/store';
import { adminRoutes } from './routes/admin';
import { sessionRoutes } from './routes/sessions';

export interface AppDeps {
  flow: FlowService;
  orders: OrderStore;
  adminPassword?: string;
  uploadMaxBytes: number;
  aiConfigured: boolean;
  emailConfigured: boolean;
}

export function createApp(deps: AppDeps) {
  const app = express();

  app.use(cors());
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/api/health', (req: Request, res: Response) => {
    res.json({
      status: 'OK',
      timestamp: new Date().toISOString(),
      aiConfigured: deps.aiConfigured,
      emailConfigured: deps.emailConfigured,
    });
  });

  app.use('/api/sessions', sessionRoutes(deps.flow, deps.uploadMaxBytes));
  app.use('/api/admin', adminRoutes(deps.orders, deps.adminPassword));

  app.use((req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use((error: unknown, req: Request, res: Response, next: NextFunction) => {
    if (error instanceof HttpError) {
      if (error.status >= 500) console.error(`${req.method} ${req.path} failed:`, error.cause ?? error);
      return res.status(error.status).json({ error: error.message });
    }
    if (error instanceof multer.MulterError) {
      const message = error.code === 'LIMIT_FILE_SIZE' ? 'File is too large' : error.message;
      return res.status(400).json({ error: message });
    }
    if (error instanceof PaymentFailedError) {
      return res.status(402).json({ error: `Payment failed: ${error.message}` });
    }
    if (error instanceof SyntaxError) {
      return res.status(400).json({ error: 'Malformed JSON body' });
    }
    console.error(`${req.method} ${req.path} failed:`, error);
    res.status(500).json({ error: 'Internal server error' });
  });

  return app;
}

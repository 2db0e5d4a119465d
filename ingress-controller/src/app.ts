import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import morgan from 'morgan';
import { randomUUID } from 'node:crypto';
import { EventQueue } from './lib/event-queue';
import { buildEventsRouter } from './routes/events.routes';
import type { IngressService } from './services/ingress.service';
import { apiErrorHandler, notFoundHandler } from './middleware/error-handler';

interface CreateAppOptions {
  ingressService: IngressService;
  queue?: EventQueue;
  eventTokens?: Set<string>;
  requestLogging?: boolean;
}

export function createApp({ ingressService, queue, eventTokens, requestLogging = true }: CreateAppOptions) {
  const app = express();

  app.use(helmet());
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));

  app.use((req, res, next) => {
    req.requestId = randomUUID();
    res.setHeader('x-request-id', req.requestId);
    next();
  });

  if (requestLogging) {
    app.use(morgan('combined'));
  }

  app.get('/healthz', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(
    buildEventsRouter({
      ingressService,
      queue: queue ?? new EventQueue(),
      eventTokens: eventTokens ?? new Set(),
    })
  );

  app.use(notFoundHandler);
  app.use(apiErrorHandler);

  return app;
}

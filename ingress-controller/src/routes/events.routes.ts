import express from 'express';
import { requireEventToken } from '../middleware/auth';
import type { EventQueue } from '../lib/event-queue';
import { INGRESS_RELATION_NAME, type IngressService } from '../services/ingress.service';
import type { UnitStatus } from '../types/ingress';
import {
  operatorConfigSchema,
  parseOrThrow,
  relationChangedSchema,
  relationParamsSchema,
} from '../utils/validation';

interface EventsRouterDeps {
  ingressService: IngressService;
  queue: EventQueue;
  eventTokens: Set<string>;
}

function statusBody(status: UnitStatus) {
  return { status };
}

function hasBody(body: unknown): boolean {
  return typeof body === 'object' && body !== null && Object.keys(body).length > 0;
}

export function buildEventsRouter({ ingressService, queue, eventTokens }: EventsRouterDeps) {
  const router = express.Router();

  // Per route, so unknown paths still fall through to the 404 handler.
  const authorize = requireEventToken(eventTokens);

  router.get('/status', authorize, (_req, res) => {
    res.json(statusBody(ingressService.getStatus()));
  });

  router.post('/events/config-changed', authorize, async (req, res, next) => {
    try {
      const operatorConfig = hasBody(req.body) ? parseOrThrow(operatorConfigSchema, req.body) : undefined;

      const status = await queue.run('config-changed', async () => {
        if (operatorConfig) {
          ingressService.setOperatorConfig(operatorConfig);
        }
        return ingressService.onConfigChanged();
      });

      res.json(statusBody(status));
    } catch (err) {
      return next(err);
    }
  });

  router.post('/events/relations/:relationName/:relationId/changed', authorize, async (req, res, next) => {
    try {
      const params = parseOrThrow(relationParamsSchema, req.params);
      const payload = parseOrThrow(relationChangedSchema, req.body);

      const status = await queue.run(`${params.relationName}-relation-changed`, async () => {
        const relation = ingressService.recordRelation({
          name: params.relationName,
          id: params.relationId,
          app: payload.app,
          data: payload.data,
        });

        if (relation.name !== INGRESS_RELATION_NAME) {
          return ingressService.getStatus();
        }
        return ingressService.onRelationChanged({ relation });
      });

      res.json(statusBody(status));
    } catch (err) {
      return next(err);
    }
  });

  router.delete('/events/relations/:relationName/:relationId', authorize, async (req, res, next) => {
    try {
      const params = parseOrThrow(relationParamsSchema, req.params);

      const removed = await queue.run(`${params.relationName}-relation-departed`, async () =>
        ingressService.forgetRelation(params.relationName, params.relationId)
      );

      res.json({ removed, ...statusBody(ingressService.getStatus()) });
    } catch (err) {
      return next(err);
    }
  });

  router.post('/events/upgrade', authorize, async (_req, res, next) => {
    try {
      // The upgrade is always followed by a config change, which performs the reconcile.
      const status = await queue.run('upgrade', async () => {
        await ingressService.onUpgrade();
        return ingressService.onConfigChanged();
      });

      res.json(statusBody(status));
    } catch (err) {
      return next(err);
    }
  });

  return router;
}

import express, { type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import {
  LOCATION_MODES,
  MODE_DISPLAY_NAMES,
  SCENE_DEFAULT_MODE,
  SCENE_DISPLAY_NAMES,
  SCENE_POI_KEYWORDS,
  SCENES,
} from '../constants';
import type { ContextOrchestrator, ContextUpdatedEvent } from '../services/ContextOrchestrator';
import type { PushLocationProvider } from '../sources/PushLocationProvider';
import { CameraContextError, errorMessage } from '../utils/errors';
import { createLogger } from '../utils/logger';

const logger = createLogger({ component: 'api' });

// ===== Types =====

export interface ServerOptions {
  /** Present when locations are pushed by clients rather than simulated */
  locationFeed?: PushLocationProvider;
  heartbeatIntervalMs?: number;
}

interface SSEClient {
  id: string;
  response: Response;
}

// ===== Validation =====

const contextQuerySchema = z.object({
  scene: z.enum(SCENES),
  mode: z.enum(LOCATION_MODES).optional(),
});

const pushLocationSchema = z.object({
  latitude: z.number().min(-90).max(90),
  longitude: z.number().min(-180).max(180),
  altitude: z.number().optional(),
  horizontalAccuracy: z.number().optional(),
  verticalAccuracy: z.number().optional(),
  speed: z.number().optional(),
  course: z.number().optional(),
  timestamp: z.coerce.date().optional(),
});

const permissionSchema = z.object({
  permission: z.enum(['granted', 'denied', 'restricted']),
});

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * HTTP status for an error that escaped fetchContext
 */
export function statusForError(error: unknown): number {
  if (!(error instanceof CameraContextError)) {
    return 500;
  }
  switch (error.code) {
    case 'PERMISSION_DENIED':
      return 403;
    case 'LOCATION_TIMEOUT':
      return 504;
    case 'LOCATION_UNAVAILABLE':
      return 503;
    default:
      return 500;
  }
}

export function formatSSEMessage(data: Record<string, unknown>): string {
  return `data: ${JSON.stringify(data)}\n\n`;
}

// ===== Server =====

export function createServer(orchestrator: ContextOrchestrator, options: ServerOptions = {}) {
  const app = express();
  const { locationFeed } = options;
  const heartbeatIntervalMs = options.heartbeatIntervalMs ?? 30000;
  const sseClients: SSEClient[] = [];

  // Middleware
  app.use(cors());
  app.use(express.json());

  function broadcast(data: Record<string, unknown>): void {
    const message = formatSSEMessage(data);

    sseClients.forEach((client) => {
      try {
        client.response.write(message);
      } catch (error) {
        logger.error({ clientId: client.id, error: errorMessage(error) }, 'Error sending to SSE client');
      }
    });

    if (sseClients.length > 0) {
      logger.debug({ clientCount: sseClients.length, type: data.type }, '📡 Broadcasted to SSE clients');
    }
  }

  orchestrator.on('context-updated', (event: ContextUpdatedEvent) => {
    broadcast({ type: 'context-updated', ...event });
  });
  orchestrator.on('cache-hit', (event: ContextUpdatedEvent) => {
    broadcast({ type: 'cache-hit', ...event });
  });
  orchestrator.on('cache-cleared', (event: { timestamp: Date }) => {
    broadcast({ type: 'cache-cleared', ...event });
  });

  // Health check
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  // Available scenes and their defaults
  app.get('/api/scenes', (_req: Request, res: Response) => {
    res.json({
      success: true,
      scenes: SCENES.map((scene) => ({
        id: scene,
        name: SCENE_DISPLAY_NAMES[scene],
        defaultMode: SCENE_DEFAULT_MODE[scene],
        defaultModeName: MODE_DISPLAY_NAMES[SCENE_DEFAULT_MODE[scene]],
        poiKeywords: SCENE_POI_KEYWORDS[scene],
      })),
    });
  });

  // Resolve context for the current position
  app.get('/api/context', async (req: Request, res: Response) => {
    const parsed = contextQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: describeIssues(parsed.error),
      });
      return;
    }

    const { scene, mode } = parsed.data;

    try {
      const context = await orchestrator.fetchContext(scene, mode);
      res.json({
        success: true,
        context,
      });
    } catch (error) {
      const status = statusForError(error);
      logger.error({ scene, mode, status, error: errorMessage(error) }, 'Error fetching context');
      res.status(status).json({
        success: false,
        error: status === 500 ? 'Failed to fetch context' : errorMessage(error),
        code: error instanceof CameraContextError ? error.code : undefined,
      });
    }
  });

  // Push a location fix from a client
  app.post('/api/location', (req: Request, res: Response) => {
    if (!locationFeed) {
      res.status(404).json({
        success: false,
        error: 'Location push is not enabled (LOCATION_SOURCE=push)',
      });
      return;
    }

    const parsed = pushLocationSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: describeIssues(parsed.error),
      });
      return;
    }

    try {
      const reading = locationFeed.pushLocation(parsed.data);
      res.json({
        success: true,
        reading,
      });
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error pushing location');
      res.status(statusForError(error)).json({
        success: false,
        error: errorMessage(error),
      });
    }
  });

  // Change the simulated permission state of the push feed
  app.post('/api/location/permission', (req: Request, res: Response) => {
    if (!locationFeed) {
      res.status(404).json({
        success: false,
        error: 'Location push is not enabled (LOCATION_SOURCE=push)',
      });
      return;
    }

    const parsed = permissionSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        success: false,
        error: describeIssues(parsed.error),
      });
      return;
    }

    locationFeed.setPermission(parsed.data.permission);
    res.json({
      success: true,
      permission: locationFeed.getPermission(),
    });
  });

  // Cache status
  app.get('/api/cache/status', (_req: Request, res: Response) => {
    try {
      const status = orchestrator.cacheStatus();
      res.json({
        success: true,
        ...status,
      });
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error getting cache status');
      res.status(500).json({
        success: false,
        error: 'Failed to retrieve cache status',
      });
    }
  });

  // Clear cache
  app.post('/api/cache/clear', (_req: Request, res: Response) => {
    try {
      orchestrator.clearCache();
      res.json({
        success: true,
        message: 'Cache cleared successfully',
      });
    } catch (error) {
      logger.error({ error: errorMessage(error) }, 'Error clearing cache');
      res.status(500).json({
        success: false,
        error: 'Failed to clear cache',
      });
    }
  });

  // Server-Sent Events (SSE) endpoint for real-time updates
  app.get('/api/stream', (req: Request, res: Response) => {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.setHeader('X-Accel-Buffering', 'no'); // Disable buffering in nginx

    const clientId = `client-${Date.now()}-${Math.random()}`;
    sseClients.push({ id: clientId, response: res });
    logger.info({ clientId, totalClients: sseClients.length }, '📡 SSE client connected');

    res.write(formatSSEMessage({
      type: 'connected',
      clientId,
      timestamp: new Date(),
      cache: orchestrator.cacheStatus(),
    }));

    const heartbeat = setInterval(() => {
      res.write(formatSSEMessage({ type: 'heartbeat', timestamp: new Date() }));
    }, heartbeatIntervalMs);

    req.on('close', () => {
      clearInterval(heartbeat);
      const index = sseClients.findIndex((c) => c.id === clientId);
      if (index > -1) {
        sseClients.splice(index, 1);
      }
      logger.info({ clientId, remainingClients: sseClients.length }, '📡 SSE client disconnected');
    });
  });

  return app;
}

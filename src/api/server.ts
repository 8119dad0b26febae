import express, { NextFunction, Request, RequestHandler, Response } from 'express';
import { Server } from 'http';
import { config } from '../config';
import { getErrorMessage, getErrorStatusCode } from '../errors';
import { Pipeline } from '../services/pipeline';
import { normalizeHeaders } from '../services/webhookSignature';

type AsyncRoute = (req: Request, res: Response) => Promise<void>;

// Express 4 does not forward rejected promises to the error middleware on its own.
function route(handler: AsyncRoute): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

export class ApiServer {
  private app: express.Application;

  constructor(private pipeline: Pipeline) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  getApp(): express.Application {
    return this.app;
  }

  private setupMiddleware(): void {
    // CORS
    this.app.use((req, res, next) => {
      res.header('Access-Control-Allow-Origin', '*');
      res.header('Access-Control-Allow-Headers', 'Origin, X-Requested-With, Content-Type, Accept, Authorization');
      res.header('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
      next();
    });
  }

  private setupRoutes(): void {
    const { intake, queries, backfill } = this.pipeline;

    this.app.get('/health', (req, res) => {
      res.json({ status: 'healthy', timestamp: new Date().toISOString() });
    });

    // Webhook bodies stay as text so signatures are checked against the exact bytes received.
    const rawBody = express.text({ type: '*/*', limit: '5mb' });

    this.app.post(
      '/api/webhooks/:provider/:clientReferenceId',
      rawBody,
      route(async (req, res) => {
        const acceptance = await intake.receive({
          provider: req.params.provider,
          clientReferenceId: req.params.clientReferenceId,
          rawBody: typeof req.body === 'string' ? req.body : '',
          headers: normalizeHeaders(req.headers)
        });
        res.status(202).json(acceptance);
      })
    );

    this.app.post('/api/webhooks/:provider', (req, res) => {
      res.status(400).json({ error: 'Missing client reference id' });
    });

    this.app.get(
      '/api/transcriptions',
      route(async (req, res) => {
        res.json(await queries.listRecent(req.query.limit));
      })
    );

    this.app.get(
      '/api/transcriptions/by-meeting/:meetingId',
      route(async (req, res) => {
        res.json(await queries.getLatestByMeetingId(req.params.meetingId));
      })
    );

    this.app.get(
      '/api/transcriptions/by-meeting/:meetingId/action-items',
      route(async (req, res) => {
        res.json(await queries.listActionItems(req.params.meetingId));
      })
    );

    this.app.get(
      '/api/transcriptions/:id',
      route(async (req, res) => {
        res.json(await queries.getById(req.params.id));
      })
    );

    this.app.post(
      '/api/transcriptions/backfill/:meetingId',
      route(async (req, res) => {
        res.json(await backfill.backfill(req.params.meetingId));
      })
    );

    this.app.get(
      '/api/tenants/:clientReferenceId/destinations',
      route(async (req, res) => {
        res.json(await queries.describeDestinations(req.params.clientReferenceId));
      })
    );
  }

  private setupErrorHandling(): void {
    this.app.use((req, res) => {
      res.status(404).json({ error: 'Route not found' });
    });

    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const statusCode = getErrorStatusCode(error);
      if (statusCode === 500) {
        console.error(`${req.method} ${req.path} failed:`, error);
        res.status(500).json({ error: 'Internal server error' });
        return;
      }
      res.status(statusCode).json({ error: getErrorMessage(error) });
    });
  }

  public start(port: number = config.server.port): Server {
    return this.app.listen(port, () => {
      console.log(`🎯 Meeting enrichment pipeline running on port ${port}`);
      console.log(`📊 Health check: http://localhost:${port}/health`);
      console.log(`📝 Webhooks: http://localhost:${port}/api/webhooks/{provider}/{clientReferenceId}`);
      console.log(`🔗 Supported providers: fireflies, read_ai`);
    });
  }
}

import express, { Express, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import { JobEvent, ResearchOrchestrator } from '../../application/services/ResearchOrchestrator.js';
import { Logger, createLogger } from '../../utils/logger.js';
import { ApiResponse, ResearchApi } from './ResearchApi.js';

type BroadcastMessage = JobEvent | { type: 'connected' };

/**
 * Express front end for the research API, with a WebSocket feed of job events on the same port
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();
  private unsubscribe: (() => void) | null = null;

  constructor(
    private readonly api: ResearchApi,
    private readonly orchestrator: ResearchOrchestrator,
    private readonly port: number,
    private readonly logger: Logger = createLogger('WebServer')
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());
  }

  private setupRoutes(): void {
    const send = (res: Response, response: ApiResponse) => {
      res.status(response.status).json(response.body);
    };

    this.app.get('/', (_req: Request, res: Response) => send(res, this.api.root()));

    this.app.get('/health', (_req: Request, res: Response) => {
      this.api.healthCheck().then(
        (response) => send(res, response),
        (error: unknown) => {
          this.logger.error('Health check failed:', error);
          res.status(500).json({ error: 'Health check failed' });
        }
      );
    });

    this.app.post('/research', (req: Request, res: Response) => send(res, this.api.submit(req.body)));
    this.app.get('/research', (_req: Request, res: Response) => send(res, this.api.list()));
    this.app.get('/research/:id', (req: Request, res: Response) => send(res, this.api.get(req.params.id)));
    this.app.get('/research/:id/progress', (req: Request, res: Response) =>
      send(res, this.api.progress(req.params.id))
    );
    this.app.delete('/research/:id', (req: Request, res: Response) => send(res, this.api.remove(req.params.id)));
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer });

    this.wss.on('connection', (ws: WebSocket) => {
      this.logger.debug('WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        this.logger.warn('WebSocket error:', error);
        this.clients.delete(ws);
      });

      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() }));
    });

    this.unsubscribe = this.orchestrator.onJobEvent((event) => this.broadcast(event));
  }

  broadcast(message: BroadcastMessage): void {
    const payload = JSON.stringify({ ...message, timestamp: new Date().toISOString() });
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.httpServer = this.app.listen(this.port, () => {
        this.logger.info(`REST API available at http://localhost:${this.port}`);
        this.setupWebSocket();
        resolve();
      });

      this.httpServer.on('error', (error) => {
        this.logger.error('Server error:', error);
        reject(error);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      this.unsubscribe?.();
      this.unsubscribe = null;

      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      this.wss?.close();
      this.wss = null;

      if (this.httpServer) {
        this.httpServer.close(() => {
          this.logger.info('HTTP server closed');
          resolve();
        });
        this.httpServer = null;
      } else {
        resolve();
      }
    });
  }
}

import express, { Express, NextFunction, Request, Response } from 'express';
import { Server as HttpServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import cors from 'cors';
import { z } from 'zod';
import { JobService } from '../../application/services/JobService.js';
import { JobSnapshot } from '../../core/entities/Job.js';
import { JobNotFoundError, errorMessage } from '../../core/errors.js';
import { HealthMonitor } from '../cluster/HealthMonitor.js';
import { ServerRegistry } from '../cluster/ServerRegistry.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('WebServer');

const SubmitJobSchema = z.object({
  chunks: z.array(z.string().min(1, 'Chunks must not be empty')).min(1, 'At least 1 chunk is required'),
  label: z.string().optional(),
  model: z.string().optional(),
});

const JobStatusQuerySchema = z.enum(['queued', 'processing', 'completed', 'failed', 'cancelled']);

export type WebSocketMessage =
  | { type: 'connected'; timestamp: string }
  | { type: 'job_updated'; job: JobSnapshot; timestamp: string }
  | { type: 'servers_updated'; activeServers: number; totalServers: number; timestamp: string };

/**
 * REST API over the job service plus a WebSocket feed of job snapshots
 */
export class WebServer {
  private app: Express;
  private httpServer: HttpServer | null = null;
  private wss: WebSocketServer | null = null;
  private clients: Set<WebSocket> = new Set();

  constructor(
    private jobService: JobService,
    private registry: ServerRegistry,
    private monitor: HealthMonitor,
    private port: number = 3001
  ) {
    this.app = express();
    this.setupMiddleware();
    this.setupRoutes();

    this.jobService.onJobUpdate((job) => this.notifyJobUpdate(job));
  }

  getApp(): Express {
    return this.app;
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json({ limit: '10mb' }));
  }

  private setupRoutes(): void {
    // API: Submit chunks
    this.app.post('/api/jobs', (req: Request, res: Response) => {
      const parsed = SubmitJobSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({
          success: false,
          error: parsed.error.errors.map((e) => `${e.path.join('.') || 'body'}: ${e.message}`).join('; '),
        });
        return;
      }

      const { chunks, label, model } = parsed.data;
      const jobId = this.jobService.submitJob(chunks, { label, model });
      res.status(202).json({ success: true, data: this.jobService.getJobStatus(jobId) });
    });

    // API: List jobs
    this.app.get('/api/jobs', (req: Request, res: Response) => {
      let status: z.infer<typeof JobStatusQuerySchema> | undefined;
      if (req.query.status !== undefined) {
        const parsed = JobStatusQuerySchema.safeParse(req.query.status);
        if (!parsed.success) {
          res.status(400).json({ success: false, error: `Invalid status: ${String(req.query.status)}` });
          return;
        }
        status = parsed.data;
      }
      res.json({ success: true, data: this.jobService.getAllJobs(status) });
    });

    // API: Get job by ID
    this.app.get('/api/jobs/:id', (req: Request, res: Response) => {
      const job = this.jobService.getJobStatus(req.params.id);
      if (!job) {
        res.status(404).json({ success: false, error: 'Job not found' });
        return;
      }
      res.json({ success: true, data: job });
    });

    // API: Ordered chunk results
    this.app.get('/api/jobs/:id/results', (req: Request, res: Response) => {
      const job = this.jobService.getJobStatus(req.params.id);
      if (job && (job.status === 'queued' || job.status === 'processing')) {
        res.status(409).json({ success: false, error: `Job is still ${job.status}` });
        return;
      }

      const results = this.jobService.getJobResult(req.params.id);
      if (!results) {
        res.status(404).json({ success: false, error: 'Job not found' });
        return;
      }
      res.json({ success: true, data: { job, results } });
    });

    // API: Cancel job
    this.app.post('/api/jobs/:id/cancel', (req: Request, res: Response) => {
      if (!this.jobService.cancelJob(req.params.id)) {
        res.status(404).json({ success: false, error: 'Job not found or already finished' });
        return;
      }
      res.json({ success: true, data: this.jobService.getJobStatus(req.params.id) });
    });

    // API: Discard finished job
    this.app.delete('/api/jobs/:id', (req: Request, res: Response) => {
      const discarded = this.jobService.discardJob(req.params.id, req.query.purge === 'true');
      if (!discarded) {
        res.status(400).json({ success: false, error: 'Only finished jobs can be discarded' });
        return;
      }
      res.json({ success: true, message: 'Job discarded' });
    });

    // API: Cluster status
    this.app.get('/api/servers', (req: Request, res: Response) => {
      res.json({ success: true, data: this.registry.getStatus() });
    });

    // API: Probe inactive servers now
    this.app.post('/api/servers/reconnect', async (req: Request, res: Response, next: NextFunction) => {
      try {
        const summary = await this.monitor.checkInactive();
        const status = this.registry.getStatus();
        this.broadcast({
          type: 'servers_updated',
          activeServers: status.activeServers,
          totalServers: status.totalServers,
          timestamp: new Date().toISOString(),
        });
        res.json({ success: true, data: { summary, status } });
      } catch (error) {
        next(error);
      }
    });

    // API: Get statistics
    this.app.get('/api/stats', (req: Request, res: Response) => {
      res.json({ success: true, data: this.jobService.getStatistics() });
    });

    // Errors thrown by the handlers above
    this.app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof JobNotFoundError) {
        res.status(404).json({ success: false, error: error.message });
        return;
      }
      logger.error(`${req.method} ${req.path} failed:`, error);
      res.status(500).json({ success: false, error: errorMessage(error) });
    });
  }

  private setupWebSocket(): void {
    if (!this.httpServer) return;

    this.wss = new WebSocketServer({ server: this.httpServer, path: '/ws' });

    this.wss.on('connection', (ws: WebSocket) => {
      logger.debug('New WebSocket client connected');
      this.clients.add(ws);

      ws.on('close', () => {
        this.clients.delete(ws);
      });

      ws.on('error', (error) => {
        logger.error('WebSocket error:', error);
        this.clients.delete(ws);
      });

      ws.send(JSON.stringify({ type: 'connected', timestamp: new Date().toISOString() }));
    });
  }

  broadcast(message: WebSocketMessage): void {
    const payload = JSON.stringify(message);
    this.clients.forEach((client) => {
      if (client.readyState === WebSocket.OPEN) {
        client.send(payload);
      }
    });
  }

  notifyJobUpdate(job: JobSnapshot): void {
    this.broadcast({ type: 'job_updated', job, timestamp: new Date().toISOString() });
  }

  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.httpServer = this.app.listen(this.port, () => {
        logger.info(`REST API available at http://localhost:${this.port}/api`);
        this.setupWebSocket();
        resolve();
      });

      this.httpServer.on('error', (error) => {
        logger.error('Server error:', error);
        reject(error);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      this.clients.forEach((client) => {
        client.close();
      });
      this.clients.clear();

      if (this.wss) {
        this.wss.close();
        this.wss = null;
      }

      if (this.httpServer) {
        this.httpServer.close(() => {
          logger.info('HTTP server closed');
          resolve();
        });
        this.httpServer = null;
      } else {
        resolve();
      }
    });
  }
}

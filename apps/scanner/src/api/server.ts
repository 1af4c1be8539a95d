/**
 * HTTP API (express)
 *
 * GET  /health
 * POST /jobs/daily?as_of=YYYY-MM-DD
 * GET  /alerts/pending?limit=N
 * POST /alerts/:id/mark-sent
 */

import express, { type NextFunction, type Request, type Response } from "express";
import type { Server } from "node:http";
import { logger } from "@dip-scanner/utils";

import type { AppServices } from "../context";
import {
  handleHealth,
  handleListPendingAlerts,
  handleMarkAlertSent,
  handleRunDailyJob,
  type HttpResult,
} from "./handlers";

type Handler = (req: Request) => HttpResult | Promise<HttpResult>;

function route(handler: Handler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(handler(req))
      .then(result => {
        res.status(result.status).json(result.body);
      })
      .catch(next);
  };
}

export class ApiServer {
  private app: express.Application;
  private server: Server | null = null;

  constructor(private services: AppServices) {
    this.app = express();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  private setupRoutes(): void {
    this.app.get("/health", route(() => handleHealth()));
    this.app.post("/jobs/daily", route(req => handleRunDailyJob(req.query, this.services)));
    this.app.get("/alerts/pending", route(req => handleListPendingAlerts(req.query, this.services)));
    this.app.post("/alerts/:id/mark-sent", route(req => handleMarkAlertSent(req.params, this.services)));
  }

  private setupErrorHandling(): void {
    this.app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
      logger.error("API: unhandled error", { path: req.path, error: err });
      res.status(500).json({ detail: "Internal server error" });
    });
  }

  start(port: number): Promise<void> {
    return new Promise(resolve => {
      this.server = this.app.listen(port, () => {
        logger.info("API listening", { port });
        resolve();
      });
    });
  }

  stop(): Promise<void> {
    const server = this.server;
    this.server = null;
    if (!server) return Promise.resolve();

    return new Promise((resolve, reject) => {
      server.close(error => (error ? reject(error) : resolve()));
    });
  }
}

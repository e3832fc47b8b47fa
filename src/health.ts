import type { Server as NetServer } from "node:net";

import { serve } from "@hono/node-server";
import { Hono } from "hono";

import { logger } from "./logger.js";

export const SERVICE_NAME = "clipdrop-bot";

export interface ActivitySource {
  readonly activeCount: number;
}

interface HealthServerOptions {
  port: number;
  hostname?: string;
  now?: () => number;
}

export interface HealthReport {
  status: "healthy";
  service: string;
  uptimeSeconds: number;
  activeDownloads: number;
}

export class HealthServer {
  readonly app: Hono;
  private server: ReturnType<typeof serve> | null = null;
  private readonly now: () => number;
  private readonly startedAt: number;

  constructor(
    private readonly activity: ActivitySource,
    private readonly options: HealthServerOptions,
  ) {
    this.now = options.now ?? Date.now;
    this.startedAt = this.now();
    this.app = new Hono();
    this.setupRoutes();
  }

  report(): HealthReport {
    return {
      status: "healthy",
      service: SERVICE_NAME,
      uptimeSeconds: Math.floor((this.now() - this.startedAt) / 1000),
      activeDownloads: this.activity.activeCount,
    };
  }

  private setupRoutes(): void {
    this.app.get("/health", (c) => c.json(this.report()));
    this.app.get("/", (c) => c.json(this.report()));
  }

  start(): void {
    if (this.server) {
      return;
    }

    const hostname = this.options.hostname ?? "0.0.0.0";
    const server = serve({
      fetch: this.app.fetch,
      port: this.options.port,
      hostname,
    });
    this.watchErrors(server, hostname);
    this.server = server;
    logger.info({ port: this.options.port, hostname }, "Health server listening");
  }

  private watchErrors(server: NetServer, hostname: string): void {
    server.on("error", (error) => {
      logger.error({ err: error, port: this.options.port, hostname }, "Health server failed");
    });
  }

  stop(): void {
    if (this.server) {
      this.server.close();
      this.server = null;
    }
  }
}

import express from "express";
import type { Server } from "node:http";
import { registerRoutes, type RouteContext } from "./routes";

export function createApp(ctx: RouteContext): { app: express.Express; server: Server } {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  const server = registerRoutes(app, ctx);
  return { app, server };
}

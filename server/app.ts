import express, { type Express } from "express";
import { createServer, type Server } from "http";
import { log } from "./log";
import type { Portal } from "./portal";
import { registerRoutes } from "./routes";

export async function createApp(portal: Portal): Promise<{ app: Express; httpServer: Server }> {
  const app = express();
  const httpServer = createServer(app);

  app.disable("x-powered-by");
  app.use(express.urlencoded({ extended: false }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      log(`${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
    });
    next();
  });

  await registerRoutes(httpServer, app, portal);
  return { app, httpServer };
}

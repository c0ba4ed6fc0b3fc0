import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { addSecurityHeaders } from "./middleware/security";
import { NotFoundError, handleRouteError } from "./utils/errorHandler";

/**
 * Express app with the shared middleware. Routes are added by registerRoutes;
 * call finalizeApp afterwards to install the 404 and error handlers.
 */
export function createApp(): Express {
  const app = express();
  app.disable("x-powered-by");
  app.use(addSecurityHeaders);
  app.use(express.json({ limit: "16kb" }));

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      console.log(`[Server] ${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
    });
    next();
  });

  return app;
}

export function finalizeApp(app: Express): Express {
  app.use((_req, res) => {
    handleRouteError(res, new NotFoundError("Route"));
  });

  // Body-parser errors and anything routed through next(err)
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    handleRouteError(res, err, "Server");
  });

  return app;
}

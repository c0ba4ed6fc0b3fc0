import type { Express, Request, RequestHandler, Response } from "express";
import { createServer, type Server } from "http";
import type { Answer, AskQuery, AskRequest, AskResponse } from "@shared/schema";
import { SERVER_DEFAULTS } from "./config/constants";
import type { MessageCorpus } from "./corpus/messageCorpus";
import type { QueryOrchestrator } from "./pipeline/orchestrator";
import { askSchemas, validate } from "./middleware/validation";
import { createRateLimiter, requireApiKey } from "./middleware/security";
import { handleRouteError } from "./utils/errorHandler";

export type RouteDeps = {
  orchestrator: Pick<QueryOrchestrator, "ask">;
  corpus: Pick<MessageCorpus, "size">;
  apiKey?: string;
  rateLimit: { windowMs: number; maxRequests: number };
};

export function toAskResponse(answer: Answer): AskResponse {
  return {
    answer: answer.text,
    supportingCandidateIds: answer.supportingCandidateIds,
    ...(answer.count !== undefined && { count: answer.count }),
    ...(answer.insufficientData !== undefined && { insufficientData: answer.insufficientData }),
  };
}

// Aborts when the client goes away before we respond.
function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller;
}

export function createHealthHandler(corpus: Pick<MessageCorpus, "size">): RequestHandler {
  return (_req, res) => {
    res.json({
      status: "online",
      service: SERVER_DEFAULTS.SERVICE_NAME,
      messages: corpus.size,
    });
  };
}

/**
 * POST /api/ask. Expects a body already checked by validate({ body: askSchemas.body }).
 */
export function createAskHandler(orchestrator: Pick<QueryOrchestrator, "ask">) {
  return async (req: Request, res: Response) => {
    try {
      const body: AskRequest = req.body;
      const controller = abortOnDisconnect(res);
      const answer = await orchestrator.ask(body.question, {
        targetPerson: body.targetPerson,
        signal: controller.signal,
      });
      res.json(toAskResponse(answer));
    } catch (error) {
      handleRouteError(res, error, "Ask");
    }
  };
}

/**
 * GET /ask?question=...&person=... Expects res.locals.query from
 * validate({ query: askSchemas.query }).
 */
export function createAskQueryHandler(orchestrator: Pick<QueryOrchestrator, "ask">) {
  return async (_req: Request, res: Response) => {
    try {
      const query: AskQuery = res.locals.query;
      const controller = abortOnDisconnect(res);
      const answer = await orchestrator.ask(query.question, {
        targetPerson: query.person,
        signal: controller.signal,
      });
      res.json(toAskResponse(answer));
    } catch (error) {
      handleRouteError(res, error, "Ask");
    }
  };
}

export function registerRoutes(app: Express, deps: RouteDeps): Server {
  const guards = [requireApiKey(deps.apiKey), createRateLimiter(deps.rateLimit)];

  app.get("/", createHealthHandler(deps.corpus));

  app.post("/api/ask", ...guards, validate({ body: askSchemas.body }), createAskHandler(deps.orchestrator));

  app.get("/ask", ...guards, validate({ query: askSchemas.query }), createAskQueryHandler(deps.orchestrator));

  const httpServer = createServer(app);

  return httpServer;
}

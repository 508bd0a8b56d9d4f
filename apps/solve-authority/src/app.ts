import express, { type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import { v4 as uuidv4 } from "uuid";
import { ZodError } from "zod";
import type { Registry } from "prom-client";

import {
  ERR,
  GenerateQuery,
  MazeError,
  MazeKind,
  SolveRequest,
  deriveSeed,
  fail,
  hashLayout,
  ok,
  type ApiResult,
  type GeneratedMaze
} from "@breach-path/shared";
import { generateMaze, generateRandom } from "@breach-path/sim";
import type { SolveCache } from "./cache";
import type { SolveService } from "./solveService";

export type AppDeps = {
  service: SolveService;
  cache: SolveCache;
  registry: Registry;
  seedSalt: string;
};

// body-parser failures (entity.parse.failed, entity.too.large, ...)
function isClientHttpError(err: unknown): err is { status: number; type: string } {
  return typeof err === "object" && err !== null &&
    "status" in err && typeof err.status === "number" && err.status >= 400 && err.status < 500 &&
    "type" in err && typeof err.type === "string";
}

export function toErrorResponse(err: unknown): { status: number; body: ApiResult<never> } {
  if (err instanceof MazeError) return { status: err.status, body: fail(err) };
  if (err instanceof ZodError) {
    const message = err.issues.map((i) => `${i.path.join(".") || "body"}: ${i.message}`).join("; ");
    return { status: 400, body: { code: ERR.INVALID_PARAM, message } };
  }
  if (isClientHttpError(err)) {
    if (err.type === "entity.too.large") {
      return { status: 413, body: { code: ERR.MAZE_TOO_LARGE, message: "request body too large" } };
    }
    const message = err.type === "entity.parse.failed" ? "request body is not valid JSON" : err.type;
    return { status: err.status, body: { code: ERR.INVALID_PARAM, message } };
  }
  return { status: 500, body: { code: ERR.INTERNAL, message: "internal error" } };
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "8mb" }));

  app.get("/metrics", async (_req: Request, res: Response) => {
    res.set("Content-Type", deps.registry.contentType);
    res.end(await deps.registry.metrics());
  });

  // health / readiness
  app.get("/healthz", (_req: Request, res: Response) => res.json({ ok: true }));
  app.get("/readyz", async (_req: Request, res: Response) => {
    try {
      const ready = await deps.cache.ping();
      res.status(ready ? 200 : 503).json({ ok: ready });
    } catch (err) {
      res.status(503).json({ ok: false, error: String(err) });
    }
  });

  app.post("/solve", async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = SolveRequest.parse(req.body);
      const requestId = req.header("x-request-id") ?? uuidv4();
      res.setHeader("x-request-id", requestId);
      res.json(ok(await deps.service.solve(body, requestId)));
    } catch (err) {
      next(err);
    }
  });

  app.get("/maze/:kind", (req: Request, res: Response, next: NextFunction) => {
    try {
      const kind = MazeKind.parse(req.params.kind);
      const q = GenerateQuery.parse(req.query);
      const seed = q.seed ?? deriveSeed(kind, deps.seedSalt, uuidv4());
      const maze = kind === "maze"
        ? generateMaze(seed, q.height, q.width, q.loopiness)
        : generateRandom(seed, q.height, q.width, q.density);
      const out: GeneratedMaze = { kind, seed, layoutHash: hashLayout(maze), maze };
      res.json(ok(out));
    } catch (err) {
      next(err);
    }
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = toErrorResponse(err);
    if (status >= 500) console.error("[http] unhandled", err);
    res.status(status).json(body);
  });

  return app;
}

import http from "node:http";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { Registry } from "prom-client";
import { z } from "zod";
import {
  GeneratedMaze,
  InvalidMazeError,
  InvalidParamError,
  MazeTooLargeError,
  NoSolutionError,
  SolveRequest,
  hashLayout
} from "@breach-path/shared";
import { generateMaze } from "@breach-path/sim";
import { createApp, toErrorResponse } from "./app";
import { MemorySolveCache } from "./cache";
import { createMetrics } from "./metrics";
import { SolveService } from "./solveService";

describe("toErrorResponse", () => {
  it("maps maze errors to their status and code", () => {
    expect(toErrorResponse(new InvalidMazeError("maze has no rows"))).toEqual({
      status: 400,
      body: { code: 1001, message: "maze has no rows" }
    });
    expect(toErrorResponse(new MazeTooLargeError(10, 4))).toEqual({
      status: 413,
      body: { code: 1003, message: "maze has 10 tiles, limit is 4" }
    });
    expect(toErrorResponse(new NoSolutionError(2, 2, 1)).status).toBe(422);
  });

  it("lists payload issues by path", () => {
    const parsed = SolveRequest.safeParse({});
    expect(parsed.success).toBe(false);
    if (!parsed.success) {
      expect(toErrorResponse(parsed.error)).toEqual({
        status: 400,
        body: { code: 1004, message: "maze: Required" }
      });
    }
  });

  it("treats generator argument errors as bad parameters", () => {
    expect(toErrorResponse(new InvalidParamError("maze dimensions must be odd, got 4x5"))).toEqual({
      status: 400,
      body: { code: 1004, message: "maze dimensions must be odd, got 4x5" }
    });
  });

  it("maps unreadable JSON bodies to a bad parameter", () => {
    const err = Object.assign(new SyntaxError("Unexpected end of JSON input"), { status: 400, type: "entity.parse.failed" });
    expect(toErrorResponse(err)).toEqual({
      status: 400,
      body: { code: 1004, message: "request body is not valid JSON" }
    });
  });

  it("maps oversized bodies to 413", () => {
    expect(toErrorResponse({ status: 413, type: "entity.too.large" })).toEqual({
      status: 413,
      body: { code: 1003, message: "request body too large" }
    });
  });

  it("keeps the status of other client-side body errors", () => {
    expect(toErrorResponse({ status: 415, type: "encoding.unsupported" })).toEqual({
      status: 415,
      body: { code: 1004, message: "encoding.unsupported" }
    });
  });

  it("hides runtime faults behind a 500", () => {
    expect(toErrorResponse(new RangeError("Invalid array length"))).toEqual({
      status: 500,
      body: { code: 1005, message: "internal error" }
    });
    expect(toErrorResponse(new Error("boom")).status).toBe(500);
    expect(toErrorResponse({ status: 503, type: "x" }).status).toBe(500);
  });
});

const GeneratedEnvelope = z.object({ code: z.literal(0), message: z.string(), data: GeneratedMaze });

describe("HTTP routes", () => {
  let server: http.Server;
  let base = "";

  beforeAll(async () => {
    const cache = new MemorySolveCache({ ttlSec: 60, maxEntries: 100 });
    const metrics = createMetrics(new Registry(), false);
    const service = new SolveService({ cache, metrics, maxTiles: 20, log: { log: vi.fn(), warn: vi.fn() } });
    server = http.createServer(createApp({ service, cache, registry: metrics.registry, seedSalt: "test-salt" }));
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const addr = server.address();
    if (addr === null || typeof addr === "string") throw new Error("server has no port");
    base = `http://127.0.0.1:${addr.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  const post = (body: string, headers: Record<string, string> = {}) =>
    fetch(`${base}/solve`, { method: "POST", headers: { "content-type": "application/json", ...headers }, body });

  it("solves a maze and echoes the request id", async () => {
    const maze = [[0, 1, 0], [0, 1, 0], [0, 0, 0]];
    const res = await post(JSON.stringify({ maze }), { "x-request-id": "req-1" });
    expect(res.status).toBe(200);
    expect(res.headers.get("x-request-id")).toBe("req-1");
    expect(await res.json()).toEqual({
      code: 0,
      message: "OK",
      data: { status: "solved", steps: 5, breach: { row: 0, col: 1 }, layoutHash: hashLayout(maze), cached: false }
    });
  });

  it("assigns a request id when none is sent", async () => {
    const res = await post(JSON.stringify({ maze: [[0, 1, 0]] }));
    expect(res.status).toBe(200);
    expect(res.headers.get("x-request-id")).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
  });

  it("answers no solution with a 200", async () => {
    const res = await post(JSON.stringify({ maze: [[0, 1, 1, 0]] }));
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      code: 0,
      message: "OK",
      data: { status: "no_solution", layoutHash: hashLayout([[0, 1, 1, 0]]), cached: false }
    });
  });

  it("rejects ragged mazes with INVALID_MAZE", async () => {
    const res = await post(JSON.stringify({ maze: [[0, 0], [0]] }));
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ code: 1001, message: "row 1 has 1 tiles, expected 2" });
  });

  it("rejects mazes over the tile limit", async () => {
    const maze = Array.from({ length: 5 }, () => [0, 0, 0, 0, 0]);
    const res = await post(JSON.stringify({ maze }));
    expect(res.status).toBe(413);
    expect(await res.json()).toEqual({ code: 1003, message: "maze has 25 tiles, limit is 20" });
  });

  it("rejects a body that is not JSON", async () => {
    const res = await post('{"maze": [[0,1');
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ code: 1004, message: "request body is not valid JSON" });
  });

  it("rejects a body without a maze", async () => {
    const res = await post("{}");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ code: 1004, message: "maze: Required" });
  });

  it("generates a maze with a derived seed", async () => {
    const res = await fetch(`${base}/maze/maze?height=9&width=9`);
    expect(res.status).toBe(200);
    const { data } = GeneratedEnvelope.parse(await res.json());
    expect(data.kind).toBe("maze");
    expect(data.seed).toMatch(/^[0-9a-f]{64}$/);
    expect(data.maze).toHaveLength(9);
    expect(data.layoutHash).toBe(hashLayout(data.maze));
  });

  it("replays a maze from an explicit seed", async () => {
    const res = await fetch(`${base}/maze/maze?height=9&width=11&seed=deadbeef`);
    const { data } = GeneratedEnvelope.parse(await res.json());
    expect(data.maze).toEqual(generateMaze("deadbeef", 9, 11, 0.08));
  });

  it("rejects even maze dimensions", async () => {
    const res = await fetch(`${base}/maze/maze?height=10`);
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ code: 1004, message: "maze dimensions must be odd, got 10x15" });
  });

  it("rejects unknown maze kinds", async () => {
    const res = await fetch(`${base}/maze/hexagon`);
    expect(res.status).toBe(400);
  });

  it("reports health, readiness and metrics", async () => {
    expect(await (await fetch(`${base}/healthz`)).json()).toEqual({ ok: true });
    const ready = await fetch(`${base}/readyz`);
    expect(ready.status).toBe(200);
    expect(await ready.json()).toEqual({ ok: true });
    const metrics = await (await fetch(`${base}/metrics`)).text();
    expect(metrics).toContain('solves_total{outcome="solved"}');
  });
});

import { SpanStatusCode, trace, type Span } from "@opentelemetry/api";
import {
  InvalidMazeError,
  MazeTooLargeError,
  NoSolutionError,
  hashLayout,
  type SolveReport,
  type SolveRequest
} from "@breach-path/shared";
import { solveDetailed } from "@breach-path/sim";
import { cacheKey, type SolveCache } from "./cache";
import type { Outcome, SolveMetrics } from "./metrics";

type Logger = Pick<Console, "log" | "warn">;

export type SolveServiceDeps = {
  cache: SolveCache;
  metrics: SolveMetrics;
  maxTiles: number;
  log?: Logger;
};

const tracer = trace.getTracer("solve-authority");

export class SolveService {
  private readonly log: Logger;

  constructor(private readonly deps: SolveServiceDeps) {
    this.log = deps.log ?? console;
  }

  /** Cached solve. InvalidMazeError and MazeTooLargeError propagate; no solution is a report. */
  async solve(req: SolveRequest, requestId: string): Promise<SolveReport> {
    const tiles = req.maze.reduce((n, row) => n + row.length, 0);
    if (tiles > this.deps.maxTiles) throw new MazeTooLargeError(tiles, this.deps.maxTiles);

    const layoutHash = hashLayout(req.maze);
    const key = cacheKey(layoutHash, req.allowDirect);

    const hit = await this.lookup(key);
    if (hit) {
      this.deps.metrics.cacheHits.inc();
      this.log.log(`[solve] ${requestId} ${hit.status} cached=true`);
      return { ...hit, cached: true };
    }

    const began = performance.now();
    const report = this.compute(req, layoutHash);
    const ms = performance.now() - began;
    this.log.log(`[solve] ${requestId} ${report.status}${report.status === "solved" ? ` steps=${report.steps}` : ""} ms=${ms.toFixed(2)} cached=false`);

    await this.store(key, report);
    return report;
  }

  private compute(req: SolveRequest, layoutHash: string): SolveReport {
    const { metrics } = this.deps;
    return tracer.startActiveSpan("maze.solve", (span: Span): SolveReport => {
      const began = performance.now();
      const record = (outcome: Outcome) => {
        metrics.solves.inc({ outcome });
        metrics.solveDuration.observe({ outcome }, performance.now() - began);
        span.setAttribute("maze.outcome", outcome);
      };
      span.setAttribute("maze.layout_hash", layoutHash);
      try {
        const s = solveDetailed(req.maze, { allowDirect: req.allowDirect });
        metrics.frontierExpanded.observe(s.frontier.start.expanded);
        metrics.frontierExpanded.observe(s.frontier.end.expanded);
        span.setAttribute("maze.steps", s.steps);
        record("solved");
        return { status: "solved", steps: s.steps, breach: s.breach, layoutHash, cached: false };
      } catch (err) {
        if (err instanceof NoSolutionError) {
          record("no_solution");
          return { status: "no_solution", layoutHash, cached: false };
        }
        if (err instanceof InvalidMazeError) record("invalid");
        if (err instanceof Error) span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR });
        throw err;
      } finally {
        span.end();
      }
    });
  }

  private async lookup(key: string): Promise<SolveReport | null> {
    try {
      return await this.deps.cache.get(key);
    } catch (err) {
      this.log.warn(`[cache] get ${key} failed: ${String(err)}`);
      return null;
    }
  }

  private async store(key: string, report: SolveReport): Promise<void> {
    try {
      await this.deps.cache.set(key, report);
    } catch (err) {
      this.log.warn(`[cache] set ${key} failed: ${String(err)}`);
    }
  }
}

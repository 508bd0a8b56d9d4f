import { Registry, collectDefaultMetrics, Counter, Histogram } from "prom-client";

export type Outcome = "solved" | "no_solution" | "invalid";

export type SolveMetrics = {
  registry: Registry;
  solveDuration: Histogram<"outcome">;
  solves: Counter<"outcome">;
  cacheHits: Counter;
  frontierExpanded: Histogram;
};

export function createMetrics(registry = new Registry(), withDefaults = true): SolveMetrics {
  if (withDefaults) collectDefaultMetrics({ register: registry });
  return {
    registry,
    solveDuration: new Histogram({ name: "solve_duration_ms", help: "Solve duration", labelNames: ["outcome"], buckets: [0.5, 1, 2, 4, 8, 16, 32, 64, 128], registers: [registry] }),
    solves: new Counter({ name: "solves_total", help: "Solves by outcome", labelNames: ["outcome"], registers: [registry] }),
    cacheHits: new Counter({ name: "solve_cache_hits_total", help: "Solves answered from cache", registers: [registry] }),
    frontierExpanded: new Histogram({ name: "frontier_tiles_expanded", help: "Tiles expanded per frontier run", buckets: [16, 64, 256, 1024, 4096, 16384, 65536, 262144], registers: [registry] })
  };
}

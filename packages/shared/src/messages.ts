import { z } from "zod";

/** Wire-level contracts (versioned). */
export const TileValue = z.union([z.literal(0), z.literal(1)]);
export type TileValue = z.infer<typeof TileValue>;

// Shape only: emptiness and ragged rows are the Grid's call.
export const MazeRows = z.array(z.array(TileValue));
export type MazeRows = z.infer<typeof MazeRows>;

export const PositionMsg = z.object({
  row: z.number().int().nonnegative(),
  col: z.number().int().nonnegative()
});
export type PositionMsg = z.infer<typeof PositionMsg>;

export const SolveRequest = z.object({
  maze: MazeRows,
  allowDirect: z.boolean().default(false)
});
export type SolveRequest = z.infer<typeof SolveRequest>;

export const SolveReport = z.discriminatedUnion("status", [
  z.object({
    status: z.literal("solved"),
    steps: z.number().int().positive(),
    breach: PositionMsg.nullable(),
    layoutHash: z.string(),
    cached: z.boolean()
  }),
  z.object({
    status: z.literal("no_solution"),
    layoutHash: z.string(),
    cached: z.boolean()
  })
]);
export type SolveReport = z.infer<typeof SolveReport>;

export const MazeKind = z.enum(["maze", "random"]);
export type MazeKind = z.infer<typeof MazeKind>;

/** Largest generated side; 499 x 499 stays within the service's default tile limit. */
export const MAX_SIDE = 499;

// Query strings arrive as text, hence the coercions.
export const GenerateQuery = z.object({
  height: z.coerce.number().int().min(1).max(MAX_SIDE).default(15),
  width: z.coerce.number().int().min(1).max(MAX_SIDE).default(15),
  seed: z.string().regex(/^[0-9a-f]{8,64}$/i).optional(),
  density: z.coerce.number().min(0).max(1).default(0.3),
  loopiness: z.coerce.number().min(0).max(1).default(0.08)
});
export type GenerateQuery = z.infer<typeof GenerateQuery>;

export const GeneratedMaze = z.object({
  kind: MazeKind,
  seed: z.string(),
  layoutHash: z.string(),
  maze: MazeRows
});
export type GeneratedMaze = z.infer<typeof GeneratedMaze>;

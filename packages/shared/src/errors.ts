export type ApiResult<T> = { code: number; message: string; data?: T };
export const ok = <T>(data: T): ApiResult<T> => ({ code: 0, message: "OK", data });

export const ERR = {
  INVALID_MAZE: 1001,
  NO_SOLUTION: 1002,
  MAZE_TOO_LARGE: 1003,
  INVALID_PARAM: 1004,
  INTERNAL: 1005
} as const;

/** Base of every maze-domain failure; `status` is the HTTP status the service answers with. */
export class MazeError extends Error {
  constructor(public code: number, message: string, public status = 400) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidMazeError extends MazeError {
  constructor(message: string) {
    super(ERR.INVALID_MAZE, message, 400);
  }
}

/** No single converted wall tile joins the two corners. An expected outcome, not a crash. */
export class NoSolutionError extends MazeError {
  constructor(public height: number, public width: number, public wallCount: number) {
    super(
      ERR.NO_SOLUTION,
      `no route from (0,0) to (${height - 1},${width - 1}) through one broken wall (${wallCount} walls tried)`,
      422
    );
  }
}

export class MazeTooLargeError extends MazeError {
  constructor(public tiles: number, public limit: number) {
    super(ERR.MAZE_TOO_LARGE, `maze has ${tiles} tiles, limit is ${limit}`, 413);
  }
}

/** A request parameter the solver or generator cannot take. */
export class InvalidParamError extends MazeError {
  constructor(message: string) {
    super(ERR.INVALID_PARAM, message, 400);
  }
}

export const fail = (err: MazeError): ApiResult<never> => ({ code: err.code, message: err.message });

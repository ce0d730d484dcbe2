import express, { type NextFunction, type Request, type Response } from "express";
import { healthRouter } from "./routes/health.js";
import { createRoomsRouter, type RoomsRouterDeps } from "./routes/rooms.js";
import { PartialBatchError, SchedulingError, type SchedulingErrorCode } from "./services/errors.js";

const STATUS_BY_CODE: Record<SchedulingErrorCode, number> = {
  room_not_found: 404,
  event_not_found: 404,
  no_active_meeting: 400,
  conflict: 409,
  invalid_argument: 400,
  provider_unavailable: 503,
  provider_rejected: 502,
};

export function createApp(deps: RoomsRouterDeps) {
  const app = express();

  app.use(express.urlencoded({ extended: false }));
  app.use(express.json());

  app.use(healthRouter);
  app.use(createRoomsRouter(deps));

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SchedulingError) {
      const body: Record<string, unknown> = { error: error.message, code: error.code };
      if (error instanceof PartialBatchError) {
        body.count = error.created;
        body.skipped = error.skipped;
      }
      return res.status(STATUS_BY_CODE[error.code]).json(body);
    }

    console.error("Unhandled request error", { method: req.method, path: req.path, error });
    return res.status(500).json({ error: "Internal server error" });
  });

  return app;
}

import type { Application, Request, Response } from "express";
import { z } from "zod";
import * as config from "./config.ts";
import { type Logger } from "./logger.ts";
import {
  COVER_OPENING,
  COVER_CLOSING,
  COVER_STOPPED,
} from "../shared/cover-state.ts";
import type { CoverEvent, CoverController } from "./cover-controller.ts";
import type { CoverRegistry } from "./cover-registry.ts";
import type { CalibrationService } from "./calibration-service.ts";
import type { CalibrationStore } from "./calibration-store.ts";
import {
  CalibrationInProgressError,
  CoverBusyError,
  CoverCommandError,
  InvalidRequestError,
  NotFoundError,
} from "./errors.ts";

declare global {
  namespace Express {
    interface Locals {
      coverRegistry: CoverRegistry;
      calibration: CalibrationService;
      calibrationStore: CalibrationStore;
      logger: Logger;
    }
  }
}

const positionBody = z.object({
  position: z.number().min(0).max(100),
});

const positionStateBody = z.object({
  positionState: z.union([
    z.literal(COVER_CLOSING),
    z.literal(COVER_OPENING),
    z.literal(COVER_STOPPED),
  ]),
});

const travelTime = z
  .number()
  .min(config.MIN_MANUAL_TRAVEL_TIME)
  .max(config.MAX_MANUAL_TRAVEL_TIME);

const manualCalibrationBody = z
  .object({
    openTime: travelTime.optional(),
    closeTime: travelTime.optional(),
  })
  .refine(
    (body) => body.openTime !== undefined || body.closeTime !== undefined,
    { message: "openTime or closeTime is required" }
  );

const startCalibrationBody = z.object({
  coverId: z.string().min(1).optional(),
});

const wizardRequestBody = z.discriminatedUnion("type", [
  z.object({ type: z.literal("select-cover"), coverId: z.string().min(1) }),
  z.object({
    type: z.literal("select-direction"),
    direction: z.enum(["open", "close", "both"]),
    force: z.boolean().optional(),
  }),
  z.object({ type: z.literal("begin") }),
  z.object({ type: z.literal("stop-confirmed") }),
  z.object({ type: z.literal("save") }),
  z.object({ type: z.literal("calibrate-other") }),
  z.object({ type: z.literal("recalibrate") }),
  z.object({ type: z.literal("discard") }),
  z.object({ type: z.literal("cancel") }),
]);

function parseBody<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  body: unknown
): T {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new InvalidRequestError(
      result.error.issues
        .map((issue) =>
          issue.path.length > 0
            ? `${issue.path.join(".")}: ${issue.message}`
            : issue.message
        )
        .join("; ")
    );
  }
  return result.data;
}

function statusFor(err: unknown): number {
  if (err instanceof NotFoundError) {
    return 404;
  } else if (err instanceof InvalidRequestError) {
    return 400;
  } else if (
    err instanceof CoverBusyError ||
    err instanceof CalibrationInProgressError
  ) {
    return 409;
  } else if (err instanceof CoverCommandError) {
    return 502;
  }
  return 500;
}

function sendError(req: Request, res: Response, err: unknown): void {
  const status = statusFor(err);
  const message = err instanceof Error ? err.message : String(err);
  if (status >= 500) {
    req.app.locals.logger?.error(err instanceof Error ? err.stack : message);
  } else {
    req.app.locals.logger?.verbose(`${req.method} ${req.path}: ${message}`);
  }
  res.status(status).json({
    success: false,
    error: status === 500 ? "Internal error" : message,
  });
}

function handle(
  handler: (req: Request, res: Response) => Promise<void> | void
): (req: Request, res: Response) => Promise<void> {
  return async (req: Request, res: Response) => {
    try {
      await handler(req, res);
    } catch (err) {
      sendError(req, res, err);
    }
  };
}

function pollTimeout(raw: unknown): number {
  const timeout =
    typeof raw === "string" ? parseInt(raw, 10) : config.LONGPOLL_TIMEOUT;
  if (!Number.isFinite(timeout) || timeout < 0) {
    return config.LONGPOLL_TIMEOUT;
  }
  return Math.min(timeout, config.MAX_LONGPOLL_TIMEOUT);
}

function parseQueryState(raw: unknown): unknown {
  if (typeof raw !== "string") {
    return null;
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new InvalidRequestError("state must be JSON");
  }
}

export function configureApiRoutes(app: Application): void {
  function waitForCoverEvent(
    coverController: CoverController,
    timeout: number,
    callback: (timedOut: boolean, event: CoverEvent | null) => void
  ): void {
    let listener: ((event: CoverEvent) => void) | null = null;
    let timeoutHandle = setTimeout(() => {
      if (listener) {
        coverController.removeListener("change", listener);
      }
      callback(true, null);
    }, timeout);

    listener = (event: CoverEvent) => {
      if (listener) {
        coverController.removeListener("change", listener);
      }
      clearTimeout(timeoutHandle);
      callback(false, event);
    };

    coverController.addListener("change", listener);
  }

  app.get(
    "/api/1/covers",
    handle((req, res) => {
      res.json({
        success: true,
        covers: req.app.locals.coverRegistry
          .list()
          .map((coverController) => coverController.getState()),
      });
    })
  );

  app.get(
    "/api/1/covers/:id",
    handle((req, res) => {
      res.json({
        success: true,
        state: req.app.locals.coverRegistry.get(req.params.id).getState(),
      });
    })
  );

  app.get(
    "/api/1/covers/:id/poll-state",
    handle((req, res) => {
      const coverController = req.app.locals.coverRegistry.get(req.params.id);
      const queryState = JSON.stringify(parseQueryState(req.query.state));

      if (queryState !== JSON.stringify(coverController.getState())) {
        res.json({
          success: true,
          change: true,
          state: coverController.getState(),
        });
        return;
      }

      res.writeHead(200, {
        "Content-Type": "application/json",
      });
      res.write(""); // flush headers to the client
      waitForCoverEvent(
        coverController,
        pollTimeout(req.query.timeout),
        (timedOut, event) => {
          res.write(
            JSON.stringify({
              success: true,
              change: timedOut
                ? false
                : queryState !== JSON.stringify(event?.state),
              state: timedOut ? null : event?.state,
            })
          );
          res.end();
        }
      );
    })
  );

  app.post(
    "/api/1/covers/:id/position",
    handle(async (req, res) => {
      const { position } = parseBody(positionBody, req.body);
      const coverController = req.app.locals.coverRegistry.get(req.params.id);
      await coverController.setTargetPosition(position);
      res.json({ success: true, state: coverController.getState() });
    })
  );

  app.post(
    "/api/1/covers/:id/set-position-state",
    handle(async (req, res) => {
      const { positionState } = parseBody(positionStateBody, req.body);
      const coverController = req.app.locals.coverRegistry.get(req.params.id);

      switch (positionState) {
        case COVER_OPENING:
          await coverController.open();
          break;
        case COVER_CLOSING:
          await coverController.close();
          break;
        case COVER_STOPPED:
          await coverController.stop();
          break;
      }

      res.json({ success: true, state: coverController.getState() });
    })
  );

  app.put(
    "/api/1/covers/:id/calibration",
    handle(async (req, res) => {
      const body = parseBody(manualCalibrationBody, req.body);
      const coverController = req.app.locals.coverRegistry.get(req.params.id);
      await req.app.locals.calibrationStore.setManual(coverController.id, {
        open: body.openTime,
        close: body.closeTime,
      });
      await coverController.reloadCalibration();
      res.json({ success: true, state: coverController.getState() });
    })
  );

  app.get(
    "/api/1/calibration",
    handle((req, res) => {
      res.json({ success: true, runs: req.app.locals.calibration.list() });
    })
  );

  app.post(
    "/api/1/calibration",
    handle(async (req, res) => {
      const { coverId } = parseBody(startCalibrationBody, req.body);
      const wizard = await req.app.locals.calibration.start(coverId);
      req.app.locals.logger?.info(
        `Calibrating ${coverId ?? "a cover"} (${wizard.id})`
      );
      res.json({ success: true, run: wizard });
    })
  );

  app.get(
    "/api/1/calibration/:runId",
    handle((req, res) => {
      res.json({
        success: true,
        run: req.app.locals.calibration.get(req.params.runId),
      });
    })
  );

  app.post(
    "/api/1/calibration/:runId/input",
    handle(async (req, res) => {
      const request = parseBody(wizardRequestBody, req.body);
      await req.app.locals.calibration.send(req.params.runId, request);
      res.json({
        success: true,
        run: req.app.locals.calibration.get(req.params.runId),
      });
    })
  );

  app.delete(
    "/api/1/calibration/:runId",
    handle(async (req, res) => {
      await req.app.locals.calibration.cancel(req.params.runId);
      res.json({
        success: true,
        run: req.app.locals.calibration.get(req.params.runId),
      });
    })
  );
}

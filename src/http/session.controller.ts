import { NextFunction, Request, Response, Router } from "express";
import { Logger } from "../config/logger";
import { IntakeService } from "../intake/intake.service";
import { SessionNotFound, errorMessage } from "../shared/errors";

interface SessionControllerDeps {
  intakeService: IntakeService;
  logger: Logger;
}

type AsyncHandler = (request: Request, response: Response) => Promise<void>;

function readText(body: unknown): string | null {
  if (typeof body !== "object" || body === null || !("text" in body)) {
    return null;
  }
  return typeof body.text === "string" ? body.text : null;
}

function readConsent(body: unknown): boolean | null {
  if (typeof body !== "object" || body === null || !("consent" in body)) {
    return null;
  }
  return typeof body.consent === "boolean" ? body.consent : null;
}

export function buildSessionController(deps: SessionControllerDeps): Router {
  const router = Router();

  const handle =
    (handler: AsyncHandler) =>
    (request: Request, response: Response, next: NextFunction): void => {
      handler(request, response).catch((error: unknown) => {
        if (error instanceof SessionNotFound) {
          response.status(404).json({ ok: false, error: "Session not found" });
          return;
        }
        deps.logger.error("http.session.request_failed", {
          method: request.method,
          path: request.path,
          error: errorMessage(error),
        });
        next(error);
      });
    };

  router.post(
    "/",
    handle(async (_request, response) => {
      const result = deps.intakeService.start();
      response.status(201).json(result);
    }),
  );

  router.get(
    "/:id",
    handle(async (request, response) => {
      response.status(200).json(deps.intakeService.snapshot(request.params.id));
    }),
  );

  router.post(
    "/:id/messages",
    handle(async (request, response) => {
      const text = readText(request.body);
      if (text === null) {
        response.status(400).json({ ok: false, error: "Body must contain a string `text`" });
        return;
      }
      const result = await deps.intakeService.handleMessage(request.params.id, text);
      response.status(200).json(result);
    }),
  );

  router.put(
    "/:id/consent",
    handle(async (request, response) => {
      const consent = readConsent(request.body);
      if (consent === null) {
        response.status(400).json({ ok: false, error: "Body must contain a boolean `consent`" });
        return;
      }
      const snapshot = await deps.intakeService.setConsent(request.params.id, consent);
      response.status(200).json(snapshot);
    }),
  );

  router.post(
    "/:id/save",
    handle(async (request, response) => {
      const result = await deps.intakeService.save(request.params.id);
      response.status(200).json(result);
    }),
  );

  router.post(
    "/:id/reset",
    handle(async (request, response) => {
      const result = await deps.intakeService.reset(request.params.id);
      response.status(200).json(result);
    }),
  );

  return router;
}

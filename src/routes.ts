import express from "express";
import type { ArtifactCache } from "./artifacts";
import { runAssessment } from "./assessment";
import { GLUCOSE_SCALE, GLUCOSE_THRESHOLDS } from "./categorize";
import {
  describeError,
  PredictionError,
  ScreeningError,
  ValidationError,
} from "./errors";
import {
  HISTORY_DISPLAY_LIMIT,
  type SessionContext,
  type SessionRegistry,
} from "./history";
import { FIELD_SPECS } from "./input";
import { featureContributions } from "./predict";
import { criticalGlucoseWarning, recommendationsFor } from "./recommendations";
import {
  SESSION_HEADER,
  type ArtifactStatus,
  type ErrorResponse,
  type HistoryResponse,
  type MetaResponse,
  type PredictResponse,
} from "./api-types";

export { SESSION_HEADER };

export type ApiDeps = {
  artifacts: ArtifactCache;
  sessions: SessionRegistry;
  now?: () => Date;
};

export type ApiResponse<T> =
  | { ok: true; status: number; body: T }
  | { ok: false; status: number; body: ErrorResponse };

function ok<T>(body: T): ApiResponse<T> {
  return { ok: true, status: 200, body };
}

function fail(status: number, body: ErrorResponse): ApiResponse<never> {
  return { ok: false, status, body };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function artifactStatus(deps: ApiDeps): ArtifactStatus {
  const state = deps.artifacts.get();
  return state.status === "ready"
    ? { ready: true, message: null }
    : { ready: false, message: state.error.message };
}

export function handleMeta(deps: ApiDeps): ApiResponse<MetaResponse> {
  return ok({
    fields: [...FIELD_SPECS],
    glucoseScale: [...GLUCOSE_SCALE],
    glucoseThresholds: [...GLUCOSE_THRESHOLDS],
    historyLimit: HISTORY_DISPLAY_LIMIT,
    artifacts: artifactStatus(deps),
  });
}

/**
 * POST /api/predict with `{ input: { glucose: 120, ... } }`.
 *
 * A bare field object (without the `input` wrapper) is accepted as well.
 */
export function handlePredict(
  session: SessionContext,
  payload: unknown,
  deps: ApiDeps
): ApiResponse<PredictResponse> {
  if (!isRecord(payload)) {
    return fail(400, { error: "Payload tidak valid; diharapkan objek JSON." });
  }
  const fields = isRecord(payload.input) ? payload.input : payload;
  const artifacts = deps.artifacts.get();

  try {
    const entry = runAssessment(session, artifacts, fields, deps.now?.());
    return ok({
      entry,
      recommendations: recommendationsFor(entry.input.glucose),
      warning: criticalGlucoseWarning(entry.input.glucose),
      featureContributions:
        artifacts.status === "ready"
          ? featureContributions(artifacts.model)
          : null,
    });
  } catch (err) {
    if (err instanceof ValidationError) {
      return fail(400, {
        error: err.message,
        code: err.code,
        field: err.field,
      });
    }
    if (err instanceof PredictionError) {
      console.error(
        `Prediction failed for session ${session.id}: ${err.message}`
      );
      return fail(422, { error: err.message, code: err.code });
    }
    if (err instanceof ScreeningError) {
      return fail(503, { error: err.message, code: err.code });
    }
    throw err;
  }
}

function parseLimit(raw: unknown): number {
  const n = Number.parseInt(String(raw ?? ""), 10);
  if (!Number.isFinite(n) || n < 1) return HISTORY_DISPLAY_LIMIT;
  return Math.min(n, HISTORY_DISPLAY_LIMIT);
}

export function handleHistory(
  session: SessionContext,
  limitRaw: unknown
): ApiResponse<HistoryResponse> {
  const limit = parseLimit(limitRaw);
  return ok({
    entries: session.history.recent(limit),
    total: session.history.size,
    limit,
  });
}

export function handleClearHistory(
  session: SessionContext
): ApiResponse<{ cleared: number }> {
  const cleared = session.history.size;
  session.history.clear();
  return ok({ cleared });
}

export function handleHealth(
  deps: ApiDeps
): ApiResponse<{ ok: boolean; artifacts: ArtifactStatus }> {
  return ok({ ok: true, artifacts: artifactStatus(deps) });
}

/**
 * Status carried by errors from the body parser (`http-errors`), else 500.
 */
function errorStatus(err: unknown): number {
  if (
    typeof err === "object" &&
    err !== null &&
    "status" in err &&
    typeof err.status === "number"
  ) {
    return err.status;
  }
  return 500;
}

/**
 * JSON endpoints. Every response, errors included, carries the caller's
 * session id so the page can send it back.
 */
export function createApiRouter(deps: ApiDeps): express.Router {
  const router = express.Router();
  router.use("/api", express.json());

  function attachSession(
    req: express.Request,
    res: express.Response
  ): SessionContext {
    const session = deps.sessions.resolve(req.header(SESSION_HEADER));
    res.setHeader(SESSION_HEADER, session.id);
    return session;
  }

  function withSession(
    handler: (
      session: SessionContext,
      req: express.Request
    ) => ApiResponse<unknown>
  ): express.RequestHandler {
    return (req, res) => {
      const session = attachSession(req, res);
      try {
        const { status, body } = handler(session, req);
        res.status(status).json(body);
      } catch (err) {
        console.error("Unhandled API error:", err);
        res.status(500).json({
          error: "Internal server error",
          message: describeError(err),
        });
      }
    };
  }

  router.get("/healthz", withSession(() => handleHealth(deps)));
  router.get("/api/meta", withSession(() => handleMeta(deps)));
  router.post(
    "/api/predict",
    withSession((session, req) => handlePredict(session, req.body, deps))
  );
  router.get(
    "/api/history",
    withSession((session, req) => handleHistory(session, req.query.limit))
  );
  router.delete(
    "/api/history",
    withSession((session) => handleClearHistory(session))
  );

  // Body parser failures: malformed JSON, oversized payloads.
  const onError: express.ErrorRequestHandler = (err, req, res, next) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    attachSession(req, res);

    const status = errorStatus(err);
    if (status >= 500) {
      console.error("Unhandled API error:", err);
      res.status(500).json({ error: "Internal server error" });
      return;
    }
    const body: ErrorResponse = {
      error:
        err instanceof SyntaxError
          ? "Payload bukan JSON yang valid."
          : describeError(err),
    };
    res.status(status).json(body);
  };
  router.use("/api", onError);

  return router;
}

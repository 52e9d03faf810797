import { describe, expect, test } from "vitest";
import { SESSION_HEADER } from "./api-types";
import { ScreeningClient, submitAndRefresh, type FetchLike } from "./client";
import { defaultPatientInput } from "./input";

type Reply = { status: number; body: string; session?: string };

function jsonReply(status: number, body: unknown, session?: string): Reply {
  return { status, body: JSON.stringify(body), session };
}

/**
 * Answers by `METHOD path` and records the session header of each request.
 */
function fakeFetch(routes: Record<string, Reply>) {
  const seen: Array<{ route: string; session: string | null }> = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const route = `${init?.method ?? "GET"} ${String(input)}`;
    const headers = new Headers(init?.headers);
    seen.push({ route, session: headers.get(SESSION_HEADER) });

    const reply = routes[route];
    if (!reply) return new Response("not found", { status: 404 });
    const responseHeaders: Record<string, string> = {};
    if (reply.session) responseHeaders[SESSION_HEADER] = reply.session;
    return new Response(reply.body, {
      status: reply.status,
      headers: responseHeaders,
    });
  };
  return { fetchImpl, seen };
}

const PREDICTION = {
  entry: { id: "entry-1", input: defaultPatientInput() },
  recommendations: { tier: "normal" },
  warning: null,
  featureContributions: null,
};

describe("ScreeningClient", () => {
  test("adopts the issued session id and sends it back", async () => {
    const { fetchImpl, seen } = fakeFetch({
      "GET /api/meta": jsonReply(200, { historyLimit: 5 }, "session-abc-123"),
      "GET /api/history": jsonReply(200, { entries: [], total: 0, limit: 5 }),
    });
    const client = new ScreeningClient({ fetchImpl });

    await client.meta();
    expect(client.session).toBe("session-abc-123");
    await client.history();
    expect(seen).toEqual([
      { route: "GET /api/meta", session: null },
      { route: "GET /api/history", session: "session-abc-123" },
    ]);
  });

  test("throws the server's error message", async () => {
    const { fetchImpl } = fakeFetch({
      "POST /api/predict": jsonReply(400, {
        error: "Glukosa wajib diisi.",
        field: "glucose",
      }),
    });
    const client = new ScreeningClient({ fetchImpl });
    await expect(client.predict(defaultPatientInput())).rejects.toThrow(
      "Glukosa wajib diisi."
    );
  });

  test("non-JSON error bodies fall back to the status", async () => {
    const { fetchImpl } = fakeFetch({
      "GET /api/history": { status: 502, body: "<html>Bad Gateway</html>" },
    });
    const client = new ScreeningClient({ fetchImpl });
    await expect(client.history()).rejects.toThrow("HTTP 502");
  });

  test("baseUrl is prefixed without a double slash", async () => {
    const { fetchImpl, seen } = fakeFetch({
      "DELETE http://localhost:3000/api/history": jsonReply(200, {
        cleared: 0,
      }),
    });
    const client = new ScreeningClient({
      baseUrl: "http://localhost:3000/",
      fetchImpl,
    });
    await client.clearHistory();
    expect(seen[0].route).toBe("DELETE http://localhost:3000/api/history");
  });
});

describe("submitAndRefresh", () => {
  test("returns the prediction and the reloaded history", async () => {
    const { fetchImpl } = fakeFetch({
      "POST /api/predict": jsonReply(200, PREDICTION),
      "GET /api/history": jsonReply(200, {
        entries: [{ id: "entry-1" }],
        total: 1,
        limit: 5,
      }),
    });
    const outcome = await submitAndRefresh(
      new ScreeningClient({ fetchImpl }),
      defaultPatientInput()
    );
    expect(outcome.error).toBeNull();
    expect(outcome.prediction).toEqual(PREDICTION);
    expect(outcome.history).toEqual([{ id: "entry-1" }]);
  });

  test("a failed history reload keeps the prediction", async () => {
    const { fetchImpl } = fakeFetch({
      "POST /api/predict": jsonReply(200, PREDICTION),
      "GET /api/history": jsonReply(500, { error: "Internal server error" }),
    });
    const outcome = await submitAndRefresh(
      new ScreeningClient({ fetchImpl }),
      defaultPatientInput()
    );
    expect(outcome).toEqual({
      prediction: PREDICTION,
      history: null,
      error: "Internal server error",
    });
  });

  test("a failed prediction skips the reload", async () => {
    const { fetchImpl, seen } = fakeFetch({
      "POST /api/predict": jsonReply(503, {
        error: "Berkas model tidak ada.",
        code: "ARTIFACT_LOAD_FAILED",
      }),
    });
    const outcome = await submitAndRefresh(
      new ScreeningClient({ fetchImpl }),
      defaultPatientInput()
    );
    expect(outcome).toEqual({
      prediction: null,
      history: null,
      error: "Berkas model tidak ada.",
    });
    expect(seen.map((s) => s.route)).toEqual(["POST /api/predict"]);
  });
});

/**
 * Browser-side client for the screening API.
 * Holds the session id the server issues and sends it back on every call.
 */

import {
  SESSION_HEADER,
  type HistoryResponse,
  type MetaResponse,
  type PredictResponse,
} from "./api-types";
import type { HistoryEntry, PatientInput } from "./types";

export type FetchLike = (
  input: RequestInfo | URL,
  init?: RequestInit
) => Promise<Response>;

type ScreeningClientOptions = {
  baseUrl?: string;
  fetchImpl?: FetchLike;
};

async function readJsonResponse(res: Response): Promise<unknown> {
  const text = await res.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

function errorMessage(body: unknown, status: number): string {
  if (
    typeof body === "object" &&
    body !== null &&
    "error" in body &&
    typeof body.error === "string"
  ) {
    return body.error;
  }
  return `HTTP ${status}`;
}

export class ScreeningClient {
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike;
  private sessionId: string | null = null;

  constructor({
    baseUrl = "",
    // Wrapped so browsers don't see `fetch` called on the client instance.
    fetchImpl = (input, init) => fetch(input, init),
  }: ScreeningClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/$/, "");
    this.fetchImpl = fetchImpl;
  }

  get session(): string | null {
    return this.sessionId;
  }

  /**
   * Sends one request and returns the parsed body.
   * Non-2xx responses throw with the server's `error` message.
   */
  async requestJson(path: string, init: RequestInit = {}): Promise<unknown> {
    const headers: Record<string, string> = { accept: "application/json" };
    if (this.sessionId) headers[SESSION_HEADER] = this.sessionId;
    if (init.body) headers["content-type"] = "application/json";

    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      ...init,
      headers,
    });
    const issued = res.headers.get(SESSION_HEADER);
    if (issued) this.sessionId = issued;

    const body = await readJsonResponse(res);
    if (!res.ok) throw new Error(errorMessage(body, res.status));
    return body;
  }

  async meta(): Promise<MetaResponse> {
    return (await this.requestJson("/api/meta")) as MetaResponse;
  }

  async predict(input: PatientInput): Promise<PredictResponse> {
    const body = await this.requestJson("/api/predict", {
      method: "POST",
      body: JSON.stringify({ input }),
    });
    return body as PredictResponse;
  }

  async history(): Promise<HistoryEntry[]> {
    const body = await this.requestJson("/api/history");
    return (body as HistoryResponse).entries;
  }

  async clearHistory(): Promise<void> {
    await this.requestJson("/api/history", { method: "DELETE" });
  }
}

export type SubmitOutcome = {
  prediction: PredictResponse | null;
  /** `null` when the reload was skipped or failed. */
  history: HistoryEntry[] | null;
  error: string | null;
};

function messageOf(e: unknown, fallback: string): string {
  return e instanceof Error ? e.message : fallback;
}

/**
 * Predicts, then reloads the history. A failed reload keeps the prediction.
 */
export async function submitAndRefresh(
  client: ScreeningClient,
  input: PatientInput
): Promise<SubmitOutcome> {
  let prediction: PredictResponse;
  try {
    prediction = await client.predict(input);
  } catch (e) {
    return {
      prediction: null,
      history: null,
      error: messageOf(e, "Gagal membuat prediksi"),
    };
  }

  try {
    return { prediction, history: await client.history(), error: null };
  } catch (e) {
    return {
      prediction,
      history: null,
      error: messageOf(e, "Gagal memuat riwayat"),
    };
  }
}

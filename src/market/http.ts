import { errorMessage } from "../utils/errors.js";
import { err, ok, type Result } from "./price-source.js";

export type FetchFn = (url: string, init?: RequestInit) => Promise<Response>;

export const DEFAULT_TIMEOUT_MS = 5_000;

export interface HttpOptions {
  fetchFn?: FetchFn;
  timeoutMs?: number;
  userAgent?: string;
}

/** GET a JSON document. Timeouts, non-2xx statuses and bad JSON all come back as `err`. */
export async function getJson(url: string, opts: HttpOptions = {}): Promise<Result<unknown>> {
  const fetchFn = opts.fetchFn ?? fetch;
  let res: Response;
  try {
    res = await fetchFn(url, {
      headers: {
        Accept: "application/json",
        "User-Agent": opts.userAgent ?? "leverage-desk/0.1",
      },
      signal: AbortSignal.timeout(opts.timeoutMs ?? DEFAULT_TIMEOUT_MS),
    });
  } catch (e) {
    return err(`request failed: ${errorMessage(e)}`);
  }

  if (!res.ok) {
    const body = await res.text().catch(() => "");
    return err(`HTTP ${res.status}${body ? `: ${body.slice(0, 200)}` : ""}`);
  }

  try {
    return ok(await res.json());
  } catch (e) {
    return err(`invalid JSON: ${errorMessage(e)}`);
  }
}

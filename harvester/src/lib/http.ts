import { FetchError, errorMessage } from "./errors";

export interface FetchRuntimeConfig {
  timeoutMs: number;
  userAgent: string;
}

export interface FetchedBody {
  status: number;
  ok: boolean;
  text: string;
}

/**
 * One request with the body read inside the same timeout: a server that sends headers
 * and then stalls mid-body still aborts after `timeoutMs`.
 */
export async function fetchBody(url: string, init: RequestInit, runtime: FetchRuntimeConfig): Promise<FetchedBody> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), runtime.timeoutMs);
  const headers = new Headers(init.headers);
  if (!headers.has("user-agent")) {
    headers.set("user-agent", runtime.userAgent);
  }
  if (!headers.has("accept-language")) {
    headers.set("accept-language", "en-US,en;q=0.9");
  }

  let status: number | undefined;
  try {
    const response = await fetch(url, {
      ...init,
      headers,
      redirect: "follow",
      signal: controller.signal
    });
    status = response.status;
    const text = await response.text();
    return { status: response.status, ok: response.ok, text };
  } catch (error) {
    const reason = controller.signal.aborted ? `timed out after ${runtime.timeoutMs}ms` : errorMessage(error);
    throw new FetchError(url, status === undefined ? reason : `body read failed: ${reason}`, status, { cause: error });
  } finally {
    clearTimeout(timeout);
  }
}

export async function fetchText(url: string, runtime: FetchRuntimeConfig): Promise<string> {
  const response = await fetchBody(
    url,
    { method: "GET", headers: { accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8" } },
    runtime
  );
  if (!response.ok) {
    throw new FetchError(url, `unexpected status ${response.status}`, response.status);
  }
  return response.text;
}

export async function postJson(url: string, body: unknown, runtime: FetchRuntimeConfig): Promise<unknown> {
  const response = await fetchBody(
    url,
    {
      method: "POST",
      headers: { accept: "application/json", "content-type": "application/json" },
      body: JSON.stringify(body)
    },
    runtime
  );
  if (!response.ok) {
    throw new FetchError(url, `unexpected status ${response.status}`, response.status);
  }
  try {
    const parsed: unknown = JSON.parse(response.text);
    return parsed;
  } catch (error) {
    throw new FetchError(url, "response is not valid JSON", response.status, { cause: error });
  }
}

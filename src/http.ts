import { errorMessage, isAbortError, ProviderError } from "./errors.js";

export const DEFAULT_TIMEOUT_MS = 60_000;

/** POSTs JSON and returns the decoded body. Non-2xx responses raise ProviderError with the status. */
export async function postJson(
  label: string,
  url: string,
  body: unknown,
  headers: Record<string, string>,
  timeoutMs: number = DEFAULT_TIMEOUT_MS,
): Promise<unknown> {
  let resp: Response;
  try {
    resp = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    if (isAbortError(err)) {
      throw new ProviderError(`${label} request timed out after ${timeoutMs}ms`, undefined, { cause: err });
    }
    throw new ProviderError(`${label} request failed: ${errorMessage(err)}`, undefined, { cause: err });
  }
  if (!resp.ok) {
    const text = await resp.text();
    throw new ProviderError(`${label} error (${resp.status}): ${text.slice(0, 500)}`, resp.status);
  }
  return resp.json();
}

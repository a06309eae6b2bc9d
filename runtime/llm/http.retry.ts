export interface RetryPolicy {
  readonly timeoutMs: number;
  readonly maxAttempts: number;
  readonly backoffMs: readonly number[];
}

export interface JsonRequest {
  readonly label: string;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: unknown;
  readonly extractText: (payload: unknown) => string | null;
}

const TRANSIENT_STATUSES = new Set([429, 500, 502, 503, 504]);

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function classifyHttpStatus(
  label: string,
  status: number
): { readonly code: string; readonly isTransient: boolean } {
  if (status === 401 || status === 403) {
    return { code: `${label}_PERMANENT_HTTP_${status}`, isTransient: false };
  }
  if (TRANSIENT_STATUSES.has(status)) {
    return { code: `${label}_TRANSIENT_HTTP_${status}`, isTransient: true };
  }
  return { code: `${label}_HTTP_${status}`, isTransient: false };
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && /abort/i.test(error.name);
}

/**
 * POSTs a JSON body and extracts the reply text. Timeouts, transient statuses and network
 * failures are retried on the policy's backoff schedule; everything else fails at once.
 */
export async function postJsonWithRetry(policy: RetryPolicy, request: JsonRequest): Promise<string> {
  const { label } = request;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt += 1) {
    if (attempt > 1) {
      const delayMs = policy.backoffMs[Math.min(attempt - 2, policy.backoffMs.length - 1)] ?? 0;
      if (delayMs > 0) {
        await sleep(delayMs);
      }
    }

    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), policy.timeoutMs);

    try {
      const response = await fetch(request.url, {
        method: "POST",
        headers: { "content-type": "application/json", ...request.headers },
        body: JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const { code, isTransient } = classifyHttpStatus(label, response.status);
        if (isTransient && attempt < policy.maxAttempts) {
          continue;
        }
        throw new Error(`${code}: request failed`);
      }

      const payload = (await response.json()) as unknown;
      const text = request.extractText(payload);
      if (!text) {
        throw new Error(`${label}_BAD_RESPONSE: missing text response`);
      }
      return text;
    } catch (error) {
      if (isAbortError(error)) {
        if (attempt < policy.maxAttempts) {
          continue;
        }
        throw new Error(`${label}_TIMEOUT`);
      }

      const message = error instanceof Error ? error.message : String(error);
      const isTransientError =
        message.includes(`${label}_TRANSIENT_HTTP_`) || /fetch failed/i.test(message);
      if (isTransientError && attempt < policy.maxAttempts) {
        continue;
      }
      if (message.startsWith(`${label}_`)) {
        throw new Error(message);
      }
      throw new Error(`${label}_REQUEST_FAILED: ${message}`);
    } finally {
      clearTimeout(timer);
    }
  }

  throw new Error(`${label}_REQUEST_FAILED: retries exhausted`);
}

export function asObject(value: unknown): Record<string, unknown> | null {
  if (typeof value === "object" && value !== null && !Array.isArray(value)) {
    return value as Record<string, unknown>;
  }
  return null;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type Deadline = {
  signal: AbortSignal | undefined;
  dispose: () => void;
};

export const MAX_TIMER_MS = 2_147_483_647;

/**
 * One abort signal for a whole invocation. Every request issued under it,
 * including every page of a listing, shares the same window.
 */
export function createDeadline(timeoutMs: number): Deadline {
  const normalized = normalizeTimerMs(timeoutMs);
  if (normalized === 0) {
    return { signal: undefined, dispose: () => {} };
  }

  const controller = new AbortController();
  const timer = setTimeout(() => {
    controller.abort(new Error(`Request deadline of ${normalized}ms exceeded`));
  }, normalized);

  return {
    signal: controller.signal,
    dispose: () => clearTimeout(timer)
  };
}

/**
 * Reads at most `limit` bytes of the body and cancels the remainder. A body
 * that fails mid-read yields the bytes that arrived before the failure.
 */
export async function readLimited(response: Response, limit: number): Promise<string> {
  const body = response.body;
  if (!body) {
    return "";
  }
  const reader = body.getReader();
  const chunks: Uint8Array[] = [];
  let total = 0;
  try {
    while (total < limit) {
      const next = await reader.read().catch(() => undefined);
      if (!next || next.done) break;
      const { value } = next;
      const remaining = limit - total;
      const chunk: Uint8Array = value.byteLength > remaining ? value.subarray(0, remaining) : value;
      chunks.push(chunk);
      total += chunk.byteLength;
    }
  } finally {
    try {
      await reader.cancel();
    } catch (_error) {
      // ignore best-effort body cancellation failures
    }
  }
  return new TextDecoder().decode(Buffer.concat(chunks));
}

/**
 * Drains the body so the connection can be reused. The status has already
 * been accepted, so a body that breaks while draining does not fail the call.
 */
export async function discardBody(response: Response): Promise<void> {
  const body = response.body;
  if (!body) {
    return;
  }
  const reader = body.getReader();
  for (;;) {
    const next = await reader.read().catch(() => undefined);
    if (!next || next.done) return;
  }
}

export function normalizeTimerMs(value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    return 0;
  }
  if (value > MAX_TIMER_MS) {
    return MAX_TIMER_MS;
  }
  return Math.floor(value);
}

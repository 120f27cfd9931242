export type ProbeResult = { ok: true; status: number } | { ok: false; status?: number; error: string };

/** One liveness request. Must resolve, never reject. */
export type LivenessProbe = (url: string, timeoutMs: number) => Promise<ProbeResult>;

function describeFetchError(e: unknown, timeoutMs: number): string {
  if (!(e instanceof Error)) return String(e);
  if (e.name === "TimeoutError" || e.name === "AbortError") return `no response within ${timeoutMs}ms`;
  // undici wraps socket errors: TypeError("fetch failed", { cause })
  if (e.cause instanceof Error) {
    const code = "code" in e.cause && typeof e.cause.code === "string" ? e.cause.code : null;
    return code ?? e.cause.message;
  }
  return e.message;
}

/** GET the URL; any 2xx counts, the body is discarded unread. */
export const httpProbe: LivenessProbe = async (url, timeoutMs) => {
  try {
    const res = await fetch(url, { method: "GET", signal: AbortSignal.timeout(timeoutMs) });
    await res.body?.cancel();
    if (res.ok) return { ok: true, status: res.status };
    return { ok: false, status: res.status, error: `HTTP ${res.status}` };
  } catch (e) {
    return { ok: false, error: describeFetchError(e, timeoutMs) };
  }
};

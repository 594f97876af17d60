import { AsyncLocalStorage } from "node:async_hooks";

export type TraceContext = {
  request_id: string;
  correlation_id: string;
  job_id?: string;
  source: "http" | "worker";
};

export type LoggerLike = {
  debug: (obj: unknown, msg?: string) => void;
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
};

export const traceContextStorage = new AsyncLocalStorage<TraceContext>();

export function getTraceContext(): TraceContext | undefined {
  return traceContextStorage.getStore();
}

export function runWithTraceContext<T>(
  ctx: TraceContext,
  fn: () => Promise<T>,
): Promise<T> {
  return traceContextStorage.run(ctx, fn);
}

/** Merges the active trace ids into a structured log record. */
export function traced(fields: Record<string, unknown>): Record<string, unknown> {
  const ctx = getTraceContext();
  if (!ctx) return fields;
  return {
    request_id: ctx.request_id,
    correlation_id: ctx.correlation_id,
    ...(ctx.job_id ? { job_id: ctx.job_id } : {}),
    ...fields,
  };
}

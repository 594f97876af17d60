import { randomUUID } from "node:crypto";

import type { FastifyInstance, FastifyRequest } from "fastify";

import { getTraceContext, traceContextStorage } from "./traceContext.js";

const TRACE_ID_RE = /^[A-Za-z0-9._:-]+$/;

type RequestTraceState = {
  request_id: string;
  start_ns: bigint;
  response_logged: boolean;
};

const requestTraceState = new WeakMap<FastifyRequest, RequestTraceState>();

function readHeaderString(raw: unknown): string | undefined {
  if (Array.isArray(raw)) {
    const first = raw[0];
    return typeof first === "string" ? first : undefined;
  }
  return typeof raw === "string" ? raw : undefined;
}

function asValidTraceId(raw: unknown): string | undefined {
  const value = readHeaderString(raw)?.trim();
  if (!value) return undefined;
  if (value.length < 8 || value.length > 128) return undefined;
  if (!TRACE_ID_RE.test(value)) return undefined;
  return value;
}

function routePattern(req: FastifyRequest): string {
  return req.routeOptions?.url ?? "unknown";
}

function stateFor(req: FastifyRequest): RequestTraceState {
  let state = requestTraceState.get(req);
  if (!state) {
    state = { request_id: `req_${randomUUID()}`, start_ns: process.hrtime.bigint(), response_logged: false };
    requestTraceState.set(req, state);
  }
  return state;
}

export function registerTraceHooks(app: FastifyInstance): void {
  app.addHook("onRequest", (req, _reply, done) => {
    const request_id = asValidTraceId(req.headers["x-request-id"]) ?? `req_${randomUUID()}`;
    const correlationHeader = asValidTraceId(req.headers["x-correlation-id"]);
    const correlation_id = correlationHeader ? `ext_${correlationHeader}` : request_id;

    requestTraceState.set(req, {
      request_id,
      start_ns: process.hrtime.bigint(),
      response_logged: false,
    });

    req.log.info({
      event: "http.request",
      request_id,
      correlation_id,
      method: req.method,
      route: routePattern(req),
    });

    traceContextStorage.run({ request_id, correlation_id, source: "http" }, done);
  });

  app.addHook("onSend", async (req, reply, payload) => {
    const ctx = getTraceContext();
    const state = stateFor(req);
    const request_id = ctx?.request_id ?? state.request_id;
    const correlation_id = ctx?.correlation_id ?? request_id;

    reply.header("x-request-id", request_id);
    reply.header("x-correlation-id", correlation_id);

    if (!state.response_logged) {
      const duration_ms = Number((process.hrtime.bigint() - state.start_ns) / 1000000n);
      req.log.info({
        event: "http.response",
        request_id,
        correlation_id,
        status_code: reply.statusCode,
        duration_ms,
      });
      state.response_logged = true;
    }
    return payload;
  });

  app.addHook("onError", (req, reply, err, done) => {
    const ctx = getTraceContext();
    const request_id = ctx?.request_id ?? stateFor(req).request_id;
    req.log.error({
      event: "http.error",
      request_id,
      correlation_id: ctx?.correlation_id ?? request_id,
      status_code: reply.statusCode,
      err_name: err.name,
      err_message: err.message,
    });
    done();
  });
}

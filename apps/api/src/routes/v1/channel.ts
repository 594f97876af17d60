import { randomUUID } from "node:crypto";

import type { FastifyInstance } from "fastify";
import type { RawData, WebSocket } from "ws";

import { CHANNEL_PATH, ChannelErrorCode, parseClientMessage } from "@rendercache/shared";

import type { CorrelationRegistry } from "../../pipeline/correlationRegistry.js";
import {
  ChannelState,
  NotificationChannel,
  type ChannelTransport,
} from "../../pipeline/notificationChannel.js";
import type { RenderService } from "../../pipeline/renderService.js";

function wsTransport(socket: WebSocket): ChannelTransport {
  return {
    get isOpen() {
      return socket.readyState === socket.OPEN;
    },
    send(text: string): Promise<void> {
      return new Promise((resolve, reject) => {
        socket.send(text, (err) => (err ? reject(err) : resolve()));
      });
    },
    close(code: number, reason: string): void {
      socket.close(code, reason);
    },
  };
}

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  return Buffer.from(data).toString("utf8");
}

export async function registerChannelRoutes(
  app: FastifyInstance,
  service: RenderService,
  registry: CorrelationRegistry<NotificationChannel>,
): Promise<void> {
  app.get(CHANNEL_PATH, { websocket: true }, (socket, req) => {
    const channel = new NotificationChannel(`ch_${randomUUID()}`, wsTransport(socket), req.log);
    let subscribing = false;
    req.log.info({ event: "channel.opened", channel_id: channel.channel_id });

    socket.on("message", (data: RawData, isBinary: boolean) => {
      if (subscribing || channel.state !== ChannelState.Opened) {
        channel.reject({
          type: "channel.error",
          reason_code: ChannelErrorCode.AlreadySubscribed,
          reason: "channel is already bound to a job",
        });
        return;
      }

      const parsed = isBinary
        ? { ok: false as const, reason_code: ChannelErrorCode.InvalidMessage, reason: "binary frames are not accepted" }
        : parseClientMessage(rawDataToString(data));
      if (!parsed.ok) {
        req.log.warn({
          event: "channel.message.invalid",
          channel_id: channel.channel_id,
          reason_code: parsed.reason_code,
          reason: parsed.reason,
        });
        channel.reject({ type: "channel.error", reason_code: parsed.reason_code, reason: parsed.reason });
        return;
      }

      subscribing = true;
      const jobId = parsed.message.job_id;
      void service.subscribe(jobId, channel).then(
        (outcome) => {
          subscribing = false;
          if (outcome.ok) return;
          req.log.warn({
            event: "channel.subscribe.rejected",
            channel_id: channel.channel_id,
            job_id: jobId,
            reason_code: outcome.reason_code,
          });
          channel.reject({ type: "channel.error", reason_code: outcome.reason_code, reason: outcome.reason });
        },
        (err: unknown) => {
          subscribing = false;
          req.log.error({
            event: "channel.subscribe.failed",
            channel_id: channel.channel_id,
            job_id: jobId,
            err_message: err instanceof Error ? err.message : String(err),
          });
          channel.reject({ type: "channel.error", reason_code: ChannelErrorCode.Internal, reason: "subscribe failed" });
        },
      );
    });

    socket.on("error", (err: Error) => {
      req.log.warn({ event: "channel.transport.error", channel_id: channel.channel_id, err_message: err.message });
    });

    socket.on("close", (code: number) => {
      channel.markClosed();
      const jobId = channel.jobId;
      const removed = jobId ? registry.unregister(jobId, channel) : false;
      req.log.info({
        event: "channel.closed",
        channel_id: channel.channel_id,
        job_id: jobId,
        code,
        unregistered: removed,
      });
    });
  });
}

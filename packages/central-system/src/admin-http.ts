import Fastify, { type FastifyInstance, type FastifyReply } from "fastify";
import { z } from "zod";
import { createLogger, ProtocolError, type Logger } from "@ocpp-lite/protocol";
import type { DeviceAdmin } from "./admin.js";

export const deviceParamsSchema = z.object({ identity: z.string().min(1) });

export const configurationQuerySchema = z.object({
  key: z.union([z.string(), z.array(z.string())]).optional(),
});

export const changeConfigurationBodySchema = z
  .object({
    key: z.string().min(1),
    value: z.union([z.string(), z.number().int()]),
  })
  .strict();

export type AdminErrorKind =
  | "invalid_request"
  | "device_not_connected"
  | "timeout"
  | "connection_closed"
  | "call_error"
  | "internal";

export interface AdminErrorBody {
  error: AdminErrorKind;
  message: string;
  code?: string;
}

export interface AdminServerOptions {
  logger?: Logger;
}

/** HTTP front for a {@link DeviceAdmin}; every route answers JSON. */
export function createAdminServer(
  admin: DeviceAdmin,
  options: AdminServerOptions = {},
): FastifyInstance {
  const log = options.logger ?? createLogger("admin-http");
  const app = Fastify({ logger: false });

  app.get("/devices", async () => ({ devices: await admin.listDevices() }));

  app.get("/devices/:identity/configuration", async (request, reply) => {
    const params = deviceParamsSchema.safeParse(request.params);
    const query = configurationQuerySchema.safeParse(request.query);
    if (!params.success) {
      return sendInvalid(reply, params.error);
    }
    if (!query.success) {
      return sendInvalid(reply, query.error);
    }

    const keys = query.data.key === undefined ? undefined : [query.data.key].flat();
    try {
      return await admin.getConfiguration(params.data.identity, keys);
    } catch (error) {
      return sendFailure(reply, error, log);
    }
  });

  app.post("/devices/:identity/configuration", async (request, reply) => {
    const params = deviceParamsSchema.safeParse(request.params);
    const body = changeConfigurationBodySchema.safeParse(request.body);
    if (!params.success) {
      return sendInvalid(reply, params.error);
    }
    if (!body.success) {
      return sendInvalid(reply, body.error);
    }

    try {
      return await admin.changeConfiguration(params.data.identity, body.data.key, body.data.value);
    } catch (error) {
      return sendFailure(reply, error, log);
    }
  });

  return app;
}

function sendInvalid(reply: FastifyReply, error: z.ZodError): FastifyReply {
  const message = error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
  const body: AdminErrorBody = { error: "invalid_request", message };
  return reply.code(400).send(body);
}

function sendFailure(reply: FastifyReply, error: unknown, log: Logger): FastifyReply {
  const { status, body } = describeFailure(error);
  if (status >= 500) {
    log.warn(`Admin request failed with ${status}`, error);
  }
  return reply.code(status).send(body);
}

export function describeFailure(error: unknown): { status: number; body: AdminErrorBody } {
  if (!(error instanceof ProtocolError)) {
    const message = error instanceof Error ? error.message : String(error);
    return { status: 500, body: { error: "internal", message } };
  }

  switch (error.code) {
    case "NotConnected":
      return { status: 404, body: { error: "device_not_connected", message: error.message } };
    case "Timeout":
      return { status: 504, body: { error: "timeout", message: error.message } };
    case "ConnectionClosed":
      return { status: 503, body: { error: "connection_closed", message: error.message } };
    default:
      return {
        status: 502,
        body: { error: "call_error", message: error.message, code: error.code },
      };
  }
}

import { z } from "zod";
import { FeederApiError, FeederError } from "../agent/errors.js";
import type { AgentTools, Device, Logger } from "../agent/schema.js";

// Message types understood by the feeder cloud endpoint.
export const MSG_LOGIN = 1000;
export const MSG_DEVICE_LIST = 1401;
export const MSG_DEVICE_STATUS = 1402;
export const MSG_FEED = 2001;

const cloudResponseSchema = z
  .object({
    status: z.number().optional(),
    msg: z.string().optional(),
    message: z.string().optional(),
    data: z.unknown().optional()
  })
  .passthrough();

type CloudResponse = z.infer<typeof cloudResponseSchema>;

const deviceSchema = z
  .object({
    devID: z.union([z.string().min(1), z.number()]).transform(String),
    devName: z.string().default(""),
    devType: z.coerce.string().optional(),
    devVersion: z.coerce.string().optional(),
    devTimeZone: z.union([z.string(), z.number()]).optional(),
    netType: z.union([z.string(), z.number()]).optional()
  })
  .passthrough();

const loginDataSchema = z.array(z.object({ authkey: z.string() }).passthrough()).min(1);

export interface FeederApiOptions {
  baseUrl: string;
  user?: string;
  password?: string;
  timeoutMs: number;
  logger: Logger;
  fetchImpl?: typeof fetch;
}

function describeFailure(response: CloudResponse): string {
  return response.msg || response.message || "unknown error";
}

function parseDevices(data: unknown): Device[] {
  if (!Array.isArray(data)) {
    return [];
  }

  return data.flatMap((entry) => {
    const parsed = deviceSchema.safeParse(entry);
    return parsed.success ? [parsed.data] : [];
  });
}

export function matchDevice(devices: Device[], query: string): Device | null {
  const needle = query.trim().toLowerCase();
  if (!needle) return null;

  const byId = devices.find((device) => device.devID === query.trim());
  if (byId) return byId;

  const byName = devices.find((device) => device.devName.trim().toLowerCase() === needle);
  if (byName) return byName;

  return devices.find((device) => device.devName.toLowerCase().includes(needle)) ?? null;
}

export function createFeederApi(options: FeederApiOptions): AgentTools["feeder"] {
  const fetchImpl = options.fetchImpl ?? fetch;
  const { logger } = options;
  let authkey: string | null = null;

  async function post(payload: Record<string, unknown>): Promise<CloudResponse> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), options.timeoutMs);
    const msgType = typeof payload.msgType === "number" ? payload.msgType : undefined;

    try {
      const res = await fetchImpl(options.baseUrl, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: controller.signal
      });

      if (!res.ok) {
        throw new FeederApiError(`Feeder API HTTP ${res.status}`, "failed", msgType);
      }

      const parsed = cloudResponseSchema.safeParse(await res.json());
      if (!parsed.success) {
        throw new FeederApiError("Feeder API returned an unexpected body", "failed", msgType);
      }
      return parsed.data;
    } catch (error) {
      if (error instanceof FeederApiError) throw error;
      if (controller.signal.aborted) {
        throw new FeederApiError(
          `Feeder API timed out after ${options.timeoutMs}ms`,
          "timeout",
          msgType
        );
      }
      throw new FeederApiError(
        `Feeder API request failed: ${error instanceof Error ? error.message : String(error)}`,
        "failed",
        msgType
      );
    } finally {
      clearTimeout(timeout);
    }
  }

  async function login(): Promise<string> {
    if (!options.user || !options.password) {
      throw new FeederError(
        "Feeder credentials are not configured (FEEDER_USER/FEEDER_PASS)",
        "invalid_params"
      );
    }

    logger.info(`Logging in to feeder cloud as ${options.user}`);
    const response = await post({
      msgType: MSG_LOGIN,
      userID: options.user,
      password: options.password
    });

    const data = loginDataSchema.safeParse(response.data);
    if (response.status !== 1 || !data.success) {
      throw new FeederApiError(`Feeder login failed: ${describeFailure(response)}`, "failed", MSG_LOGIN);
    }

    authkey = data.data[0].authkey;
    return authkey;
  }

  async function call(msgType: number, fields: Record<string, unknown>): Promise<CloudResponse> {
    const key = authkey ?? (await login());
    const response = await post({ msgType, authkey: key, userID: options.user, ...fields });

    if (response.status !== 1) {
      // The key may have expired; log in again on the next call.
      authkey = null;
      throw new FeederApiError(
        `Feeder API msgType ${msgType} failed: ${describeFailure(response)}`,
        "failed",
        msgType
      );
    }

    return response;
  }

  async function listDevices(): Promise<Device[]> {
    const response = await call(MSG_DEVICE_LIST, { pageIndex: 0, pageSize: 50 });
    const devices = parseDevices(response.data);
    logger.debug(`Feeder cloud returned ${devices.length} device(s)`);
    return devices;
  }

  return {
    async feed(deviceId: string, count: number): Promise<void> {
      logger.info(`Sending feed command: device=${deviceId}, count=${count}`);
      await call(MSG_FEED, { devID: deviceId, feedCount: count });
    },

    listDevices,

    async deviceStatus(deviceId: string): Promise<Record<string, unknown> | null> {
      const response = await call(MSG_DEVICE_STATUS, {
        devID: deviceId,
        groupID: "",
        pageIndex: 0,
        pageSize: 50
      });

      const rows = z.array(z.record(z.unknown())).safeParse(response.data);
      if (!rows.success || rows.data.length === 0) {
        return null;
      }
      return rows.data[0];
    }
  };
}

import type { AgentContext, Device, OperationStatus, WorkflowResult } from "../agent/schema.js";
import { errorMessage, errorStatus } from "../agent/errors.js";
import { matchDevice } from "../tools/feederApi.js";

export type DeviceListOutcome = {
  success: boolean;
  devices: Device[];
  message: string;
};

export type DeviceInfoOutcome = {
  success: boolean;
  status: OperationStatus;
  device: Device | null;
  message: string;
};

export type DeviceStatusOutcome = {
  success: boolean;
  status: OperationStatus;
  device_id: string;
  device_status: Record<string, unknown> | null;
  message: string;
};

export async function listDevices(context: AgentContext): Promise<WorkflowResult<DeviceListOutcome>> {
  try {
    const devices = await context.tools.feeder.listDevices();
    const message =
      devices.length === 0
        ? "没有可用的喂食设备"
        : `共 ${devices.length} 台设备:\n${devices.map((d) => `- ${d.devName || "未知"} (${d.devID})`).join("\n")}`;
    return { human: message, data: { success: true, devices, message } };
  } catch (error) {
    const message = `获取设备列表失败: ${errorMessage(error)}`;
    return { human: message, data: { success: false, devices: [], message } };
  }
}

export async function getDeviceInfo(
  context: AgentContext,
  deviceId: string
): Promise<WorkflowResult<DeviceInfoOutcome>> {
  let devices: Device[];
  try {
    devices = await context.tools.feeder.listDevices();
  } catch (error) {
    const message = `查询设备信息失败: ${errorMessage(error)}`;
    return { human: message, data: { success: false, status: errorStatus(error), device: null, message } };
  }

  const device = devices.find((entry) => entry.devID === deviceId) ?? null;
  if (!device) {
    const message = `无法找到设备: ${deviceId}`;
    return { human: message, data: { success: false, status: "invalid_params", device: null, message } };
  }

  const lines = [
    `设备名称: ${device.devName || "未知"}`,
    `设备ID: ${device.devID}`,
    `设备类型: ${device.devType ?? "未知"}`,
    `固件版本: ${device.devVersion ?? "未知"}`,
    `时区: UTC+${device.devTimeZone ?? 0}`,
    `网络类型: ${device.netType ?? "未知"}`
  ];
  const message = `设备信息:\n${lines.join("\n")}`;
  return { human: message, data: { success: true, status: "success", device, message } };
}

export async function getDeviceStatus(
  context: AgentContext,
  deviceId: string
): Promise<WorkflowResult<DeviceStatusOutcome>> {
  try {
    const status = await context.tools.feeder.deviceStatus(deviceId);
    if (!status) {
      const message = `设备 ${deviceId} 没有返回状态数据`;
      return {
        human: message,
        data: { success: false, status: "failed", device_id: deviceId, device_status: null, message }
      };
    }

    const online = status.online === undefined ? "未知" : status.online ? "在线" : "离线";
    const message = `设备 ${deviceId} 状态: ${online}`;
    return {
      human: message,
      data: {
        success: true,
        status: status.online === false ? "device_offline" : "success",
        device_id: deviceId,
        device_status: status,
        message
      }
    };
  } catch (error) {
    const message = `查询设备状态失败: ${errorMessage(error)}`;
    return {
      human: message,
      data: { success: false, status: errorStatus(error), device_id: deviceId, device_status: null, message }
    };
  }
}

/**
 * Resolves the device a request talks about. Without a usable name, a lone
 * device is taken as the target.
 */
export async function resolveDevice(
  context: AgentContext,
  name: string | null
): Promise<{ device: Device | null; message: string }> {
  let devices: Device[];
  try {
    devices = await context.tools.feeder.listDevices();
  } catch (error) {
    return { device: null, message: `获取设备列表失败: ${errorMessage(error)}` };
  }

  if (devices.length === 0) {
    return { device: null, message: "没有可用的喂食设备" };
  }

  const match = name ? matchDevice(devices, name) : null;
  if (match) return { device: match, message: "" };

  if (devices.length === 1) {
    if (name) context.tools.logger.warn(`No device matches "${name}", using ${devices[0].devID}`);
    return { device: devices[0], message: "" };
  }

  const names = devices.map((d) => d.devName || d.devID).join("、");
  return {
    device: null,
    message: name ? `找不到设备「${name}」，可用设备: ${names}` : `请指定设备，可用设备: ${names}`
  };
}

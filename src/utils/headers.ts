import type { SmartApiConfig } from "@/client.types";

const DEFAULT_IDENTITY = {
  localIp: "127.0.0.1",
  publicIp: "127.0.0.1",
  macAddress: "00:00:00:00:00:00",
};

export function baseHeaders(config: SmartApiConfig): Record<string, string> {
  return {
    "Content-Type": "application/json",
    Accept: "application/json",
    "X-UserType": "USER",
    "X-SourceID": "WEB",
    "X-ClientLocalIP": config.clientLocalIp ?? DEFAULT_IDENTITY.localIp,
    "X-ClientPublicIP": config.clientPublicIp ?? DEFAULT_IDENTITY.publicIp,
    "X-MACAddress": config.macAddress ?? DEFAULT_IDENTITY.macAddress,
    "X-PrivateKey": config.apiKey,
    "X-CorrelationId": config.correlationId,
  };
}

export function authHeaders(config: SmartApiConfig, jwtToken: string): Record<string, string> {
  return {
    ...baseHeaders(config),
    Authorization: `Bearer ${jwtToken}`,
  };
}

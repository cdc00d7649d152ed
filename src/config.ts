import { z } from "zod";
import { ERROR, SmartApiError } from "@/constants";
import type { SmartApiConfig } from "@/client.types";

const required = (name: string) => z.string({ required_error: `${name} is required` }).trim().min(1, `${name} is required`);

const envSchema = z.object({
  api_key: required("api_key"),
  username: required("username"),
  pwd: required("pwd"),
  token: required("token").regex(/^[A-Za-z2-7=\s]+$/, "token must be a base32 TOTP seed"),
  correlation_id: required("correlation_id"),
  SMARTAPI_BASE_URL: z.string().url().optional(),
  SMARTAPI_CLIENT_LOCAL_IP: z.string().optional(),
  SMARTAPI_CLIENT_PUBLIC_IP: z.string().optional(),
  SMARTAPI_MAC_ADDRESS: z.string().optional(),
});

/** Read credentials and connection settings from the environment. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): SmartApiConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => issue.message).join("; ");
    throw new SmartApiError(ERROR.INVALID_CONFIG, `Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    apiKey: vars.api_key,
    clientCode: vars.username,
    password: vars.pwd,
    totpSeed: vars.token,
    correlationId: vars.correlation_id,
    baseUrl: vars.SMARTAPI_BASE_URL,
    clientLocalIp: vars.SMARTAPI_CLIENT_LOCAL_IP,
    clientPublicIp: vars.SMARTAPI_CLIENT_PUBLIC_IP,
    macAddress: vars.SMARTAPI_MAC_ADDRESS,
  };
}

import axios, { type AxiosRequestConfig, type AxiosResponse, isAxiosError } from "axios";
import { SmartApiError, ERROR } from "@/constants";
import { logger, type Logger } from "./logger";

function rateLimited(): SmartApiError {
  return new SmartApiError(ERROR.RATE_LIMITED, "Rate limited (429). Too many requests, try again later.");
}

/** Issue a single HTTP request. Vendor calls are never repeated here. */
export async function request<T = unknown>(config: AxiosRequestConfig, log: Logger = logger): Promise<AxiosResponse<T>> {
  log.debug({ method: config.method, url: config.url }, "Vendor request");
  try {
    const response = await axios<T>(config);
    if (response.status === 429) throw rateLimited();
    return response;
  } catch (error: unknown) {
    if (error instanceof SmartApiError) throw error;
    const message = error instanceof Error ? error.message : "Unknown error";
    log.warn({ method: config.method, url: config.url }, `Request failed: ${message}`);
    if (isAxiosError(error) && error.response?.status === 429) {
      throw rateLimited();
    }
    throw error;
  }
}

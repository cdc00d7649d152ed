import { vi } from "vitest";
import pino from "pino";
import { SmartApiError, type ErrorCode } from "@/constants";
import type { ClientContext, SmartApiConfig } from "@/client.types";
import type { Session } from "@/domains/session";

export const TEST_BASE_URL = "https://apiconnect.test";

export const TEST_CONFIG: SmartApiConfig = {
  apiKey: "test-api-key",
  clientCode: "T1234",
  password: "test-pin",
  totpSeed: "GEZDGNBVGY3TQOJQ",
  correlationId: "test-correlation",
  baseUrl: TEST_BASE_URL,
};

export const TEST_SESSION: Session.Active = {
  jwtToken: "jwt-test",
  refreshToken: "refresh-test",
  feedToken: "feed-test",
  establishedAt: new Date("2024-01-01T09:00:00Z"),
};

export const silentLogger = pino({ level: "silent" });

export const stubTotp = { now: () => "123456" };

export function createMockContext(overrides: Partial<ClientContext> = {}): ClientContext {
  return {
    config: TEST_CONFIG,
    callbacks: {},
    baseUrl: TEST_BASE_URL,
    totp: stubTotp,
    logger: silentLogger,
    session: { ...TEST_SESSION },
    pendingLogin: null,
    ensureSession: vi.fn(async () => TEST_SESSION),
    invalidateSession: vi.fn(),
    throwError(code: ErrorCode, message: string): never {
      throw new SmartApiError(code, message);
    },
    ...overrides,
  };
}

export function envelope<T>(data: T) {
  return { status: true, message: "SUCCESS", errorcode: "", data };
}

export function rejection(message: string, errorcode: string) {
  return { status: false, message, errorcode, data: null };
}

export function httpResponse(data: unknown, status = 200) {
  return { status, data, headers: {} };
}

export function loginResponse(jwtToken = "jwt-1") {
  return httpResponse(envelope({ jwtToken, refreshToken: "refresh-1", feedToken: "feed-1" }));
}

export async function captureError(promise: Promise<unknown>): Promise<SmartApiError> {
  try {
    await promise;
  } catch (error: unknown) {
    if (error instanceof SmartApiError) return error;
    throw error;
  }
  throw new Error("Expected the promise to reject");
}

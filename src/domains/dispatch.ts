import type { AxiosResponse } from "axios";
import { ERROR, SESSION_REJECTED_CODES, SmartApiError, type ErrorCode } from "@/constants";
import { authHeaders, describeRejection, isEnvelope, request } from "@/utils";
import type { ClientContext } from "@/client.types";
import type { Session } from "@/domains/session";
import type { Vendor } from "@/types/vendor";

export interface VendorCall {
  method: "GET" | "POST";
  url: string;
  data?: Record<string, unknown>;
}

function send(ctx: ClientContext, call: VendorCall, session: Session.Active): Promise<AxiosResponse<unknown>> {
  return request<unknown>(
    {
      method: call.method,
      url: call.url,
      data: call.data,
      headers: authHeaders(ctx.config, session.jwtToken),
      validateStatus: (status) => status < 500,
    },
    ctx.logger,
  );
}

function isSessionRejected(response: AxiosResponse<unknown>): boolean {
  if (response.status === 401 || response.status === 403) return true;
  return isEnvelope(response.data) && SESSION_REJECTED_CODES.includes(response.data.errorcode);
}

/**
 * Issue one authorised vendor call. A rejected token invalidates the session,
 * logs in again and repeats the call once; anything else surfaces as `code`.
 */
export async function sendAuthorized<T>(
  ctx: ClientContext,
  call: VendorCall,
  code: ErrorCode,
  label: string,
): Promise<Vendor.Envelope<T>> {
  let session = await ctx.ensureSession();

  try {
    let response = await send(ctx, call, session);

    if (isSessionRejected(response)) {
      ctx.invalidateSession(session, `${label} rejected the session token`);
      session = await ctx.ensureSession();
      response = await send(ctx, call, session);
    }

    if (response.status !== 200) {
      ctx.throwError(code, `${label} failed: ${response.status}`);
    }

    const body = response.data;
    if (!isEnvelope<T>(body)) {
      ctx.throwError(code, `${label} failed: unexpected response`);
    }
    if (!body.status) {
      ctx.throwError(code, `${label} rejected: ${describeRejection(body)}`);
    }
    return body;
  } catch (error: unknown) {
    if (error instanceof SmartApiError) {
      // Raised by `request`, which has no access to the callbacks
      if (error.code === ERROR.RATE_LIMITED) ctx.throwError(error.code, error.message);
      throw error;
    }
    const message = error instanceof Error ? error.message : "Unknown error";
    ctx.throwError(code, `${label} error: ${message}`);
  }
}

import { endpoints, ERROR, SmartApiError } from "@/constants";
import { baseHeaders, describeRejection, isEnvelope, request } from "@/utils";
import type { ClientContext } from "@/client.types";
import type { Session } from ".";

export class SessionDomain {
  constructor(private _ctx: ClientContext) {}

  get isAuthenticated(): boolean {
    return this._ctx.session !== null;
  }

  /**
   * Return the cached session, logging in first when there is none.
   * Concurrent callers share a single in-flight login.
   */
  async ensure(): Promise<Session.Active> {
    if (this._ctx.session) return this._ctx.session;

    if (!this._ctx.pendingLogin) {
      this._ctx.pendingLogin = this.login().finally(() => {
        this._ctx.pendingLogin = null;
      });
    }
    return this._ctx.pendingLogin;
  }

  /** Authenticate with client code, password and the current TOTP code. */
  async login(): Promise<Session.Active> {
    const { config, logger } = this._ctx;
    logger.info({ clientCode: config.clientCode }, "Logging in");

    try {
      const response = await request<unknown>(
        {
          method: "POST",
          url: endpoints.login(this._ctx.baseUrl),
          data: {
            clientcode: config.clientCode,
            password: config.password,
            totp: this._ctx.totp.now(),
          },
          headers: baseHeaders(config),
          validateStatus: (status) => status < 500,
        },
        logger,
      );

      if (response.status !== 200) {
        this._ctx.throwError(ERROR.LOGIN_FAILED, `Login failed: ${response.status}`);
      }

      const body = response.data;
      if (!isEnvelope<Partial<Session.Tokens> | null>(body)) {
        this._ctx.throwError(ERROR.LOGIN_FAILED, "Login failed: unexpected response");
      }
      if (!body.status) {
        this._ctx.throwError(ERROR.LOGIN_FAILED, `Login failed: ${describeRejection(body)}`);
      }
      if (!body.data?.jwtToken) {
        this._ctx.throwError(ERROR.LOGIN_FAILED, "Login failed: no access token returned");
      }

      const session: Session.Active = {
        jwtToken: body.data.jwtToken,
        refreshToken: body.data.refreshToken ?? "",
        feedToken: body.data.feedToken ?? "",
        establishedAt: new Date(),
      };
      this._ctx.session = session;
      logger.info({ clientCode: config.clientCode }, "Logged in");
      this._ctx.callbacks.onLogin?.(session);
      return session;
    } catch (error: unknown) {
      if (error instanceof SmartApiError) {
        if (error.code === ERROR.RATE_LIMITED) {
          logger.error({ code: ERROR.LOGIN_FAILED }, "Login failed: rate limited (429)");
          this._ctx.throwError(ERROR.LOGIN_FAILED, "Login failed: rate limited (429)");
        }
        logger.error({ code: error.code }, error.message);
        throw error;
      }
      const message = error instanceof Error ? error.message : "Unknown error";
      logger.error({ code: ERROR.LOGIN_ERROR }, `Login error: ${message}`);
      this._ctx.throwError(ERROR.LOGIN_ERROR, `Login error: ${message}`);
    }
  }

  /**
   * Drop `rejected` so the next call logs in again. A session that has
   * already been replaced by a newer login is left alone.
   */
  invalidate(rejected: Session.Active, reason: string): void {
    if (this._ctx.session !== rejected) return;
    this._ctx.session = null;
    this._ctx.logger.warn({ reason }, "Session invalidated");
    this._ctx.callbacks.onSessionInvalidated?.(reason);
  }
}

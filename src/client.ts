import { SmartApiError, resolveBaseUrl, type ErrorCode } from "@/constants";
import { SeedTotp, logger } from "@/utils";
import { SessionDomain } from "@/domains/session";
import { PortfolioDomain } from "@/domains/portfolio";
import { CandleDomain } from "@/domains/candle";
import { OrderDomain } from "@/domains/order";
import type { ClientContext, SmartApiConfig } from "@/client.types";

export class SmartApiClient {
  private _ctx: ClientContext;

  /** Login and cached tokens. */
  public readonly session: SessionDomain;
  /** Holdings. */
  public readonly portfolio: PortfolioDomain;
  /** Historical candle data. */
  public readonly candles: CandleDomain;
  /** Place, cancel and list orders. */
  public readonly orders: OrderDomain;

  constructor(config: SmartApiConfig) {
    const callbacks = config.callbacks ?? {};

    this._ctx = {
      config,
      callbacks,
      baseUrl: resolveBaseUrl(config.baseUrl),
      totp: config.totp ?? new SeedTotp(config.totpSeed),
      logger: (config.logger ?? logger).child({ module: "client", correlationId: config.correlationId }),
      session: null,
      pendingLogin: null,
      ensureSession: () => this.session.ensure(),
      invalidateSession: (rejected, reason) => this.session.invalidate(rejected, reason),
      throwError(code: ErrorCode, message: string): never {
        const error = new SmartApiError(code, message);
        callbacks.onError?.(error);
        throw error;
      },
    };

    this.session = new SessionDomain(this._ctx);
    this.portfolio = new PortfolioDomain(this._ctx);
    this.candles = new CandleDomain(this._ctx);
    this.orders = new OrderDomain(this._ctx);
  }
}

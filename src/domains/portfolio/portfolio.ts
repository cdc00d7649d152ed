import { endpoints, ERROR } from "@/constants";
import { sendAuthorized } from "@/domains/dispatch";
import type { ClientContext } from "@/client.types";
import type { Vendor } from "@/types/vendor";
import type { Portfolio } from ".";

export class PortfolioDomain {
  constructor(private _ctx: ClientContext) {}

  /** Fetch long-term holdings. `data` is null when the account holds nothing. */
  async holdings(): Promise<Vendor.Envelope<Portfolio.Holding[] | null>> {
    return sendAuthorized<Portfolio.Holding[] | null>(
      this._ctx,
      { method: "GET", url: endpoints.holdings(this._ctx.baseUrl) },
      ERROR.HOLDINGS_ERROR,
      "Holdings",
    );
  }
}

import { endpoints, ERROR, DEFAULT_SYMBOL_TOKEN } from "@/constants";
import { EXCHANGE, INTERVAL } from "@/constants/enums";
import { sendAuthorized } from "@/domains/dispatch";
import type { ClientContext } from "@/client.types";
import type { Vendor } from "@/types/vendor";
import type { Candle } from ".";

const DATE_TIME = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/;

export class CandleDomain {
  constructor(private _ctx: ClientContext) {}

  /**
   * Fetch historical OHLCV candles for one instrument.
   * @param params.startTime - Range start, "YYYY-MM-DD HH:MM"
   * @param params.endTime - Range end, "YYYY-MM-DD HH:MM"
   */
  async get(params: Candle.Params): Promise<Vendor.Envelope<Candle.Row[]>> {
    const {
      startTime,
      endTime,
      symbolToken = DEFAULT_SYMBOL_TOKEN,
      interval = INTERVAL.ONE_MINUTE,
      exchange = EXCHANGE.NSE,
    } = params;

    if (!DATE_TIME.test(startTime) || !DATE_TIME.test(endTime)) {
      this._ctx.throwError(ERROR.INVALID_PARAMS, 'startTime and endTime must be formatted as "YYYY-MM-DD HH:MM"');
    }
    // Fixed-width format, so lexical order is chronological
    if (startTime > endTime) {
      this._ctx.throwError(ERROR.INVALID_PARAMS, "startTime must not be after endTime");
    }
    if (!symbolToken) {
      this._ctx.throwError(ERROR.INVALID_PARAMS, "symbolToken is required");
    }

    return sendAuthorized<Candle.Row[]>(
      this._ctx,
      {
        method: "POST",
        url: endpoints.candleData(this._ctx.baseUrl),
        data: {
          exchange,
          symboltoken: symbolToken,
          interval,
          fromdate: startTime,
          todate: endTime,
        },
      },
      ERROR.CANDLE_DATA_ERROR,
      "Candle data",
    );
  }
}

import type { SmartApiClient } from "@/client";
import type { Logger } from "@/utils";
import { settle } from "./result";
import type { CancelOrderArgs, CandleDataArgs, PlaceOrderArgs } from "./schemas";

export function createTradingTools(client: SmartApiClient, log: Logger) {
  return {
    getPortfolio: () => settle("get_portfolio", log, () => client.portfolio.holdings()),

    getCandleData: (args: CandleDataArgs) =>
      settle("get_candle_data", log, () =>
        client.candles.get({
          startTime: args.start_time,
          endTime: args.end_time,
          symbolToken: args.symboltoken,
          interval: args.interval,
          exchange: args.exchange,
        }),
      ),

    placeOrder: (args: PlaceOrderArgs) =>
      settle("place_order", log, () =>
        client.orders.place({
          symbol: args.symbol,
          symbolToken: args.symboltoken,
          transactionType: args.transactiontype,
          quantity: args.quantity,
          orderType: args.ordertype,
          productType: args.producttype,
          price: args.price,
        }),
      ),

    cancelOrder: (args: CancelOrderArgs) =>
      settle("cancel_order", log, () => client.orders.cancel({ orderId: args.order_id, variety: args.variety })),

    getOrderBook: () => settle("get_order_book", log, () => client.orders.book()),
  };
}

export type TradingTools = ReturnType<typeof createTradingTools>;

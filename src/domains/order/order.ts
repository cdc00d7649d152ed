import { endpoints, ERROR } from "@/constants";
import { DURATION, EXCHANGE, ORDER_TYPE, PRODUCT_TYPE, VARIETY } from "@/constants/enums";
import { sendAuthorized } from "@/domains/dispatch";
import type { ClientContext } from "@/client.types";
import type { Vendor } from "@/types/vendor";
import type { Order } from ".";

export class OrderDomain {
  constructor(private _ctx: ClientContext) {}

  /** Place a regular NSE day order. Combinations are validated by the vendor. */
  async place(params: Order.PlaceParams): Promise<Vendor.Envelope<Order.PlaceResult>> {
    const {
      symbol,
      symbolToken,
      transactionType,
      quantity,
      orderType = ORDER_TYPE.LIMIT,
      productType = PRODUCT_TYPE.DELIVERY,
      price = 0,
    } = params;

    if (!symbol || !symbolToken || !transactionType) {
      this._ctx.throwError(ERROR.INVALID_PARAMS, "symbol, symbolToken and transactionType are required");
    }
    if (!Number.isInteger(quantity) || quantity <= 0) {
      this._ctx.throwError(ERROR.INVALID_PARAMS, `quantity must be a positive integer, got ${quantity}`);
    }
    if (!Number.isFinite(price) || price < 0) {
      this._ctx.throwError(ERROR.INVALID_PARAMS, `price must not be negative, got ${price}`);
    }

    const response = await sendAuthorized<Order.PlaceResult>(
      this._ctx,
      {
        method: "POST",
        url: endpoints.placeOrder(this._ctx.baseUrl),
        data: {
          variety: VARIETY.NORMAL,
          tradingsymbol: symbol,
          symboltoken: symbolToken,
          transactiontype: transactionType,
          exchange: EXCHANGE.NSE,
          ordertype: orderType,
          producttype: productType,
          duration: DURATION.DAY,
          price: String(price),
          squareoff: "0",
          stoploss: "0",
          quantity: String(quantity),
        },
      },
      ERROR.PLACE_ORDER_ERROR,
      "Place order",
    );

    this._ctx.logger.info({ orderId: response.data?.orderid, symbol, transactionType }, "Order placed");
    this._ctx.callbacks.onOrderPlaced?.(response);
    return response;
  }

  /** Cancel a pending order by id. */
  async cancel(params: Order.CancelParams): Promise<Vendor.Envelope<Order.CancelResult>> {
    const { orderId, variety = VARIETY.NORMAL } = params;

    if (!orderId) {
      this._ctx.throwError(ERROR.INVALID_PARAMS, "orderId is required to cancel an order");
    }

    const response = await sendAuthorized<Order.CancelResult>(
      this._ctx,
      {
        method: "POST",
        url: endpoints.cancelOrder(this._ctx.baseUrl),
        data: { variety, orderid: orderId },
      },
      ERROR.CANCEL_ORDER_ERROR,
      "Cancel order",
    );

    this._ctx.logger.info({ orderId, variety }, "Order cancelled");
    this._ctx.callbacks.onOrderCancelled?.(response);
    return response;
  }

  /** Fetch every order of the trading day. `data` is null when there are none. */
  async book(): Promise<Vendor.Envelope<Order.Entry[] | null>> {
    return sendAuthorized<Order.Entry[] | null>(
      this._ctx,
      { method: "GET", url: endpoints.orderBook(this._ctx.baseUrl) },
      ERROR.ORDER_BOOK_ERROR,
      "Order book",
    );
  }
}

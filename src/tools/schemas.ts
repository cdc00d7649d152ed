import { z } from "zod";
import {
  DEFAULT_SYMBOL_TOKEN,
  EXCHANGE,
  INTERVAL,
  ORDER_TYPE,
  PRODUCT_TYPE,
  TRANSACTION_TYPE,
  VARIETY,
} from "@/constants";

const dateTime = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}$/, 'Expected "YYYY-MM-DD HH:MM"');

export const candleDataSchema = {
  start_time: dateTime.describe('Start date and time, "YYYY-MM-DD HH:MM"'),
  end_time: dateTime.describe('End date and time, "YYYY-MM-DD HH:MM"'),
  symboltoken: z.string().min(1).default(DEFAULT_SYMBOL_TOKEN).describe("Instrument symbol token"),
  interval: z.nativeEnum(INTERVAL).default(INTERVAL.ONE_MINUTE).describe("Candle interval"),
  exchange: z.nativeEnum(EXCHANGE).default(EXCHANGE.NSE).describe("Exchange segment"),
};

export const placeOrderSchema = {
  symbol: z.string().min(1).describe('Trading symbol, e.g. "SBIN-EQ"'),
  symboltoken: z.string().min(1).describe("Instrument symbol token"),
  transactiontype: z.nativeEnum(TRANSACTION_TYPE).describe("BUY or SELL"),
  quantity: z.number().int().positive().describe("Number of shares"),
  ordertype: z.nativeEnum(ORDER_TYPE).default(ORDER_TYPE.LIMIT).describe("Order type"),
  producttype: z.nativeEnum(PRODUCT_TYPE).default(PRODUCT_TYPE.DELIVERY).describe("Product type"),
  price: z.number().nonnegative().default(0).describe("Limit price; ignored for MARKET orders"),
};

export const cancelOrderSchema = {
  order_id: z.string().min(1).describe("Id of the order to cancel"),
  variety: z.nativeEnum(VARIETY).default(VARIETY.NORMAL).describe("Order variety"),
};

export type CandleDataArgs = z.infer<z.ZodObject<typeof candleDataSchema>>;
export type PlaceOrderArgs = z.infer<z.ZodObject<typeof placeOrderSchema>>;
export type CancelOrderArgs = z.infer<z.ZodObject<typeof cancelOrderSchema>>;

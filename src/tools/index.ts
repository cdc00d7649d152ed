import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import type { TradingTools } from "./handlers";
import { toCallToolResult } from "./result";
import { candleDataSchema, cancelOrderSchema, placeOrderSchema } from "./schemas";

export { createTradingTools } from "./handlers";
export type { TradingTools } from "./handlers";
export { settle, toToolError, toCallToolResult, formatToolError } from "./result";
export type { ToolResult, ToolError } from "./result";
export * from "./schemas";

export function registerTools(server: McpServer, tools: TradingTools): void {
  server.tool(
    "get_portfolio",
    "Retrieve the complete portfolio holdings of the authenticated user.",
    async () => toCallToolResult(await tools.getPortfolio()),
  );

  server.tool(
    "get_candle_data",
    "Retrieve historical OHLCV candles for an instrument over a date range.",
    candleDataSchema,
    async (args) => toCallToolResult(await tools.getCandleData(args)),
  );

  server.tool(
    "place_order",
    "Place a regular NSE day order. Defaults to a LIMIT DELIVERY order at price 0.",
    placeOrderSchema,
    async (args) => toCallToolResult(await tools.placeOrder(args)),
  );

  server.tool(
    "cancel_order",
    "Cancel a pending order by its order id.",
    cancelOrderSchema,
    async (args) => toCallToolResult(await tools.cancelOrder(args)),
  );

  server.tool(
    "get_order_book",
    "Retrieve every order (pending, executed and cancelled) for the trading day.",
    async () => toCallToolResult(await tools.getOrderBook()),
  );
}

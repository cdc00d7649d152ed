import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { SmartApiClient } from "@/client";
import { createServer } from "@/server";
import { TEST_CONFIG, envelope, httpResponse, loginResponse, rejection, silentLogger, stubTotp } from "./helpers";

// --- Mocks ---

const mockRequest = vi.fn();
vi.mock("@/utils", async (importOriginal) => {
  const actual = await importOriginal<typeof import("@/utils")>();
  return { ...actual, request: (...args: unknown[]) => mockRequest(...args) };
});

let mcp: Client;

beforeEach(async () => {
  vi.clearAllMocks();
  const client = new SmartApiClient({ ...TEST_CONFIG, totp: stubTotp, logger: silentLogger });
  const server = createServer(client, silentLogger);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  mcp = new Client({ name: "test-client", version: "1.0.0" });
  await Promise.all([server.connect(serverTransport), mcp.connect(clientTransport)]);
});

afterEach(async () => {
  await mcp.close();
});

async function call(name: string, args: Record<string, unknown> = {}) {
  const result = CallToolResultSchema.parse(await mcp.callTool({ name, arguments: args }));
  const [block] = result.content;
  if (block?.type !== "text") throw new Error(`${name} returned no text content`);
  return { isError: result.isError ?? false, text: block.text };
}

// Schema failures come back either as an error result or as a rejected JSON-RPC call
async function callInvalid(name: string, args: Record<string, unknown>) {
  try {
    return await call(name, args);
  } catch (error: unknown) {
    return { isError: true, text: error instanceof Error ? error.message : String(error) };
  }
}

function urlOf(callIndex: number): string {
  return mockRequest.mock.calls[callIndex][0].url;
}

// --- Tests ---

describe("tool surface", () => {
  it("should list every trading tool", async () => {
    const { tools } = await mcp.listTools();

    expect(tools.map((tool) => tool.name).sort()).toEqual([
      "cancel_order",
      "get_candle_data",
      "get_order_book",
      "get_portfolio",
      "place_order",
    ]);
  });

  it("should log in exactly once before the first operation", async () => {
    const holdings = envelope([{ tradingsymbol: "SBIN-EQ", quantity: 10 }]);
    mockRequest.mockResolvedValueOnce(loginResponse()).mockResolvedValueOnce(httpResponse(holdings));

    const result = await call("get_portfolio");

    expect(result.isError).toBe(false);
    expect(JSON.parse(result.text)).toEqual(holdings);
    expect(mockRequest).toHaveBeenCalledTimes(2);
    expect(urlOf(0)).toContain("loginByPassword");
    expect(urlOf(1)).toContain("getHolding");
  });

  it("should reuse the session for later calls", async () => {
    mockRequest
      .mockResolvedValueOnce(loginResponse())
      .mockResolvedValueOnce(httpResponse(envelope(null)))
      .mockResolvedValueOnce(httpResponse(envelope([])));

    await call("get_portfolio");
    await call("get_order_book");

    expect(mockRequest).toHaveBeenCalledTimes(3);
    expect(urlOf(2)).toContain("getOrderBook");
  });

  it("should return a vendor failure as an error result and keep serving", async () => {
    mockRequest
      .mockResolvedValueOnce(loginResponse())
      .mockRejectedValueOnce(new Error("connect ECONNREFUSED"))
      .mockResolvedValueOnce(httpResponse(envelope([])));

    const failed = await call("get_portfolio");
    const next = await call("get_order_book");

    expect(failed).toEqual({ isError: true, text: "vendor error [HOLDINGS_ERROR]: Holdings error: connect ECONNREFUSED" });
    expect(next.isError).toBe(false);
    expect(JSON.parse(next.text)).toEqual(envelope([]));
  });

  it("should report a failed login as an authentication error and retry login on the next call", async () => {
    mockRequest
      .mockResolvedValueOnce(httpResponse(rejection("Invalid totp", "AB1050")))
      .mockResolvedValueOnce(loginResponse())
      .mockResolvedValueOnce(httpResponse(envelope([])));

    const failed = await call("get_order_book");
    const next = await call("get_order_book");

    expect(failed).toEqual({
      isError: true,
      text: "authentication error [LOGIN_FAILED]: Login failed: Invalid totp (AB1050)",
    });
    expect(next.isError).toBe(false);
    expect(urlOf(1)).toContain("loginByPassword");
  });
});

describe("get_candle_data", () => {
  it("should default the symbol token to 3045 and return the candles unmodified", async () => {
    const candles = envelope([["2024-03-01T00:00:00+05:30", 760.1, 775.4, 755.0, 770.2, 18234567]]);
    mockRequest.mockResolvedValueOnce(loginResponse()).mockResolvedValueOnce(httpResponse(candles));

    const result = await call("get_candle_data", {
      start_time: "2024-03-01 09:15",
      end_time: "2024-03-05 15:30",
      interval: "ONE_DAY",
    });

    expect(JSON.parse(result.text)).toEqual(candles);
    expect(mockRequest.mock.calls[1][0].data).toEqual({
      exchange: "NSE",
      symboltoken: "3045",
      interval: "ONE_DAY",
      fromdate: "2024-03-01 09:15",
      todate: "2024-03-05 15:30",
    });
  });

  it("should default the interval to ONE_MINUTE", async () => {
    mockRequest.mockResolvedValueOnce(loginResponse()).mockResolvedValueOnce(httpResponse(envelope([])));

    await call("get_candle_data", { start_time: "2024-03-01 09:15", end_time: "2024-03-01 09:45" });

    expect(mockRequest.mock.calls[1][0].data.interval).toBe("ONE_MINUTE");
  });
});

describe("place_order", () => {
  it("should default to LIMIT, DELIVERY and price 0", async () => {
    const placed = envelope({ script: "SBIN-EQ", orderid: "240301000000123", uniqueorderid: "u-1" });
    mockRequest.mockResolvedValueOnce(loginResponse()).mockResolvedValueOnce(httpResponse(placed));

    const result = await call("place_order", {
      symbol: "SBIN-EQ",
      symboltoken: "3045",
      transactiontype: "BUY",
      quantity: 2,
    });

    expect(JSON.parse(result.text)).toEqual(placed);
    expect(mockRequest.mock.calls[1][0].data).toEqual(
      expect.objectContaining({ ordertype: "LIMIT", producttype: "DELIVERY", price: "0", quantity: "2" }),
    );
  });
});

describe("parameter validation", () => {
  it("should reject place_order with a zero quantity without calling the vendor", async () => {
    const result = await callInvalid("place_order", {
      symbol: "SBIN-EQ",
      symboltoken: "3045",
      transactiontype: "BUY",
      quantity: 0,
    });

    expect(result.isError).toBe(true);
    expect(result.text).toContain("Invalid arguments for tool place_order");
    expect(mockRequest).not.toHaveBeenCalled();
  });

  it("should reject cancel_order without an order id without calling the vendor", async () => {
    const result = await callInvalid("cancel_order", {});

    expect(result.isError).toBe(true);
    expect(result.text).toContain("Invalid arguments for tool cancel_order");
    expect(mockRequest).not.toHaveBeenCalled();
  });
});

describe("cancel_order", () => {
  it("should default the variety to NORMAL", async () => {
    mockRequest
      .mockResolvedValueOnce(loginResponse())
      .mockResolvedValueOnce(httpResponse(envelope({ orderid: "240301000000123", uniqueorderid: "u-1" })));

    const result = await call("cancel_order", { order_id: "240301000000123" });

    expect(result.isError).toBe(false);
    expect(mockRequest.mock.calls[1][0].data).toEqual({ variety: "NORMAL", orderid: "240301000000123" });
  });
});

describe("greeting resource", () => {
  it("should greet by name", async () => {
    const result = await mcp.readResource({ uri: "greeting://Ada" });
    const [content] = result.contents;

    expect(content.uri).toBe("greeting://Ada");
    expect("text" in content && content.text).toBe("Namaste, Ada!");
  });
});

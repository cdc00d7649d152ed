export { SmartApiClient } from "./client";
export type { SmartApiConfig, SmartApiCallbacks, ClientContext } from "./client.types";
export { loadConfig } from "./config";
export { createServer, SERVER_NAME, SERVER_VERSION } from "./server";
export { greet, registerGreeting } from "./resources/greeting";
export * from "./tools";
export * from "./constants";
export { SeedTotp, generateTotp, createLogger } from "./utils";
export type { TotpProvider, Logger } from "./utils";
export type { Session } from "./domains/session";
export type { Portfolio } from "./domains/portfolio";
export type { Candle } from "./domains/candle";
export type { Order } from "./domains/order";
export type { Vendor } from "./types/vendor";

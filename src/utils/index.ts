export { request } from "./request";
export { baseHeaders, authHeaders } from "./headers";
export { SeedTotp, generateTotp, decodeBase32 } from "./totp";
export type { TotpProvider } from "./totp";
export { logger, createLogger } from "./logger";
export type { Logger } from "./logger";
export { isEnvelope, describeRejection } from "./envelope";

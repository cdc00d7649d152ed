export { endpoints } from "./endpoints";
export { HOST, resolveBaseUrl } from "./hosts";
export {
  TRANSACTION_TYPE,
  ORDER_TYPE,
  PRODUCT_TYPE,
  VARIETY,
  EXCHANGE,
  DURATION,
  INTERVAL,
  SESSION_REJECTED_CODES,
  DEFAULT_SYMBOL_TOKEN,
} from "./enums";
export { ERROR, SmartApiError } from "./errors";
export type { ErrorCode, ErrorKind } from "./errors";

export type ErrorKind = "authentication" | "validation" | "vendor";

export const ERROR = {
  INVALID_CONFIG: "INVALID_CONFIG",
  INVALID_PARAMS: "INVALID_PARAMS",
  LOGIN_FAILED: "LOGIN_FAILED",
  LOGIN_ERROR: "LOGIN_ERROR",
  RATE_LIMITED: "RATE_LIMITED",
  HOLDINGS_ERROR: "HOLDINGS_ERROR",
  CANDLE_DATA_ERROR: "CANDLE_DATA_ERROR",
  PLACE_ORDER_ERROR: "PLACE_ORDER_ERROR",
  CANCEL_ORDER_ERROR: "CANCEL_ORDER_ERROR",
  ORDER_BOOK_ERROR: "ORDER_BOOK_ERROR",
} as const;

export type ErrorCode = (typeof ERROR)[keyof typeof ERROR];

const KIND_BY_CODE: Record<ErrorCode, ErrorKind> = {
  INVALID_CONFIG: "validation",
  INVALID_PARAMS: "validation",
  LOGIN_FAILED: "authentication",
  LOGIN_ERROR: "authentication",
  RATE_LIMITED: "vendor",
  HOLDINGS_ERROR: "vendor",
  CANDLE_DATA_ERROR: "vendor",
  PLACE_ORDER_ERROR: "vendor",
  CANCEL_ORDER_ERROR: "vendor",
  ORDER_BOOK_ERROR: "vendor",
};

export class SmartApiError extends Error {
  public code: ErrorCode;

  constructor(code: ErrorCode, message: string) {
    super(message);
    this.name = "SmartApiError";
    this.code = code;
  }

  get kind(): ErrorKind {
    return KIND_BY_CODE[this.code];
  }
}

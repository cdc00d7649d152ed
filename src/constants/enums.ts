export enum TRANSACTION_TYPE {
  BUY = "BUY",
  SELL = "SELL",
}

export enum ORDER_TYPE {
  MARKET = "MARKET",
  LIMIT = "LIMIT",
  STOPLOSS_LIMIT = "STOPLOSS_LIMIT",
  STOPLOSS_MARKET = "STOPLOSS_MARKET",
}

export enum PRODUCT_TYPE {
  DELIVERY = "DELIVERY",
  CARRYFORWARD = "CARRYFORWARD",
  MARGIN = "MARGIN",
  INTRADAY = "INTRADAY",
  BO = "BO",
}

export enum VARIETY {
  NORMAL = "NORMAL",
  STOPLOSS = "STOPLOSS",
  AMO = "AMO",
  ROBO = "ROBO",
}

export enum EXCHANGE {
  NSE = "NSE",
  BSE = "BSE",
  NFO = "NFO",
  MCX = "MCX",
  BFO = "BFO",
  CDS = "CDS",
}

export enum DURATION {
  DAY = "DAY",
  IOC = "IOC",
}

export enum INTERVAL {
  ONE_MINUTE = "ONE_MINUTE",
  THREE_MINUTE = "THREE_MINUTE",
  FIVE_MINUTE = "FIVE_MINUTE",
  TEN_MINUTE = "TEN_MINUTE",
  FIFTEEN_MINUTE = "FIFTEEN_MINUTE",
  THIRTY_MINUTE = "THIRTY_MINUTE",
  ONE_HOUR = "ONE_HOUR",
  ONE_DAY = "ONE_DAY",
}

/** Vendor error codes meaning the JWT is no longer accepted. */
export const SESSION_REJECTED_CODES: readonly string[] = ["AG8001", "AG8002", "AB1010"];

export const DEFAULT_SYMBOL_TOKEN = "3045";

import type { TRANSACTION_TYPE, ORDER_TYPE, PRODUCT_TYPE, VARIETY } from "@/constants/enums";

export namespace Order {
  export interface PlaceParams {
    /** Trading symbol, e.g. "SBIN-EQ" */
    symbol: string;
    symbolToken: string;
    transactionType: TRANSACTION_TYPE;
    quantity: number;
    orderType?: ORDER_TYPE;
    productType?: PRODUCT_TYPE;
    price?: number;
  }

  export interface CancelParams {
    orderId: string;
    variety?: VARIETY;
  }

  export interface PlaceResult {
    script: string;
    orderid: string;
    uniqueorderid: string;
  }

  export interface CancelResult {
    orderid: string;
    uniqueorderid: string;
  }

  export interface Entry {
    variety: string;
    ordertype: string;
    producttype: string;
    duration: string;
    price: number;
    triggerprice: number;
    quantity: string;
    tradingsymbol: string;
    transactiontype: string;
    exchange: string;
    symboltoken: string;
    orderid: string;
    uniqueorderid: string;
    status: string;
    orderstatus: string;
    text: string;
    updatetime: string;
    filledshares: string;
    unfilledshares: string;
    averageprice: number;
    [key: string]: unknown;
  }
}

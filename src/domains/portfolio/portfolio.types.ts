export namespace Portfolio {
  export interface Holding {
    tradingsymbol: string;
    exchange: string;
    isin: string;
    t1quantity: number;
    realisedquantity: number;
    quantity: number;
    authorisedquantity: number;
    product: string;
    collateralquantity: number | null;
    collateraltype: string | null;
    haircut: number;
    averageprice: number;
    ltp: number;
    symboltoken: string;
    close: number;
    profitandloss: number;
    pnlpercentage: number;
    [key: string]: unknown;
  }
}

import type { EXCHANGE, INTERVAL } from "@/constants/enums";

export namespace Candle {
  export interface Params {
    /** "YYYY-MM-DD HH:MM" */
    startTime: string;
    /** "YYYY-MM-DD HH:MM" */
    endTime: string;
    symbolToken?: string;
    interval?: INTERVAL;
    exchange?: EXCHANGE;
  }

  /** [timestamp, open, high, low, close, volume] */
  export type Row = [string, number, number, number, number, number];
}

export { CandleDomain } from "./candle";
export type { Candle } from "./candle.types";

export { PortfolioDomain } from "./portfolio";
export type { Portfolio } from "./portfolio.types";

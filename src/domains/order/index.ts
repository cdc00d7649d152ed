export { OrderDomain } from "./order";
export type { Order } from "./order.types";

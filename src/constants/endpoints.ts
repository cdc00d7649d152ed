const AUTH = "/rest/auth/angelbroking";
const SECURE = "/rest/secure/angelbroking";

export const endpoints = {
  login: (base: string) => `${base}${AUTH}/user/v1/loginByPassword`,

  holdings: (base: string) => `${base}${SECURE}/portfolio/v1/getHolding`,

  candleData: (base: string) => `${base}${SECURE}/historical/v1/getCandleData`,

  placeOrder: (base: string) => `${base}${SECURE}/order/v1/placeOrder`,

  cancelOrder: (base: string) => `${base}${SECURE}/order/v1/cancelOrder`,

  orderBook: (base: string) => `${base}${SECURE}/order/v1/getOrderBook`,
};

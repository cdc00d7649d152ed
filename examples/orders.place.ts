import "dotenv/config";
import { SmartApiClient, ORDER_TYPE, PRODUCT_TYPE, TRANSACTION_TYPE, loadConfig } from "../src";

const client = new SmartApiClient({
  ...loadConfig(),
  callbacks: {
    onOrderPlaced: (response) => console.log("Order placed:", response.data?.orderid),
  },
});

(async () => {
  const placed = await client.orders.place({
    symbol: "SBIN-EQ",
    symbolToken: "3045",
    transactionType: TRANSACTION_TYPE.BUY,
    quantity: 1,
    orderType: ORDER_TYPE.LIMIT,
    productType: PRODUCT_TYPE.DELIVERY,
    price: 500,
  });

  const book = await client.orders.book();
  const order = book.data?.find((entry) => entry.orderid === placed.data.orderid);
  console.log("Status:", order?.orderstatus ?? "not in order book yet");

  await client.orders.cancel({ orderId: placed.data.orderid });
  console.log("Cancelled", placed.data.orderid);
})().catch(console.error);

export * from "./CcxtExchangeClient";
export * from "./createExchange";
export { mapOrderStatus } from "./ccxtMapper";

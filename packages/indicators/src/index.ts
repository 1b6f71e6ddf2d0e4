export * from "./sma";
export * from "./rsi";
export * from "./atr";
export * from "./adx";
export * from "./higherTimeframe";
export * from "./cache";
export { assertPeriod } from "./validation";

export * from "./types";
export * from "./context";
export * from "./registry";
export * from "./strategies/ma-crossover";
export * from "./strategies/rsi-reversal";
export * from "./strategies/trend-filtered-crossover";

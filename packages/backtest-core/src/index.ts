export * from "./backtestTypes";
export * from "./errors";
export * from "./runSimulation";

export * from "./types";
export * from "./errors";
export * from "./grid";
export * from "./split";
export * from "./taskPool";
export * from "./comparison";
export * from "./runSweep";

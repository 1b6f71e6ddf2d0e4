export * from "./metricsSchema";
export * from "./roundTrips";
export * from "./calcPerformance";
export * from "./ranking";
export * from "./formatCSV";

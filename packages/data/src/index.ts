export * from "./types";
export { CcxtMarketDataClient, supportedExchanges } from "./ccxtClient";
export { fetchHistoricalCandles } from "./historical";
export {
	CANDLE_CACHE_HEADER,
	formatCandleCsv,
	parseCandleCsv,
	readCandleCache,
	writeCandleCache,
	loadCandlesWithCache,
} from "./candleCache";
export type { CandleCacheMeta } from "./candleCache";
export {
	DataValidationError,
	assertCandleSeries,
	isDataValidationError,
} from "./validation";
export { mapCcxtCandleToCandle } from "./utils/ccxtMapper";

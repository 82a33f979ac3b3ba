import type { Candle, MarketType, Ticker } from "../types";

/**
 * Market data source for signal evaluation and pricing.
 *
 * Kept separate from OrderGateway so a read-only client (no trading
 * permissions) can drive monitoring while execution runs elsewhere.
 */
export interface MarketDataClient {
	/**
	 * Fetch OHLCV candles for an asset.
	 * @param asset - Trading pair symbol (e.g., "BTC/USDT")
	 * @param timeframe - Timeframe string (e.g., "15m", "1h", "1d")
	 * @param limit - Maximum number of candles to fetch
	 * @param marketType - Market the strategy trades on
	 * @returns Candles in chronological order
	 */
	fetchOHLCV(
		asset: string,
		timeframe: string,
		limit: number,
		marketType?: MarketType
	): Promise<Candle[]>;

	fetchTicker(asset: string, marketType?: MarketType): Promise<Ticker>;
}

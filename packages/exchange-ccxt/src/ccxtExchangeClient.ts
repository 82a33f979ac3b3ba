import ccxt from "ccxt";
import type { Exchange, OHLCV } from "ccxt";
import {
	ConfigurationError,
	createLogger,
	type Candle,
	type ExchangeConfig,
	type ExchangeOrder,
	type MarketDataClient,
	type MarketType,
	type OrderGateway,
	type OrderRequest,
	type Ticker,
} from "@tradeloop/core";

import {
	mapCcxtCandleToCandle,
	mapCcxtOrder,
	mapCcxtTicker,
	toCcxtMarketType,
	type CcxtOrderLike,
	type CcxtTickerLike,
} from "./utils/ccxtMapper";

const exchangeLogger = createLogger("exchange:ccxt");

/**
 * The slice of a ccxt exchange instance the client drives. Tests hand in an
 * in-process fake.
 */
export interface CcxtVenue {
	loadMarkets(): Promise<unknown>;
	market(symbol: string): { symbol: string };
	fetchOHLCV(
		symbol: string,
		timeframe?: string,
		since?: number,
		limit?: number,
		params?: Record<string, unknown>
	): Promise<OHLCV[]>;
	fetchTicker(symbol: string, params?: Record<string, unknown>): Promise<CcxtTickerLike>;
	createOrder(
		symbol: string,
		type: string,
		side: string,
		amount: number,
		price?: number,
		params?: Record<string, unknown>
	): Promise<CcxtOrderLike>;
	fetchOrder(
		id: string,
		symbol?: string,
		params?: Record<string, unknown>
	): Promise<CcxtOrderLike>;
}

interface VenueCredentials {
	apiKey?: string;
	secret?: string;
	password?: string;
	enableRateLimit: boolean;
	options: { defaultType: string };
}

const EXCHANGE_FACTORIES: Record<string, (settings: VenueCredentials) => Exchange> = {
	binance: (settings) => new ccxt.binance(settings),
	bitget: (settings) => new ccxt.bitget(settings),
	mexc: (settings) => new ccxt.mexc(settings),
};

export const SUPPORTED_EXCHANGES = Object.keys(EXCHANGE_FACTORIES);

/**
 * Market data and order routing over one ccxt exchange. Symbols are given in
 * unified form ("BTC/USDT"); futures resolve to the linear swap market when
 * the plain symbol is not listed.
 */
export class CcxtExchangeClient implements MarketDataClient, OrderGateway {
	private marketsLoaded = false;

	constructor(
		private readonly venue: CcxtVenue,
		private readonly defaultMarketType: MarketType = "spot"
	) {}

	static create(config: ExchangeConfig): CcxtExchangeClient {
		const factory = EXCHANGE_FACTORIES[config.exchange];
		if (!factory) {
			throw new ConfigurationError(
				`Unsupported exchange "${config.exchange}"; expected one of ${SUPPORTED_EXCHANGES.join(", ")}`
			);
		}
		const exchange = factory({
			apiKey: config.credentials.apiKey || undefined,
			secret: config.credentials.apiSecret || undefined,
			password: config.credentials.password || undefined,
			enableRateLimit: true,
			options: { defaultType: toCcxtMarketType(config.defaultMarketType) },
		});
		if (config.testnet) {
			exchange.setSandboxMode(true);
		}
		exchangeLogger.info("exchange_client_created", {
			exchange: config.exchange,
			marketType: config.defaultMarketType,
			testnet: config.testnet,
		});
		return new CcxtExchangeClient(exchange, config.defaultMarketType);
	}

	async fetchOHLCV(
		asset: string,
		timeframe: string,
		limit = 300,
		marketType: MarketType = this.defaultMarketType
	): Promise<Candle[]> {
		const marketSymbol = await this.resolveMarketSymbol(asset, marketType);
		const rows = await this.venue.fetchOHLCV(
			marketSymbol,
			timeframe,
			undefined,
			limit,
			this.typeParams(marketType)
		);
		return rows.map((row) => mapCcxtCandleToCandle(row, asset, timeframe));
	}

	async fetchTicker(
		asset: string,
		marketType: MarketType = this.defaultMarketType
	): Promise<Ticker> {
		const marketSymbol = await this.resolveMarketSymbol(asset, marketType);
		const raw = await this.venue.fetchTicker(marketSymbol, this.typeParams(marketType));
		return mapCcxtTicker(raw, asset);
	}

	async createOrder(request: OrderRequest): Promise<ExchangeOrder> {
		const marketType = request.marketType ?? this.defaultMarketType;
		const marketSymbol = await this.resolveMarketSymbol(request.asset, marketType);
		const raw = await this.venue.createOrder(
			marketSymbol,
			request.type,
			request.side,
			request.amount,
			request.price ?? undefined,
			{ ...this.typeParams(marketType), ...(request.params ?? {}) }
		);
		exchangeLogger.info("order_created", {
			asset: request.asset,
			orderId: raw.id,
			type: request.type,
			side: request.side,
			amount: request.amount,
		});
		return mapCcxtOrder(raw, request.asset, request);
	}

	async fetchOrder(
		orderId: string,
		asset: string,
		marketType: MarketType = this.defaultMarketType
	): Promise<ExchangeOrder> {
		const marketSymbol = await this.resolveMarketSymbol(asset, marketType);
		const raw = await this.venue.fetchOrder(orderId, marketSymbol, this.typeParams(marketType));
		return mapCcxtOrder(raw, asset);
	}

	private typeParams(marketType: MarketType): Record<string, unknown> {
		return { type: toCcxtMarketType(marketType) };
	}

	private async resolveMarketSymbol(asset: string, marketType: MarketType): Promise<string> {
		await this.ensureMarketsLoaded();
		if (marketType === "futures") {
			const linear = this.tryMarket(`${asset}:USDT`);
			if (linear) {
				return linear;
			}
		}
		const direct = this.tryMarket(asset);
		if (direct) {
			return direct;
		}
		throw new Error(`Unknown market symbol for ${asset} (${marketType})`);
	}

	private tryMarket(symbol: string): string | null {
		try {
			return this.venue.market(symbol).symbol;
		} catch (error) {
			exchangeLogger.debug("market_lookup_miss", {
				symbol,
				error: error instanceof Error ? error.message : String(error),
			});
			return null;
		}
	}

	private async ensureMarketsLoaded(): Promise<void> {
		if (this.marketsLoaded) {
			return;
		}
		await this.venue.loadMarkets();
		this.marketsLoaded = true;
	}
}

import {
	createLogger,
	type ExchangeOrder,
	type MarketDataClient,
	type ModuleLogger,
	type OrderGateway,
	type OrderRequest,
} from "@tradeloop/core";

import { PaperAccount } from "./paperAccount";

/** Entry order types that fill on submission; anything else rests. */
const IMMEDIATE_TYPES = new Set(["market", "limit"]);

export interface PaperOrderGatewayOptions {
	marketData: MarketDataClient;
	account?: PaperAccount;
	now?: () => number;
	logger?: ModuleLogger;
}

/**
 * Simulated venue. Market and limit orders fill at once at the last ticker
 * price; protective orders (stop, trailing stop) are accepted and stay open.
 */
export class PaperOrderGateway implements OrderGateway {
	private readonly orders = new Map<string, ExchangeOrder>();
	private readonly account: PaperAccount;
	private readonly now: () => number;
	private readonly logger: ModuleLogger;
	private sequence = 0;

	constructor(private readonly options: PaperOrderGatewayOptions) {
		this.account = options.account ?? new PaperAccount(0);
		this.now = options.now ?? Date.now;
		this.logger = options.logger ?? createLogger("execution-engine:paper");
	}

	async createOrder(request: OrderRequest): Promise<ExchangeOrder> {
		this.sequence += 1;
		const order: ExchangeOrder = {
			id: `paper-${this.sequence}`,
			timestamp: this.now(),
			status: "open",
			asset: request.asset,
			side: request.side,
			type: request.type,
			amount: request.amount,
			price: request.price ?? undefined,
		};

		if (IMMEDIATE_TYPES.has(request.type)) {
			const ticker = await this.options.marketData.fetchTicker(
				request.asset,
				request.marketType
			);
			order.status = "closed";
			order.average = ticker.last;
			order.price = ticker.last;
			order.filled = request.amount;
			const snapshot = this.account.registerFill({
				orderId: order.id,
				asset: order.asset,
				side: order.side,
				amount: order.amount,
				price: ticker.last,
				timestamp: order.timestamp,
			});
			this.logger.info("paper_account_update", {
				asset: order.asset,
				orderId: order.id,
				snapshot,
			});
		}

		this.orders.set(order.id, order);
		return { ...order };
	}

	async fetchOrder(orderId: string, asset: string): Promise<ExchangeOrder> {
		const order = this.orders.get(orderId);
		if (!order || order.asset !== asset) {
			throw new Error(`Paper order ${orderId} not found for ${asset}`);
		}
		return { ...order };
	}

	getAccount(): PaperAccount {
		return this.account;
	}
}

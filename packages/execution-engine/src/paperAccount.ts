import type { TradeSide } from "@tradeloop/core";

export interface PaperFill {
	orderId: string;
	asset: string;
	side: TradeSide;
	amount: number;
	price: number;
	timestamp: number;
}

export interface PaperAccountSnapshot {
	startingBalance: number;
	balance: number;
	fills: {
		total: number;
		buys: number;
		sells: number;
	};
	/** Net base-asset quantity per symbol. */
	holdings: Record<string, number>;
	lastFill?: PaperFill;
}

/**
 * Cash ledger behind the paper gateway: buys spend quote currency, sells
 * return it. The balance may go negative; paper mode does not reject orders.
 */
export class PaperAccount {
	private readonly startingBalance: number;
	private balance: number;
	private readonly holdings = new Map<string, number>();
	private fills = { total: 0, buys: 0, sells: 0 };
	private lastFill?: PaperFill;

	constructor(startingBalance: number) {
		this.startingBalance = startingBalance;
		this.balance = startingBalance;
	}

	registerFill(fill: PaperFill): PaperAccountSnapshot {
		const notional = fill.amount * fill.price;
		const held = this.holdings.get(fill.asset) ?? 0;
		if (fill.side === "buy") {
			this.balance -= notional;
			this.holdings.set(fill.asset, held + fill.amount);
			this.fills.buys += 1;
		} else {
			this.balance += notional;
			this.holdings.set(fill.asset, held - fill.amount);
			this.fills.sells += 1;
		}
		this.fills.total += 1;
		this.lastFill = fill;
		return this.snapshot();
	}

	snapshot(): PaperAccountSnapshot {
		return {
			startingBalance: this.startingBalance,
			balance: this.balance,
			fills: { ...this.fills },
			holdings: Object.fromEntries(this.holdings),
			lastFill: this.lastFill,
		};
	}
}

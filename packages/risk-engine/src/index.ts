import type { RiskParameters, TradeSide } from "@tradeloop/core";

export type RiskLevel = "low" | "medium" | "high";

/** Percent values: stop-loss, take-profit and trailing-stop callback rate. */
export const RISK_PRESETS: Record<RiskLevel, RiskParameters> = {
	low: { stopLossPct: 2, takeProfitPct: 5, trailingStopPct: 1 },
	medium: { stopLossPct: 5, takeProfitPct: 10, trailingStopPct: 2 },
	high: { stopLossPct: 10, takeProfitPct: 20, trailingStopPct: 5 },
};

export interface RiskPrices {
	stopLoss: number;
	takeProfit: number;
	trailingStop: number;
}

const isRiskLevel = (value: string): value is RiskLevel =>
	Object.prototype.hasOwnProperty.call(RISK_PRESETS, value);

const RISK_FIELDS = ["stopLossPct", "takeProfitPct", "trailingStopPct"] as const;

export class RiskManager {
	constructor(private readonly pricePrecision = 8) {}

	suggestRiskParameters(level: string): RiskParameters {
		const normalized = level.trim().toLowerCase();
		if (!isRiskLevel(normalized)) {
			throw new Error(`Unsupported risk level: ${level}`);
		}
		return { ...RISK_PRESETS[normalized] };
	}

	validateRiskParameters(params: unknown): RiskParameters {
		if (typeof params !== "object" || params === null) {
			throw new Error("Risk parameters must be an object");
		}
		const source = Object.fromEntries(Object.entries(params));
		const [stopLossPct, takeProfitPct, trailingStopPct] = RISK_FIELDS.map(
			(key) => {
				if (!(key in source)) {
					throw new Error(`Missing risk parameter: ${key}`);
				}
				const value: unknown = source[key];
				if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
					throw new Error(`Invalid value for ${key}: ${String(value)}`);
				}
				return value;
			}
		);
		return { stopLossPct, takeProfitPct, trailingStopPct };
	}

	/** Below entry for a buy, above it for a sell. 0 when no stop is set. */
	stopLossPrice(entryPrice: number, side: TradeSide, pct: number): number {
		if (pct <= 0) {
			return 0;
		}
		const ratio = pct / 100;
		return this.round(entryPrice * (side === "buy" ? 1 - ratio : 1 + ratio));
	}

	takeProfitPrice(entryPrice: number, side: TradeSide, pct: number): number {
		if (pct <= 0) {
			return 0;
		}
		const ratio = pct / 100;
		return this.round(entryPrice * (side === "buy" ? 1 + ratio : 1 - ratio));
	}

	priceRisk(entryPrice: number, side: TradeSide, risk: RiskParameters): RiskPrices {
		return {
			stopLoss: this.stopLossPrice(entryPrice, side, risk.stopLossPct),
			takeProfit: this.takeProfitPrice(entryPrice, side, risk.takeProfitPct),
			trailingStop: risk.trailingStopPct,
		};
	}

	/** Order side that unwinds a position opened with `side`. */
	exitSide(side: TradeSide): TradeSide {
		return side === "buy" ? "sell" : "buy";
	}

	private round(price: number): number {
		return parseFloat(price.toFixed(this.pricePrecision));
	}
}

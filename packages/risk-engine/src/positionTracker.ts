import type {
	Candle,
	SignalDecision,
	SimulationSettings,
	Trade,
	TradeAction,
	TradeReason,
} from "@backlab/core";

export type RiskSettings = Pick<
	SimulationSettings,
	"feeRate" | "positionSizePercent" | "minTradeUnit" | "stopLossPercent"
>;

export interface OpenPosition {
	entryPrice: number;
	quantity: number;
	entryTimestamp: number;
	/** Cash spent on entry, fee included. */
	costBasis: number;
	stopPrice: number;
}

export type PositionState =
	| { status: "FLAT" }
	| { status: "HOLDING"; position: OpenPosition };

export type IgnoreReason =
	| "hold"
	| "already_holding"
	| "no_position"
	| "insufficient_capital"
	| "below_min_trade_unit";

export interface ClosedPosition {
	entry: OpenPosition;
	exitPrice: number;
	exitTimestamp: number;
	proceeds: number;
	pnl: number;
}

export type TrackerOutcome =
	| { kind: "executed"; trade: Trade; closed: ClosedPosition | null }
	| { kind: "ignored"; reason: IgnoreReason; detail?: Record<string, number> };

export interface AccountSnapshot {
	cash: number;
	assetBalance: number;
	equity: number;
}

export interface OpenPositionReport {
	entryPrice: number;
	quantity: number;
	entryTimestamp: number;
	costBasis: number;
	markPrice: number;
	marketValue: number;
	unrealizedPnl: number;
}

/**
 * Long-only, single-position account. Entries spend a fixed fraction of cash
 * with the fee taken out of the bought quantity; exits sell everything with
 * the fee taken out of the proceeds.
 */
export class PositionTracker {
	private cash: number;
	private current: PositionState = { status: "FLAT" };

	constructor(
		private readonly settings: RiskSettings,
		startingCapital: number
	) {
		this.cash = startingCapital;
	}

	get state(): PositionState {
		return this.current;
	}

	get cashBalance(): number {
		return this.cash;
	}

	/** True when holding and the close is at or below the stop price. */
	checkStopLoss(candle: Candle): boolean {
		if (this.current.status !== "HOLDING") {
			return false;
		}
		return candle.close <= this.current.position.stopPrice;
	}

	apply(decision: SignalDecision, candle: Candle): TrackerOutcome {
		switch (decision.signal) {
			case "BUY":
				return this.open(candle, decision.reason);
			case "SELL":
				return this.close(candle, "signal", decision.reason);
			default:
				return { kind: "ignored", reason: "hold" };
		}
	}

	stopOut(candle: Candle): TrackerOutcome {
		return this.close(candle, "stop_loss", "stop_loss");
	}

	snapshot(markPrice: number): AccountSnapshot {
		const assetBalance =
			this.current.status === "HOLDING" ? this.current.position.quantity : 0;
		return {
			cash: this.cash,
			assetBalance,
			equity: this.cash + assetBalance * markPrice,
		};
	}

	openPositionReport(markPrice: number): OpenPositionReport | null {
		if (this.current.status !== "HOLDING") {
			return null;
		}
		const { entryPrice, quantity, entryTimestamp, costBasis } =
			this.current.position;
		const marketValue = quantity * markPrice;
		return {
			entryPrice,
			quantity,
			entryTimestamp,
			costBasis,
			markPrice,
			marketValue,
			unrealizedPnl: marketValue - costBasis,
		};
	}

	private open(candle: Candle, signalReason: string): TrackerOutcome {
		if (this.current.status === "HOLDING") {
			return { kind: "ignored", reason: "already_holding" };
		}
		const price = candle.close;
		const spend = this.cash * this.settings.positionSizePercent;
		if (this.cash <= 0 || spend <= 0) {
			return {
				kind: "ignored",
				reason: "insufficient_capital",
				detail: { cash: this.cash },
			};
		}
		const quantity = (spend / price) * (1 - this.settings.feeRate);
		if (quantity < this.settings.minTradeUnit) {
			return {
				kind: "ignored",
				reason: "below_min_trade_unit",
				detail: { quantity, minTradeUnit: this.settings.minTradeUnit },
			};
		}
		const fee = spend * this.settings.feeRate;
		this.cash -= spend;
		const position: OpenPosition = {
			entryPrice: price,
			quantity,
			entryTimestamp: candle.timestamp,
			costBasis: spend,
			stopPrice: price * (1 - this.settings.stopLossPercent),
		};
		this.current = { status: "HOLDING", position };
		return {
			kind: "executed",
			trade: this.record(candle, "BUY", quantity, fee, spend, "signal", signalReason),
			closed: null,
		};
	}

	private close(
		candle: Candle,
		reason: TradeReason,
		signalReason: string
	): TrackerOutcome {
		if (this.current.status !== "HOLDING") {
			return { kind: "ignored", reason: "no_position" };
		}
		const entry = this.current.position;
		const price = candle.close;
		const gross = entry.quantity * price;
		const fee = gross * this.settings.feeRate;
		const proceeds = gross - fee;
		this.cash += proceeds;
		this.current = { status: "FLAT" };
		return {
			kind: "executed",
			trade: this.record(
				candle,
				"SELL",
				entry.quantity,
				fee,
				proceeds,
				reason,
				signalReason
			),
			closed: {
				entry,
				exitPrice: price,
				exitTimestamp: candle.timestamp,
				proceeds,
				pnl: proceeds - entry.costBasis,
			},
		};
	}

	private record(
		candle: Candle,
		action: TradeAction,
		quantity: number,
		fee: number,
		value: number,
		reason: TradeReason,
		signalReason: string
	): Trade {
		return Object.freeze({
			timestamp: candle.timestamp,
			action,
			price: candle.close,
			quantity,
			fee,
			value,
			cashBalance: this.cash,
			assetBalance: this.current.status === "HOLDING" ? this.current.position.quantity : 0,
			reason,
			signalReason,
		});
	}
}

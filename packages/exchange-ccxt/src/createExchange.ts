import ccxt, { type Exchange } from "ccxt";
import type { CcxtExchangeApi } from "./CcxtExchangeClient";

export const SUPPORTED_EXCHANGES = ["binance", "bybit", "mexc"] as const;
export type SupportedExchangeId = (typeof SUPPORTED_EXCHANGES)[number];

export interface CreateExchangeOptions {
	exchangeId: string;
	apiKey?: string;
	secret?: string;
	sandbox?: boolean;
}

/**
 * Builds a spot ccxt exchange. Empty credentials are left out so public
 * endpoints keep working without keys.
 */
export const createCcxtExchange = (
	options: CreateExchangeOptions
): CcxtExchangeApi => {
	const exchangeId = options.exchangeId.toLowerCase();
	const config = {
		apiKey: options.apiKey || undefined,
		secret: options.secret || undefined,
		enableRateLimit: true,
		options: { defaultType: "spot" },
	};

	let exchange: Exchange;
	switch (exchangeId) {
		case "binance":
			exchange = new ccxt.binance(config);
			break;
		case "bybit":
			exchange = new ccxt.bybit(config);
			break;
		case "mexc":
			exchange = new ccxt.mexc(config);
			break;
		default:
			throw new Error(
				`Unsupported exchange "${options.exchangeId}". Expected one of ${SUPPORTED_EXCHANGES.join(", ")}`
			);
	}

	if (options.sandbox) {
		exchange.setSandboxMode(true);
	}
	return exchange;
};

import { z } from "zod";
import {
	createLogger,
	toCanonicalSymbol,
	type Observation,
} from "@tickforge/core";

const logger = createLogger("normalizer");

const numeric = z
	.union([z.number(), z.string().trim().min(1)])
	.transform((value) => Number(value))
	.pipe(z.number().finite());

const tradeIdSchema = z
	.union([z.string().min(1), z.number()])
	.transform((value) => String(value));

const canonicalSchema = z.object({
	symbol: z.string().min(1),
	price: numeric,
	quantity: numeric,
	timestamp: numeric,
	tradeId: tradeIdSchema.optional(),
});

/** Exchange trade stream payload, e.g. `<symbol>@trade`. */
const streamTradeSchema = z.object({
	e: z.literal("trade"),
	s: z.string().min(1),
	p: numeric,
	q: numeric,
	T: numeric,
	t: tradeIdSchema.optional(),
});

/** Unified trade shape returned by ccxt `fetchTrades`. */
const ccxtTradeSchema = z.object({
	symbol: z.string().min(1),
	price: numeric,
	amount: numeric,
	timestamp: numeric,
	id: tradeIdSchema.optional().nullable(),
});

const combinedStreamSchema = z.object({
	stream: z.string(),
	data: z.unknown(),
});

const validObservation = z.object({
	symbol: z.string().min(1),
	price: z.number().positive(),
	quantity: z.number().nonnegative(),
	timestamp: z.number().int().nonnegative(),
	tradeId: z.string().optional(),
});

type RawObservation = z.input<typeof validObservation>;

const toRaw = (payload: unknown): RawObservation | null => {
	const canonical = canonicalSchema.safeParse(payload);
	if (canonical.success) {
		return canonical.data;
	}
	const streamTrade = streamTradeSchema.safeParse(payload);
	if (streamTrade.success) {
		const { s, p, q, T, t } = streamTrade.data;
		return { symbol: s, price: p, quantity: q, timestamp: T, tradeId: t };
	}
	const ccxtTrade = ccxtTradeSchema.safeParse(payload);
	if (ccxtTrade.success) {
		const { symbol, price, amount, timestamp, id } = ccxtTrade.data;
		return {
			symbol,
			price,
			quantity: amount,
			timestamp,
			tradeId: id ?? undefined,
		};
	}
	return null;
};

/**
 * Converts venue payloads into `Observation`s. Malformed input is logged
 * and dropped; it never reaches the aggregator.
 */
export class Normalizer {
	private rejected = 0;

	normalize(payload: unknown): Observation | null {
		const unwrapped = combinedStreamSchema.safeParse(payload);
		const raw = toRaw(unwrapped.success ? unwrapped.data.data : payload);
		if (!raw) {
			return this.reject("unrecognized_payload", payload);
		}

		const checked = validObservation.safeParse(raw);
		if (!checked.success) {
			return this.reject(
				checked.error.issues
					.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
					.join("; "),
				payload
			);
		}

		const { symbol, price, quantity, timestamp, tradeId } = checked.data;
		const observation: Observation = {
			symbol: toCanonicalSymbol(symbol),
			price,
			quantity,
			timestamp,
			...(tradeId !== undefined ? { tradeId } : {}),
		};
		return Object.freeze(observation);
	}

	/** Parses a raw text frame first; unparseable JSON counts as rejected. */
	normalizeMessage(text: string): Observation | null {
		let payload: unknown;
		try {
			payload = JSON.parse(text);
		} catch (error) {
			return this.reject(
				error instanceof Error ? error.message : "invalid_json",
				text
			);
		}
		return this.normalize(payload);
	}

	getRejectedCount(): number {
		return this.rejected;
	}

	private reject(reason: string, payload: unknown): null {
		this.rejected += 1;
		logger.warn("observation_rejected", { reason, payload });
		return null;
	}
}

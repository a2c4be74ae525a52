import WebSocket from "ws";
import {
	createLogger,
	toCanonicalSymbol,
	toStreamSymbol,
	type Bar,
	type MarketDataSource,
	type Observation,
} from "@tickforge/core";
import { BoundedChannel } from "./boundedChannel";
import { Normalizer } from "./normalizer";

const logger = createLogger("ws-observation-source");

const DEFAULT_ENDPOINT = "wss://stream.binance.com:9443/ws";
const DEFAULT_RECONNECT_DELAY_MS = 1_000;
const DEFAULT_BUFFER_SIZE = 10_000;

/** The slice of a `ws` socket this source relies on. */
export interface ObservationSocket {
	on(event: "open", listener: () => void): unknown;
	on(event: "close", listener: () => void): unknown;
	on(event: "message", listener: (data: unknown) => void): unknown;
	on(event: "error", listener: (error: Error) => void): unknown;
	removeAllListeners(): unknown;
	terminate(): void;
}

export type HistoryProvider = Pick<MarketDataSource, "fetchHistory">;

export interface WebSocketObservationSourceOptions {
	endpoint?: string;
	/** Where `fetchHistory` is delegated; streams carry no history. */
	history?: HistoryProvider;
	reconnectDelayMs?: number;
	bufferSize?: number;
	normalizer?: Normalizer;
	createSocket?: (url: string) => ObservationSocket;
}

const rawDataToString = (data: unknown): string | null => {
	if (typeof data === "string") {
		return data;
	}
	if (Buffer.isBuffer(data)) {
		return data.toString("utf8");
	}
	if (Array.isArray(data) && data.every((chunk) => Buffer.isBuffer(chunk))) {
		return Buffer.concat(data).toString("utf8");
	}
	if (data instanceof ArrayBuffer) {
		return Buffer.from(data).toString("utf8");
	}
	return null;
};

/**
 * Streams trades over a WebSocket and reconnects after disconnects. A
 * reconnect gap is just a gap in the observation stream.
 */
export class WebSocketObservationSource implements MarketDataSource {
	private readonly endpoint: string;
	private readonly reconnectDelayMs: number;
	private readonly bufferSize: number;
	private readonly normalizer: Normalizer;
	private readonly createSocket: (url: string) => ObservationSocket;

	constructor(private readonly options: WebSocketObservationSourceOptions = {}) {
		this.endpoint = options.endpoint ?? DEFAULT_ENDPOINT;
		this.reconnectDelayMs =
			options.reconnectDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
		this.bufferSize = options.bufferSize ?? DEFAULT_BUFFER_SIZE;
		this.normalizer = options.normalizer ?? new Normalizer();
		this.createSocket =
			options.createSocket ?? ((url: string) => new WebSocket(url));
	}

	async *subscribe(
		symbol: string,
		signal?: AbortSignal
	): AsyncGenerator<Observation> {
		const canonicalSymbol = toCanonicalSymbol(symbol);
		const url = `${this.endpoint}/${toStreamSymbol(symbol).toLowerCase()}@trade`;
		const channel = new BoundedChannel<Observation>(this.bufferSize);
		let socket: ObservationSocket | null = null;
		let reconnectTimer: ReturnType<typeof setTimeout> | null = null;

		const cleanupSocket = (): void => {
			if (!socket) {
				return;
			}
			socket.removeAllListeners();
			// ws emits "error" after terminating a socket that is still connecting.
			socket.on("error", (error) => {
				logger.debug("ws_closed_while_connecting", { message: error.message });
			});
			try {
				socket.terminate();
			} catch (error) {
				logger.debug("ws_terminate_failed", {
					message: error instanceof Error ? error.message : String(error),
				});
			}
			socket = null;
		};

		const scheduleReconnect = (): void => {
			if (channel.closed || reconnectTimer) {
				return;
			}
			reconnectTimer = setTimeout(() => {
				reconnectTimer = null;
				cleanupSocket();
				connect();
			}, this.reconnectDelayMs);
		};

		const handleMessage = (data: unknown): void => {
			const text = rawDataToString(data);
			if (text === null) {
				logger.warn("ws_frame_unreadable", { symbol: canonicalSymbol });
				return;
			}
			const observation = this.normalizer.normalizeMessage(text);
			if (!observation || observation.symbol !== canonicalSymbol) {
				return;
			}
			if (!channel.trySend(observation)) {
				logger.warn("observation_dropped", {
					symbol: canonicalSymbol,
					buffered: channel.size,
				});
			}
		};

		const connect = (): void => {
			if (channel.closed) {
				return;
			}
			const next = this.createSocket(url);
			socket = next;
			next.on("open", () => {
				logger.info("ws_source_connected", { symbol: canonicalSymbol, url });
			});
			next.on("message", handleMessage);
			next.on("close", () => {
				logger.warn("ws_source_disconnected", { symbol: canonicalSymbol });
				scheduleReconnect();
			});
			next.on("error", (error) => {
				logger.error("ws_source_error", {
					symbol: canonicalSymbol,
					message: error.message,
				});
			});
		};

		const shutdown = (): void => {
			if (reconnectTimer) {
				clearTimeout(reconnectTimer);
				reconnectTimer = null;
			}
			cleanupSocket();
			channel.close();
		};

		if (signal?.aborted) {
			return;
		}
		signal?.addEventListener("abort", shutdown, { once: true });
		connect();

		try {
			for await (const observation of channel) {
				yield observation;
			}
		} finally {
			signal?.removeEventListener("abort", shutdown);
			shutdown();
		}
	}

	async fetchHistory(
		symbol: string,
		timeframe: string,
		startTime: number,
		endTime: number
	): Promise<Bar[]> {
		if (!this.options.history) {
			throw new Error(
				"WebSocketObservationSource has no history provider configured"
			);
		}
		return this.options.history.fetchHistory(
			symbol,
			timeframe,
			startTime,
			endTime
		);
	}
}

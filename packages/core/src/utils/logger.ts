export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFields = Record<string, unknown>;

export interface LogRecord extends LogFields {
	ts: string;
	level: LogLevel;
	event: string;
	module: string;
}

export interface LoggerSettings {
	minLevel: LogLevel;
	/** Only these modules log when set (`LOG_MODULE=a,b`). */
	modules: ReadonlySet<string> | null;
	pretty: boolean;
	json: boolean;
}

const LEVEL_RANK: Record<LogLevel, number> = {
	debug: 10,
	info: 20,
	warn: 30,
	error: 40,
};

const isLogLevel = (value: string): value is LogLevel => value in LEVEL_RANK;

/**
 * Reads `LOG_LEVEL`, `LOG_MODULE`, `LOG_PRETTY` and `LOG_JSON`. Pretty output
 * is on by default in development; JSON lines are on whenever pretty is off.
 */
export const resolveLoggerSettings = (
	env: NodeJS.ProcessEnv = process.env
): LoggerSettings => {
	const level = (env.LOG_LEVEL ?? "").trim().toLowerCase();
	const modules = (env.LOG_MODULE ?? "")
		.split(",")
		.map((value) => value.trim())
		.filter((value) => value.length > 0);
	const pretty = env.LOG_PRETTY === "true" || env.NODE_ENV === "development";
	return {
		minLevel: isLogLevel(level) ? level : "info",
		modules: modules.length ? new Set(modules) : null,
		pretty,
		json: env.LOG_JSON === "true" || !pretty,
	};
};

const settings = resolveLoggerSettings();

const isEnabled = (level: LogLevel, moduleName: string): boolean =>
	LEVEL_RANK[level] >= LEVEL_RANK[settings.minLevel] &&
	(!settings.modules || settings.modules.has(moduleName));

const TABLE_EVENTS = new Set(["signal_emitted", "execution_result", "fill_applied"]);

const printPretty = (record: LogRecord): void => {
	const { ts, level, event, module, ...rest } = record;
	console.log(`[${ts}] [${level.toUpperCase()}] ${module}:${event}`);
	if (TABLE_EVENTS.has(event)) {
		console.table([rest]);
	} else if (Object.keys(rest).length > 0) {
		console.log(rest);
	}
};

const emit = (record: LogRecord): void => {
	if (settings.pretty) {
		try {
			printPretty(record);
		} catch (error) {
			console.warn(
				`[logger] pretty-print failed: ${
					error instanceof Error ? error.message : "unknown"
				}`
			);
		}
	}
	if (!settings.json) {
		return;
	}
	try {
		console.log(JSON.stringify(sanitizeLogValue(record)));
	} catch (error) {
		console.log(
			JSON.stringify({
				ts: record.ts,
				level: "error",
				event: "logging_error",
				module: "logger",
				error: error instanceof Error ? error.message : "serialization_failed",
			})
		);
	}
};

export interface ModuleLogger {
	log: (level: LogLevel, event: string, data?: LogFields) => void;
	debug: (event: string, data?: LogFields) => void;
	info: (event: string, data?: LogFields) => void;
	warn: (event: string, data?: LogFields) => void;
	error: (event: string, data?: LogFields) => void;
	/** Same module, with `context` merged into every record. */
	child: (context: LogFields) => ModuleLogger;
}

export const createLogger = (
	moduleName: string,
	context: LogFields = {}
): ModuleLogger => {
	const write = (level: LogLevel, event: string, data?: LogFields): void => {
		if (!isEnabled(level, moduleName)) {
			return;
		}
		emit({
			ts: new Date().toISOString(),
			...context,
			...data,
			level,
			event,
			module: moduleName,
		});
	};
	return {
		log: write,
		debug: (event, data) => write("debug", event, data),
		info: (event, data) => write("info", event, data),
		warn: (event, data) => write("warn", event, data),
		error: (event, data) => write("error", event, data),
		child: (extra) => createLogger(moduleName, { ...context, ...extra }),
	};
};

/**
 * Turns a caught value into something JSON.stringify can print.
 */
export const describeError = (value: unknown): LogFields => {
	if (value instanceof Error) {
		const described: LogFields = {
			name: value.name,
			message: value.message,
		};
		if ("code" in value && typeof value.code === "string") {
			described.code = value.code;
		}
		return described;
	}
	return { message: String(value) };
};

export const sanitizeLogValue = (
	value: unknown,
	seen: WeakSet<object> = new WeakSet<object>()
): unknown => {
	if (typeof value === "bigint") {
		return value.toString();
	}
	if (typeof value === "function") {
		return "[function]";
	}
	if (typeof value === "number") {
		return Number.isFinite(value) ? value : String(value);
	}
	if (value === null || typeof value !== "object") {
		return value;
	}
	if (value instanceof Error) {
		return { name: value.name, message: value.message, stack: value.stack };
	}
	if (value instanceof Date) {
		return value.toISOString();
	}
	if (seen.has(value)) {
		return "[circular]";
	}
	seen.add(value);
	const result = Array.isArray(value)
		? value.map((item) => sanitizeLogValue(item, seen))
		: Object.fromEntries(
				Object.entries(value).map(([key, nested]) => [
					key,
					sanitizeLogValue(nested, seen),
				])
			);
	seen.delete(value);
	return result;
};

const slashPattern = /[/:_-]/g;

const KNOWN_QUOTES = ["USDT", "USDC", "BUSD", "BTC", "ETH"];

const ensureSlashSymbol = (symbol: string): string => {
	if (symbol.includes("/")) {
		return symbol;
	}
	for (const separator of ["_", "-"]) {
		if (symbol.includes(separator)) {
			const [base, quote] = symbol.split(separator);
			if (base && quote) {
				return `${base}/${quote}`;
			}
		}
	}
	const upper = symbol.toUpperCase();
	const quote = KNOWN_QUOTES.find(
		(candidate) => upper.endsWith(candidate) && upper.length > candidate.length
	);
	if (quote) {
		return `${symbol.slice(0, -quote.length)}/${quote}`;
	}
	return symbol;
};

/** "btcusdt", "BTC_USDT" and "BTC/USDT" all become "BTC/USDT". */
export const toCanonicalSymbol = (symbol: string): string => {
	const trimmed = symbol.trim();
	if (!trimmed) {
		return symbol;
	}
	return ensureSlashSymbol(trimmed).toUpperCase();
};

/** Venue stream form, e.g. "BTC/USDT" becomes "BTCUSDT". */
export const toStreamSymbol = (symbol: string): string =>
	symbol.trim().replace(slashPattern, "").toUpperCase();

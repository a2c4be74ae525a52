export type CrossDirection = "up" | "down" | null;

/**
 * Direction in which `line` crossed `reference` between two consecutive
 * readings. Touching counts on the previous reading only.
 */
export const detectCross = (
	prevLine: number,
	prevReference: number,
	line: number,
	reference: number
): CrossDirection => {
	if (prevLine <= prevReference && line > reference) {
		return "up";
	}
	if (prevLine >= prevReference && line < reference) {
		return "down";
	}
	return null;
};

/** Keeps the previous pair of readings between bars. */
export class CrossTracker {
	private previous: { line: number; reference: number } | null = null;

	update(line: number, reference: number): CrossDirection {
		const prev = this.previous;
		this.previous = { line, reference };
		if (!prev) {
			return null;
		}
		return detectCross(prev.line, prev.reference, line, reference);
	}

	reset(): void {
		this.previous = null;
	}
}

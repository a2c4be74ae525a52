interface DequeEntry {
	index: number;
	value: number;
}

/**
 * Sliding-window extreme. `compare(a, b)` returns true when `a` should
 * evict `b` from the back, so `(a, b) => a >= b` tracks the maximum.
 */
export class MonotonicDeque {
	private entries: DequeEntry[] = [];
	private head = 0;

	constructor(private readonly compare: (a: number, b: number) => boolean) {}

	push(index: number, value: number): void {
		while (
			this.entries.length > this.head &&
			this.compare(value, this.entries[this.entries.length - 1].value)
		) {
			this.entries.pop();
		}
		this.entries.push({ index, value });
	}

	/** Drop entries whose index is below `minIndex`. */
	expire(minIndex: number): void {
		while (
			this.head < this.entries.length &&
			this.entries[this.head].index < minIndex
		) {
			this.head += 1;
		}
		if (this.head > 64 && this.head * 2 > this.entries.length) {
			this.entries = this.entries.slice(this.head);
			this.head = 0;
		}
	}

	peek(): number | undefined {
		return this.head < this.entries.length
			? this.entries[this.head].value
			: undefined;
	}
}

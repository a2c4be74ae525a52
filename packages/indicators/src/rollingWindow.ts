/**
 * Fixed-capacity ring buffer keeping a running sum and sum of squares.
 */
export class RollingWindow {
	private readonly buffer: Float64Array;
	private index = 0;
	private count = 0;
	private runningSum = 0;
	private runningSumSquares = 0;

	constructor(private readonly capacity: number) {
		this.buffer = new Float64Array(capacity);
	}

	push(value: number): number | undefined {
		let evicted: number | undefined;
		if (this.count === this.capacity) {
			evicted = this.buffer[this.index];
			this.runningSum -= evicted;
			this.runningSumSquares -= evicted * evicted;
		} else {
			this.count += 1;
		}
		this.buffer[this.index] = value;
		this.index = (this.index + 1) % this.capacity;
		this.runningSum += value;
		this.runningSumSquares += value * value;
		return evicted;
	}

	isFull(): boolean {
		return this.count === this.capacity;
	}

	get size(): number {
		return this.count;
	}

	get sum(): number {
		return this.runningSum;
	}

	get sumSquares(): number {
		return this.runningSumSquares;
	}
}

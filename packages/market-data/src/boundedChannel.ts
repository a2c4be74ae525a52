export class ChannelClosedError extends Error {
	constructor() {
		super("Channel is closed");
		this.name = "ChannelClosedError";
	}
}

interface PendingSend<T> {
	item: T;
	resolve: () => void;
	reject: (error: Error) => void;
}

/**
 * FIFO channel with a fixed buffer. `send` waits while the buffer is full;
 * `trySend` reports failure instead. Items buffered before `close` are
 * still delivered.
 */
export class BoundedChannel<T> implements AsyncIterable<T> {
	private readonly buffer: T[] = [];
	private readonly receivers: Array<(result: IteratorResult<T>) => void> = [];
	private readonly senders: Array<PendingSend<T>> = [];
	private isClosed = false;

	constructor(private readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 1) {
			throw new Error(
				`Channel capacity must be a positive integer, got ${capacity}`
			);
		}
	}

	get size(): number {
		return this.buffer.length;
	}

	get closed(): boolean {
		return this.isClosed;
	}

	trySend(item: T): boolean {
		if (this.isClosed) {
			return false;
		}
		const receiver = this.receivers.shift();
		if (receiver) {
			receiver({ done: false, value: item });
			return true;
		}
		if (this.buffer.length < this.capacity) {
			this.buffer.push(item);
			return true;
		}
		return false;
	}

	send(item: T): Promise<void> {
		if (this.isClosed) {
			return Promise.reject(new ChannelClosedError());
		}
		if (this.trySend(item)) {
			return Promise.resolve();
		}
		return new Promise<void>((resolve, reject) => {
			this.senders.push({ item, resolve, reject });
		});
	}

	receive(): Promise<IteratorResult<T>> {
		if (this.buffer.length > 0) {
			const value = this.buffer[0];
			this.buffer.shift();
			this.admitWaitingSender();
			return Promise.resolve({ done: false, value });
		}
		if (this.isClosed) {
			return Promise.resolve({ done: true, value: undefined });
		}
		return new Promise((resolve) => {
			this.receivers.push(resolve);
		});
	}

	close(): void {
		if (this.isClosed) {
			return;
		}
		this.isClosed = true;
		for (const receiver of this.receivers.splice(0)) {
			receiver({ done: true, value: undefined });
		}
		for (const sender of this.senders.splice(0)) {
			sender.reject(new ChannelClosedError());
		}
	}

	[Symbol.asyncIterator](): AsyncIterator<T> {
		return {
			next: () => this.receive(),
		};
	}

	private admitWaitingSender(): void {
		const sender = this.senders.shift();
		if (!sender) {
			return;
		}
		this.buffer.push(sender.item);
		sender.resolve();
	}
}

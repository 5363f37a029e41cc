interface Reader<T> {
	resolve: (result: IteratorResult<T>) => void;
}

/**
 * Unbounded single-consumer queue exposed as an async iterator.
 *
 * Values pushed before anyone reads are buffered. After `close()` the
 * buffer drains and then every read reports done. Iterating a second
 * time continues the same sequence; it never starts over.
 */
export class EventChannel<T> implements AsyncIterableIterator<T> {
	private readonly buffer: T[] = [];
	private readonly readers: Reader<T>[] = [];
	private closed = false;

	get isClosed(): boolean {
		return this.closed;
	}

	get pending(): number {
		return this.buffer.length;
	}

	push(value: T): boolean {
		if (this.closed) return false;
		const reader = this.readers.shift();
		if (reader) {
			reader.resolve({ value, done: false });
		} else {
			this.buffer.push(value);
		}
		return true;
	}

	close(): void {
		if (this.closed) return;
		this.closed = true;
		for (const reader of this.readers.splice(0)) {
			reader.resolve({ value: undefined, done: true });
		}
	}

	next(): Promise<IteratorResult<T>> {
		if (this.buffer.length > 0) {
			const [value] = this.buffer.splice(0, 1);
			return Promise.resolve({ value, done: false });
		}
		if (this.closed) {
			return Promise.resolve({ value: undefined, done: true });
		}
		return new Promise((resolve) => {
			this.readers.push({ resolve });
		});
	}

	/** Called when a `for await` loop exits early: drop the rest. */
	return(): Promise<IteratorResult<T>> {
		this.buffer.length = 0;
		this.close();
		return Promise.resolve({ value: undefined, done: true });
	}

	[Symbol.asyncIterator](): AsyncIterableIterator<T> {
		return this;
	}
}

/**
 * BoundedLog - append-only history that drops its oldest entries past a capacity
 *
 * Appends and reads are synchronous, so on Node's single thread every append is
 * applied whole; concurrent requests interleave entries but never lose them.
 */
export class BoundedLog<T> {
	private entries: T[] = []
	private readonly capacity: number

	constructor(capacity: number) {
		if (!Number.isInteger(capacity) || capacity <= 0) {
			throw new Error(`BoundedLog capacity must be a positive integer, got ${capacity}`)
		}
		this.capacity = capacity
	}

	append(entry: T): void {
		this.entries.push(entry)
		if (this.entries.length > this.capacity) {
			this.entries.splice(0, this.entries.length - this.capacity)
		}
	}

	/**
	 * Copy of the entries, oldest first
	 */
	toArray(): T[] {
		return [...this.entries]
	}

	/**
	 * The newest `count` entries, oldest first
	 */
	recent(count: number): T[] {
		return count <= 0 ? [] : this.entries.slice(-count)
	}

	filter(predicate: (entry: T) => boolean): T[] {
		return this.entries.filter(predicate)
	}

	get size(): number {
		return this.entries.length
	}

	get maxSize(): number {
		return this.capacity
	}

	clear(): void {
		this.entries = []
	}
}

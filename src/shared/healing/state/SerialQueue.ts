/**
 * SerialQueue - runs async tasks one at a time, in submission order
 *
 * Used around read-modify-write sequences on shared stores (knowledge success rates,
 * proposal status transitions) so that concurrent requests cannot interleave between
 * the read and the write.
 */
export class SerialQueue {
	private tail: Promise<void> = Promise.resolve()
	private pending = 0

	run<T>(task: () => Promise<T>): Promise<T> {
		this.pending++
		const result = this.tail.then(task)
		// The chain must survive a failed task; the caller still sees the rejection
		this.tail = result.then(
			() => {
				this.pending--
			},
			() => {
				this.pending--
			},
		)
		return result
	}

	/**
	 * Tasks submitted and not yet settled
	 */
	get size(): number {
		return this.pending
	}
}

/**
 * Holds the most recent checkpoint, if it is still safe to emit.
 *
 * A checkpoint goes stale as soon as a record follows it, so every record
 * clears the slot. There is no queue: a newer checkpoint replaces the old one.
 */
export class CheckpointSlot {
	private value: unknown = null;
	private filled = false;

	/** Replace the pending checkpoint. */
	set(value: unknown): void {
		this.value = value;
		this.filled = true;
	}

	/** Drop the pending checkpoint. */
	clear(): void {
		this.value = null;
		this.filled = false;
	}

	/** The pending checkpoint, or `null` when there is none. */
	take(): unknown {
		return this.filled ? this.value : null;
	}
}

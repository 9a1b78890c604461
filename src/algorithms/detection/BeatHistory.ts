import { diff } from '../statistics/descriptive';

/**
 * Bounded FIFO of accepted beat timestamps (seconds).
 *
 * One writer (the outlier filter); everything else reads through
 * `snapshot()`, which hands out a frozen copy.
 */
export class BeatHistory {
	private beats: number[] = [];
	private version = 0;

	constructor(readonly capacity: number) {
		if (!Number.isInteger(capacity) || capacity < 2) {
			throw new RangeError('BeatHistory capacity must be an integer of at least 2');
		}
	}

	get length(): number {
		return this.beats.length;
	}

	/** Number of writes since construction; lets readers detect stale snapshots. */
	get revision(): number {
		return this.version;
	}

	last(): number | null {
		return this.beats.length > 0 ? this.beats[this.beats.length - 1] : null;
	}

	/** Append and evict the oldest entries beyond capacity. */
	push(timestamp: number): void {
		this.beats.push(timestamp);
		if (this.beats.length > this.capacity) {
			this.beats = this.beats.slice(-this.capacity);
		}
		this.version++;
	}

	intervals(): number[] {
		return diff(this.beats);
	}

	isFull(): boolean {
		return this.beats.length === this.capacity;
	}

	snapshot(): readonly number[] {
		return Object.freeze([...this.beats]);
	}

	clear(): void {
		this.beats = [];
		this.version++;
	}
}

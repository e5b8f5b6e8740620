/**
 * Paused/running flag for one stream subscription. Transitions go through
 * `compareAndSet`, so a second pause (or resume) is a no-op.
 */
export class ConsumerPauseState {
	private paused = false;

	isPaused(): boolean {
		return this.paused;
	}

	compareAndSet(expected: boolean, next: boolean): boolean {
		if (this.paused !== expected) {
			return false;
		}
		this.paused = next;
		return true;
	}
}

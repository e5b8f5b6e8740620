/**
 * Raised by the stream runtime when it is asked to do something its
 * lifecycle does not allow (running twice, running before connect).
 */
export class ConsumerStateError extends Error {
	readonly code = "CONSUMER_STATE";

	constructor(message: string) {
		super(message);
		this.name = "ConsumerStateError";
	}
}

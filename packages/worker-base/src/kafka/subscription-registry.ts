import { Injectable } from "@nestjs/common";

/**
 * The only capability backpressure needs from a stream listener
 */
export interface PausableSubscription {
	pause(): void;
	resume(): void;
}

/**
 * Live stream listeners by id (the consumer group id for Kafka listeners)
 */
@Injectable()
export class SubscriptionRegistry {
	private readonly subscriptions = new Map<string, PausableSubscription>();

	register(id: string, subscription: PausableSubscription): void {
		this.subscriptions.set(id, subscription);
	}

	unregister(id: string): void {
		this.subscriptions.delete(id);
	}

	get(id: string): PausableSubscription | undefined {
		return this.subscriptions.get(id);
	}

	ids(): string[] {
		return [...this.subscriptions.keys()];
	}
}

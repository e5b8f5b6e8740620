export interface RecurringTaskOptions {
	name: string;
	periodMs: number;
	/** Delay before the first run; defaults to `periodMs` */
	initialDelayMs?: number;
	run: (signal: AbortSignal) => Promise<void>;
	onError: (error: unknown) => void;
}

/**
 * Fixed-delay ticker: the next run is scheduled only after the previous one
 * settles, so runs never overlap. `stop()` aborts the signal handed to the
 * current run and waits for it to finish.
 */
export class RecurringTask {
	private controller: AbortController | undefined;
	private timer: NodeJS.Timeout | undefined;
	private inFlight: Promise<void> | undefined;

	constructor(private readonly options: RecurringTaskOptions) {}

	get name(): string {
		return this.options.name;
	}

	isStarted(): boolean {
		return this.controller !== undefined;
	}

	start(): void {
		if (this.controller) return;
		const controller = new AbortController();
		this.controller = controller;
		this.schedule(
			controller.signal,
			this.options.initialDelayMs ?? this.options.periodMs,
		);
	}

	async stop(): Promise<void> {
		const controller = this.controller;
		if (!controller) return;
		this.controller = undefined;
		controller.abort();
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = undefined;
		}
		await this.inFlight;
	}

	private schedule(signal: AbortSignal, delayMs: number): void {
		this.timer = setTimeout(() => {
			this.timer = undefined;
			this.inFlight = this.tick(signal);
		}, delayMs);
		this.timer.unref();
	}

	private async tick(signal: AbortSignal): Promise<void> {
		try {
			await this.options.run(signal);
		} catch (error) {
			this.options.onError(error);
		} finally {
			this.inFlight = undefined;
		}
		if (!signal.aborted) {
			this.schedule(signal, this.options.periodMs);
		}
	}
}

import type { ModuleLogger } from "@tradeloop/core";

/**
 * Runs `task` back to back with `intervalMs` of idle time between the end of
 * one run and the start of the next, so runs never overlap.
 */
export class PeriodicTask {
	private running = false;
	private timer: ReturnType<typeof setTimeout> | null = null;
	private inFlight: Promise<void> | null = null;

	constructor(
		private readonly name: string,
		private readonly intervalMs: number,
		private readonly task: () => Promise<unknown>,
		private readonly logger: ModuleLogger
	) {}

	get isRunning(): boolean {
		return this.running;
	}

	start(): void {
		if (this.running) {
			throw new Error(`${this.name} already running`);
		}
		this.running = true;
		this.logger.info("periodic_task_started", {
			task: this.name,
			intervalMs: this.intervalMs,
		});
		this.runOnce();
	}

	/** Stops scheduling and waits for the run in progress, if any. */
	async stop(): Promise<void> {
		if (!this.running) {
			return;
		}
		this.running = false;
		if (this.timer) {
			clearTimeout(this.timer);
			this.timer = null;
		}
		if (this.inFlight) {
			await this.inFlight;
		}
		this.logger.info("periodic_task_stopped", { task: this.name });
	}

	private runOnce(): void {
		this.inFlight = this.task()
			.then(
				() => undefined,
				(error: unknown) => {
					this.logger.error("periodic_task_failed", {
						task: this.name,
						error: error instanceof Error ? error.message : String(error),
					});
				}
			)
			.finally(() => {
				this.inFlight = null;
				this.schedule();
			});
	}

	private schedule(): void {
		if (!this.running) {
			return;
		}
		this.timer = setTimeout(() => {
			this.timer = null;
			this.runOnce();
		}, this.intervalMs);
	}
}

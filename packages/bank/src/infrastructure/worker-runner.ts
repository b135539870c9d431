// =============================================================================
// WORKER RUNNER -- Background workers of a bank instance
// =============================================================================
// Runs the reservation expiry sweep, replay-guard cleanup and transfer
// recovery on a polling loop. Each worker waits for its previous run before
// scheduling the next one.

import type { CoreWorkerOptions } from "@clearline/core";
import { errorMessage, parseInterval, withJitter } from "@clearline/core";
import type { BankContext } from "../context/context.js";
import { recoverTransfers } from "../coordinator/coordinator.js";
import { expireParticipantReservations } from "../participant/participant.js";
import { cleanupProcessedMessages } from "../protocol/replay-guard.js";

export interface BankWorkerDefinition {
	id: string;
	description: string;
	/** Interval string such as "5s", "1m", "1h" */
	interval: string;
	handler: (ctx: BankContext) => Promise<void>;
}

interface RunningWorker {
	definition: BankWorkerDefinition;
	intervalMs: number;
	timer: ReturnType<typeof setTimeout> | null;
	running: boolean;
}

const SHUTDOWN_TIMEOUT_MS = 10_000;

function workerInterval(cfg: boolean | { interval?: string }, fallback: string): string {
	return typeof cfg === "object" ? (cfg.interval ?? fallback) : fallback;
}

/** Core worker definitions enabled by `cfg`. Every worker is on unless set to `false`. */
export function buildCoreWorkers(cfg: CoreWorkerOptions = {}): BankWorkerDefinition[] {
	const workers: BankWorkerDefinition[] = [];

	const expiryCfg = cfg.reservationExpiry ?? true;
	if (expiryCfg !== false) {
		workers.push({
			id: "core:reservation-expiry",
			description: "Core: release credit reservations past their deadline",
			interval: workerInterval(expiryCfg, "5s"),
			handler: async (ctx) => {
				await expireParticipantReservations(ctx);
			},
		});
	}

	const cleanupCfg = cfg.replayCleanup ?? true;
	if (cleanupCfg !== false) {
		workers.push({
			id: "core:replay-cleanup",
			description: "Core: forget processed messages older than the replay window",
			interval: workerInterval(cleanupCfg, "1h"),
			handler: async (ctx) => {
				await cleanupProcessedMessages(ctx);
			},
		});
	}

	const recoveryCfg = cfg.transferRecovery ?? true;
	if (recoveryCfg !== false) {
		workers.push({
			id: "core:transfer-recovery",
			description: "Core: resume transfers left INITIATED or PREPARED",
			interval: workerInterval(recoveryCfg, "30s"),
			handler: async (ctx) => {
				await recoverTransfers(ctx);
			},
		});
	}

	return workers;
}

export class BankWorkerRunner {
	private readonly ctx: BankContext;
	private readonly workers: RunningWorker[] = [];
	private started = false;
	private stopped = false;

	constructor(ctx: BankContext) {
		this.ctx = ctx;
	}

	start(): void {
		if (this.started) {
			throw new Error("BankWorkerRunner is already started");
		}
		this.started = true;

		const definitions = buildCoreWorkers(this.ctx.options.coreWorkers);
		if (definitions.length === 0) {
			this.ctx.logger.info("No workers registered");
			return;
		}

		this.ctx.logger.info("Starting worker runner", {
			workerCount: definitions.length,
			workers: definitions.map((w) => w.id),
		});

		for (const definition of definitions) {
			const worker: RunningWorker = {
				definition,
				intervalMs: parseInterval(definition.interval),
				timer: null,
				running: false,
			};
			this.workers.push(worker);
			this.scheduleNext(worker);
		}
	}

	async stop(): Promise<void> {
		if (this.stopped) return;
		this.stopped = true;

		this.ctx.logger.info("Stopping worker runner");

		for (const worker of this.workers) {
			if (worker.timer !== null) {
				clearTimeout(worker.timer);
				worker.timer = null;
			}
		}

		const runningWorkers = this.workers.filter((w) => w.running);
		if (runningWorkers.length === 0) return;

		this.ctx.logger.info("Waiting for running workers to finish", {
			count: runningWorkers.length,
			workers: runningWorkers.map((w) => w.definition.id),
		});

		let deadline: ReturnType<typeof setTimeout> | null = null;
		await Promise.race([
			Promise.all(
				runningWorkers.map(
					(w) =>
						new Promise<void>((resolve) => {
							const check = () => {
								if (!w.running) return resolve();
								setTimeout(check, 50);
							};
							check();
						}),
				),
			),
			new Promise<void>((resolve) => {
				deadline = setTimeout(() => {
					this.ctx.logger.warn("Worker shutdown timed out, proceeding", {
						stillRunning: runningWorkers.filter((w) => w.running).map((w) => w.definition.id),
					});
					resolve();
				}, SHUTDOWN_TIMEOUT_MS);
			}),
		]);
		if (deadline !== null) clearTimeout(deadline);
	}

	private scheduleNext(worker: RunningWorker): void {
		if (this.stopped) return;

		const delay = withJitter(worker.intervalMs);
		worker.timer = setTimeout(() => {
			void this.executeWorker(worker);
		}, delay);
	}

	private async executeWorker(worker: RunningWorker): Promise<void> {
		if (this.stopped || worker.running) return;

		worker.running = true;
		try {
			await worker.definition.handler(this.ctx);
		} catch (error) {
			this.ctx.logger.error("Worker execution failed", {
				workerId: worker.definition.id,
				error: errorMessage(error),
			});
		} finally {
			worker.running = false;
			this.scheduleNext(worker);
		}
	}
}

export function createWorkerRunner(ctx: BankContext): BankWorkerRunner {
	return new BankWorkerRunner(ctx);
}

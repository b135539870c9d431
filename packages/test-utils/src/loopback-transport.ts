// =============================================================================
// LOOPBACK TRANSPORT -- In-process delivery between banks of one test network
// =============================================================================
// Envelopes travel through each bank's real request handler as JSON, so a
// test exercises the same parsing and error mapping as the HTTP path. Faults
// drop a request before delivery or its reply after processing.

import type { Bank } from "@clearline/bank";
import { handleRequest } from "@clearline/bank";
import type { ParticipantTransport, RequestEnvelope, RequestType } from "@clearline/core";
import { ClearlineError, isBaseErrorCode } from "@clearline/core";

export interface LoopbackFault {
	/** Only messages addressed to this instance. Default: any */
	to?: string;
	/** Only messages of this type. Default: any */
	type?: RequestType;
	/** `request`: never delivered. `reply`: processed, reply lost. */
	drop: "request" | "reply";
	/** How many matching messages are affected. Default: 1 */
	times?: number;
}

export interface DeliveredMessage {
	to: string;
	envelope: RequestEnvelope;
	/** The message reached the participant's handler */
	delivered: boolean;
	/** HTTP status of the participant's answer, null when dropped before delivery */
	status: number | null;
}

export interface LoopbackTransport extends ParticipantTransport {
	/** Make an instance reachable at `address`. */
	attach(address: string, bank: Bank): void;
	/** Make the instance at `address` unreachable. */
	detach(address: string): void;
	addFault(fault: LoopbackFault): void;
	clearFaults(): void;
	/** Every message handed to the transport, in order. */
	readonly log: DeliveredMessage[];
}

interface ActiveFault extends LoopbackFault {
	remaining: number;
}

function errorBody(body: unknown): { code: string; message: string } | null {
	if (typeof body !== "object" || body === null || !("error" in body)) return null;
	const { error } = body;
	if (typeof error !== "object" || error === null) return null;
	const code = "code" in error && typeof error.code === "string" ? error.code : "INTERNAL";
	const message = "message" in error && typeof error.message === "string" ? error.message : "";
	return { code, message };
}

/** What the receiving side would see after JSON encoding over the wire. */
function overTheWire(value: unknown): unknown {
	return JSON.parse(JSON.stringify(value));
}

export function createLoopbackTransport(): LoopbackTransport {
	const banks = new Map<string, Bank>();
	const faults: ActiveFault[] = [];
	const log: DeliveredMessage[] = [];

	const takeFault = (instanceId: string, envelope: RequestEnvelope): ActiveFault | null => {
		const fault = faults.find(
			(f) =>
				f.remaining > 0 &&
				(f.to === undefined || f.to === instanceId) &&
				(f.type === undefined || f.type === envelope.type),
		);
		if (!fault) return null;
		fault.remaining--;
		return fault;
	};

	return {
		log,

		attach(address, bank) {
			banks.set(address, bank);
		},

		detach(address) {
			banks.delete(address);
		},

		addFault(fault) {
			faults.push({ ...fault, remaining: fault.times ?? 1 });
		},

		clearFaults() {
			faults.length = 0;
		},

		async send(address, envelope) {
			const bank = banks.get(address);
			const to = bank?.info().instanceId ?? address;
			const entry: DeliveredMessage = { to, envelope, delivered: false, status: null };
			log.push(entry);

			if (!bank) {
				throw ClearlineError.remoteUnreachable(`Participant at ${address} unreachable: connection refused`);
			}
			const fault = takeFault(to, envelope);
			if (fault?.drop === "request") {
				throw ClearlineError.remoteUnreachable(`Participant at ${address} unreachable: request lost`);
			}

			const res = await handleRequest(bank, {
				method: "POST",
				path: "/protocol/messages",
				body: overTheWire(envelope),
				query: {},
			});
			entry.delivered = true;
			entry.status = res.status;

			if (fault?.drop === "reply") {
				throw ClearlineError.remoteUnreachable(`Participant at ${address} unreachable: reply lost`);
			}
			if (res.status >= 400 && res.status < 500) {
				const error = errorBody(res.body);
				const code = error && isBaseErrorCode(error.code) ? error.code : "INTERNAL";
				throw new ClearlineError(code, error?.message ?? `HTTP ${res.status}`, { status: res.status });
			}
			if (res.status >= 500) {
				throw ClearlineError.remoteUnreachable(`Participant at ${address} answered ${res.status}`);
			}
			return overTheWire(res.body);
		},
	};
}

import type { Account, PreparePayload } from "@clearline/core";
import { generateId, MODELS } from "@clearline/core";
import { createTestNetwork, type TestNetwork } from "@clearline/test-utils";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { handleRequest } from "../api/handler.js";
import { createSigner, generateKeyPair } from "../identity/index.js";
import { sealMessage, verifyEnvelope } from "../protocol/messages.js";

describe("participant", () => {
	let network: TestNetwork;
	let credited: Account;

	const origin = () => network.bank("BANKA").$context.identity;
	const participant = () => network.bank("BANKB");

	const preparePayload = (amount = 250): PreparePayload => ({
		sourceAccountId: "source-account",
		destinationInstanceId: "BANKB",
		destinationAccountId: credited.id,
		amount,
	});

	beforeEach(async () => {
		network = await createTestNetwork();
		credited = await participant().accounts.create({ ownerId: "owner-b", ownerName: "Bob" });
	});

	afterEach(async () => {
		await network.cleanup();
	});

	// =========================================================================
	// PREPARE
	// =========================================================================

	describe("PREPARE", () => {
		it("reserves the credit and answers with a signed ACK", async () => {
			const transferId = generateId();
			const request = sealMessage(origin(), "PREPARE", transferId, preparePayload());

			const reply = await participant().protocol.handle(request);

			expect(reply.type).toBe("ACK");
			expect(reply.senderId).toBe("BANKB");
			expect(reply.transferId).toBe(transferId);
			expect(reply.payload).toEqual({ inReplyTo: request.nonce, decision: "RESERVED" });
			expect(await verifyEnvelope(origin(), reply)).toBe(true);

			const balance = await participant().accounts.getBalance(credited.id);
			expect(balance).toMatchObject({ balance: 0, pendingCredit: 250 });
			const decision = await participant().protocol.getDecision(transferId);
			expect(decision).toMatchObject({ state: "RESERVED", originInstanceId: "BANKA", amount: 250 });
		});

		it("refuses an unknown destination account and remembers the refusal", async () => {
			const transferId = generateId();
			const payload = { ...preparePayload(), destinationAccountId: "6f9619ff-8b86-4d01-b42d-00c04fc964ff" };

			const reply = await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, payload));

			expect(reply.type).toBe("NACK");
			expect(reply.payload).toMatchObject({ decision: "RELEASED", reason: "ACCOUNT_NOT_FOUND" });
			const decision = await participant().protocol.getDecision(transferId);
			expect(decision?.state).toBe("RELEASED");
		});

		it("refuses a canceled destination account", async () => {
			const closed = await participant().accounts.create({ ownerId: "owner-c", ownerName: "Carol" });
			await participant().accounts.cancel(closed.id);
			const payload = { ...preparePayload(), destinationAccountId: closed.id };

			const reply = await participant().protocol.handle(sealMessage(origin(), "PREPARE", generateId(), payload));

			expect(reply.payload).toMatchObject({ decision: "RELEASED", reason: "ACCOUNT_INACTIVE" });
		});

		it("refuses a PREPARE meant for another instance without recording it", async () => {
			const transferId = generateId();
			const payload = { ...preparePayload(), destinationInstanceId: "BANKC" };

			const reply = await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, payload));

			expect(reply.type).toBe("NACK");
			expect(reply.payload).toMatchObject({ decision: "NONE", reason: "WRONG_INSTANCE" });
			expect(await participant().protocol.getDecision(transferId)).toBeNull();
		});

		it("holds the credit once when two PREPAREs race", async () => {
			const transferId = generateId();
			const first = sealMessage(origin(), "PREPARE", transferId, preparePayload());
			const second = sealMessage(origin(), "PREPARE", transferId, preparePayload());

			const replies = await Promise.all([
				participant().protocol.handle(first),
				participant().protocol.handle(second),
			]);

			expect(replies.map((r) => r.payload.decision)).toEqual(["RESERVED", "RESERVED"]);
			const balance = await participant().accounts.getBalance(credited.id);
			expect(balance.pendingCredit).toBe(250);
		});

		it("answers CONFLICT to a second PREPARE with different terms", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload(250)));

			const reply = await participant().protocol.handle(
				sealMessage(origin(), "PREPARE", transferId, preparePayload(999)),
			);

			expect(reply.type).toBe("NACK");
			expect(reply.payload).toMatchObject({ decision: "RESERVED", reason: "CONFLICT" });
		});
	});

	// =========================================================================
	// REPLAY & AUTHENTICITY
	// =========================================================================

	describe("replay guard", () => {
		it("returns the recorded reply for a re-delivered envelope", async () => {
			const request = sealMessage(origin(), "PREPARE", generateId(), preparePayload());

			const first = await participant().protocol.handle(request);
			const second = await participant().protocol.handle(request);

			expect(second).toEqual(first);
			const balance = await participant().accounts.getBalance(credited.id);
			expect(balance.pendingCredit).toBe(250);
		});

		it("returns the recorded reply for a re-delivered COMMIT without crediting twice", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));
			const commit = sealMessage(origin(), "COMMIT", transferId, {});

			const first = await participant().protocol.handle(commit);
			const second = await participant().protocol.handle(commit);

			expect(first.payload).toEqual({ inReplyTo: commit.nonce, decision: "APPLIED" });
			expect(second).toEqual(first);
			const balance = await participant().accounts.getBalance(credited.id);
			expect(balance).toMatchObject({ balance: 250, pendingCredit: 0 });
			const entries = await participant().accounts.listEntries(credited.id);
			expect(entries.total).toBe(1);
		});

		it("returns the recorded reply for a re-delivered ABORT", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));
			const abort = sealMessage(origin(), "ABORT", transferId, { reason: "PREPARE_TIMEOUT" });

			const first = await participant().protocol.handle(abort);
			const second = await participant().protocol.handle(abort);

			expect(first.payload).toEqual({ inReplyTo: abort.nonce, decision: "RELEASED" });
			expect(second).toEqual(first);
			const balance = await participant().accounts.getBalance(credited.id);
			expect(balance).toMatchObject({ balance: 0, pendingCredit: 0 });
			const decision = await participant().protocol.getDecision(transferId);
			expect(decision).toMatchObject({ state: "RELEASED", reason: "PREPARE_TIMEOUT" });
		});

		it("rejects a reused nonce carrying a different message", async () => {
			const transferId = generateId();
			const request = sealMessage(origin(), "PREPARE", transferId, preparePayload(250));
			await participant().protocol.handle(request);

			const replayed = sealMessage(origin(), "PREPARE", transferId, preparePayload(500), request.nonce);

			await expect(participant().protocol.handle(replayed)).rejects.toMatchObject({
				code: "REPLAY_DETECTED",
			});
		});

		it("forgets processed messages once the replay window has passed", async () => {
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", generateId(), preparePayload()));

			expect(await participant().protocol.cleanupProcessed()).toEqual({ deleted: 0 });
			network.clock.advance(24 * 60 * 60 * 1000 + 1);
			expect(await participant().protocol.cleanupProcessed()).toEqual({ deleted: 1 });
		});
	});

	describe("signature checks", () => {
		it("rejects an envelope whose payload was altered after signing", async () => {
			const request = sealMessage(origin(), "PREPARE", generateId(), preparePayload(250));
			const tampered = { ...request, payload: { ...request.payload, amount: 25_000 } };

			await expect(participant().protocol.handle(tampered)).rejects.toMatchObject({
				code: "SIGNATURE_INVALID",
			});
			const balance = await participant().accounts.getBalance(credited.id);
			expect(balance.pendingCredit).toBe(0);
		});

		it("rejects a COMMIT relabelled as ABORT", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));
			const commit = sealMessage(origin(), "COMMIT", transferId, {});

			await expect(participant().protocol.handle({ ...commit, type: "ABORT" })).rejects.toMatchObject({
				code: "SIGNATURE_INVALID",
			});
		});

		it("rejects a sender that is not registered", async () => {
			const keys = generateKeyPair();
			const stranger = createSigner({ instanceId: "BANKX", privateKey: keys.privateKey, publicKey: keys.publicKey });
			const request = sealMessage(stranger, "PREPARE", generateId(), preparePayload());

			await expect(participant().protocol.handle(request)).rejects.toMatchObject({
				code: "SIGNATURE_INVALID",
			});
		});

		it("rejects a message signed with someone else's key", async () => {
			const keys = generateKeyPair();
			const impostor = createSigner({ instanceId: "BANKA", privateKey: keys.privateKey, publicKey: keys.publicKey });
			const request = sealMessage(impostor, "PREPARE", generateId(), preparePayload());

			await expect(participant().protocol.handle(request)).rejects.toMatchObject({
				code: "SIGNATURE_INVALID",
			});
		});

		it("rejects replies sent as requests", async () => {
			const reply = sealMessage(origin(), "ACK", generateId(), { inReplyTo: "n", decision: "NONE" });

			await expect(participant().protocol.handle(reply)).rejects.toMatchObject({
				code: "INVALID_ARGUMENT",
			});
		});

		it("maps rejections to HTTP statuses on the protocol endpoint", async () => {
			const request = sealMessage(origin(), "PREPARE", generateId(), preparePayload());
			const tampered = { ...request, payload: { ...request.payload, amount: 1 } };

			const forged = await handleRequest(participant(), {
				method: "POST",
				path: "/protocol/messages",
				body: tampered,
				query: {},
			});
			expect(forged.status).toBe(401);
			expect(forged.body).toMatchObject({ error: { code: "SIGNATURE_INVALID" } });

			const malformed = await handleRequest(participant(), {
				method: "POST",
				path: "/protocol/messages",
				body: { type: "PREPARE" },
				query: {},
			});
			expect(malformed.status).toBe(400);
			expect(malformed.body).toMatchObject({ error: { code: "INVALID_ARGUMENT" } });
		});
	});

	// =========================================================================
	// COMMIT / ABORT / QUERY
	// =========================================================================

	describe("COMMIT", () => {
		it("applies a reserved credit", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));

			const reply = await participant().protocol.handle(sealMessage(origin(), "COMMIT", transferId, {}));

			expect(reply.type).toBe("ACK");
			expect(reply.payload.decision).toBe("APPLIED");
			const balance = await participant().accounts.getBalance(credited.id);
			expect(balance).toMatchObject({ balance: 250, pendingCredit: 0 });
		});

		it("acknowledges a second COMMIT without crediting again", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));
			await participant().protocol.handle(sealMessage(origin(), "COMMIT", transferId, {}));

			const again = await participant().protocol.handle(sealMessage(origin(), "COMMIT", transferId, {}));

			expect(again.payload.decision).toBe("APPLIED");
			const balance = await participant().accounts.getBalance(credited.id);
			expect(balance.balance).toBe(250);
		});

		it("refuses a COMMIT for a transfer it never prepared", async () => {
			const reply = await participant().protocol.handle(sealMessage(origin(), "COMMIT", generateId(), {}));

			expect(reply.type).toBe("NACK");
			expect(reply.payload).toMatchObject({ decision: "NONE", reason: "CONFLICT" });
		});

		it("exposes the credit hold of a prepared transfer", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));

			expect(await participant().transfers.getReservation(transferId, "credit")).toMatchObject({
				transferId,
				accountId: credited.id,
				direction: "credit",
				amount: 250,
				status: "held",
			});
			expect(await participant().transfers.getReservation(transferId, "debit")).toBeNull();

			await participant().protocol.handle(sealMessage(origin(), "COMMIT", transferId, {}));
			expect((await participant().transfers.getReservation(transferId, "credit"))?.status).toBe("applied");
		});

		it("refuses a COMMIT whose credit reservation is gone", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));
			await participant().$context.adapter.delete({
				model: MODELS.reservation,
				where: [{ field: "transferId", operator: "eq", value: transferId }],
			});

			const reply = await participant().protocol.handle(sealMessage(origin(), "COMMIT", transferId, {}));

			expect(reply.type).toBe("NACK");
			expect(reply.payload).toMatchObject({ decision: "RELEASED", reason: "CONFLICT" });
			const decision = await participant().protocol.getDecision(transferId);
			expect(decision).toMatchObject({ state: "RELEASED", reason: "CONFLICT" });
		});

		it("refuses a COMMIT for a transfer prepared before the accounts were reset", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));
			await participant().accounts.reset(0);

			const reply = await participant().protocol.handle(sealMessage(origin(), "COMMIT", transferId, {}));

			expect(reply.type).toBe("NACK");
			expect(reply.payload).toMatchObject({ decision: "NONE", reason: "CONFLICT" });
			expect(await participant().protocol.getDecision(transferId)).toBeNull();
			expect(await participant().transfers.getReservation(transferId, "credit")).toBeNull();
		});

		it("refuses a COMMIT after the reservation expired", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));
			network.clock.advance(60_000);

			const reply = await participant().protocol.handle(sealMessage(origin(), "COMMIT", transferId, {}));

			expect(reply.type).toBe("NACK");
			expect(reply.payload).toMatchObject({ decision: "RELEASED", reason: "RESERVATION_EXPIRED" });
			const balance = await participant().accounts.getBalance(credited.id);
			expect(balance).toMatchObject({ balance: 0, pendingCredit: 0 });
		});
	});

	describe("ABORT", () => {
		it("releases a reserved credit", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));

			const reply = await participant().protocol.handle(
				sealMessage(origin(), "ABORT", transferId, { reason: "CANCELLED" }),
			);

			expect(reply.type).toBe("ACK");
			expect(reply.payload.decision).toBe("RELEASED");
			const decision = await participant().protocol.getDecision(transferId);
			expect(decision).toMatchObject({ state: "RELEASED", reason: "CANCELLED" });
			const balance = await participant().accounts.getBalance(credited.id);
			expect(balance.pendingCredit).toBe(0);
		});

		it("refuses a PREPARE that arrives after its ABORT", async () => {
			const transferId = generateId();
			const abort = await participant().protocol.handle(
				sealMessage(origin(), "ABORT", transferId, { reason: "PREPARE_TIMEOUT" }),
			);
			expect(abort.payload.decision).toBe("RELEASED");

			const reply = await participant().protocol.handle(
				sealMessage(origin(), "PREPARE", transferId, preparePayload()),
			);

			expect(reply.type).toBe("NACK");
			expect(reply.payload).toMatchObject({ decision: "RELEASED", reason: "PREPARE_TIMEOUT" });
			const balance = await participant().accounts.getBalance(credited.id);
			expect(balance.pendingCredit).toBe(0);
		});

		it("refuses to abort an applied credit", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));
			await participant().protocol.handle(sealMessage(origin(), "COMMIT", transferId, {}));

			const reply = await participant().protocol.handle(sealMessage(origin(), "ABORT", transferId, {}));

			expect(reply.type).toBe("NACK");
			expect(reply.payload).toMatchObject({ decision: "APPLIED", reason: "ALREADY_APPLIED" });
		});
	});

	describe("QUERY", () => {
		it("reports NONE for an unknown transfer", async () => {
			const reply = await participant().protocol.handle(sealMessage(origin(), "QUERY", generateId(), {}));
			expect(reply.type).toBe("ACK");
			expect(reply.payload.decision).toBe("NONE");
		});

		it("reports the recorded decision", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));

			const reply = await participant().protocol.handle(sealMessage(origin(), "QUERY", transferId, {}));
			expect(reply.payload.decision).toBe("RESERVED");
		});
	});

	// =========================================================================
	// EXPIRY SWEEP
	// =========================================================================

	describe("expireReservations", () => {
		it("releases overdue credit holds and records why", async () => {
			const transferId = generateId();
			await participant().protocol.handle(sealMessage(origin(), "PREPARE", transferId, preparePayload()));

			expect(await participant().protocol.expireReservations()).toEqual({ expired: 0 });
			network.clock.advance(60_000);
			expect(await participant().protocol.expireReservations()).toEqual({ expired: 1 });

			const decision = await participant().protocol.getDecision(transferId);
			expect(decision).toMatchObject({ state: "RELEASED", reason: "RESERVATION_EXPIRED" });
			const balance = await participant().accounts.getBalance(credited.id);
			expect(balance.pendingCredit).toBe(0);
		});
	});
});

// Facade
export { type Bank, type BankInfo, createBank } from "./bank/base.js";

// Configuration
export { defineBankConfig, validateConfig } from "./config/index.js";
export { type BankContext, buildContext, DEFAULT_PROTOCOL } from "./context/context.js";

// HTTP API
export { createBankFetchHandler } from "./api/fetch.js";
export {
	type ApiHandlerOptions,
	type ApiRequest,
	type ApiResponse,
	handleRequest,
} from "./api/handler.js";
export { createBankHono } from "./api/hono.js";

// Identity & discovery
export * from "./discovery/index.js";
export * from "./identity/index.js";

// Protocol
export {
	isReply,
	isRequest,
	messageDigest,
	parseEnvelope,
	sealMessage,
	sealReply,
	signedContent,
	verifyEnvelope,
} from "./protocol/messages.js";
export { replayKey } from "./protocol/replay-guard.js";
export { createHttpTransport, type HttpTransportOptions } from "./protocol/transport.js";

// Coordinator
export { backoffDelay } from "./coordinator/exchange.js";
export type { InitiateTransferParams } from "./coordinator/coordinator.js";

// Workers
export {
	type BankWorkerDefinition,
	BankWorkerRunner,
	buildCoreWorkers,
	createWorkerRunner,
} from "./infrastructure/worker-runner.js";

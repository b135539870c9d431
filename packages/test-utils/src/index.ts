export { assertAccountBalance, assertConservation, assertNoOpenHolds, totalBalance } from "./assertions.js";
export { createTestClock, type TestClock } from "./clock.js";
export { getTestInstance, type TestInstance, type TestInstanceOptions } from "./get-test-instance.js";
export {
	createLoopbackTransport,
	type DeliveredMessage,
	type LoopbackFault,
	type LoopbackTransport,
} from "./loopback-transport.js";
export {
	createTestNetwork,
	registryDiscovery,
	type TestNetwork,
	type TestNetworkOptions,
	testAddress,
} from "./network.js";

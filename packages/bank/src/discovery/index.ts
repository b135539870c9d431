export {
	createRegistryDiscovery,
	type RegistryDiscovery,
	type RegistryDiscoveryOptions,
} from "./registry-discovery.js";
export { createStaticDiscovery } from "./static-discovery.js";

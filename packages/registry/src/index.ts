export { createRegistryFetchHandler } from "./api/fetch.js";
export { handleRegistryRequest, type RegistryApiRequest } from "./api/handler.js";
export { type RegistryContext, validateRegistration } from "./managers/instance-store.js";
export { createRegistry, type Registry, type RegistryOptions } from "./registry/base.js";

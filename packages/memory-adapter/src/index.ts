export { memoryAdapter } from "./adapter.js";

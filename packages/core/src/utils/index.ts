export { canonicalJson, computeDigest, sha256Hex } from "./hash.js";
export { generateAccountNumber, generateId, generateNonce, isInstanceId, isUuid } from "./id.js";
export { parseInterval, withJitter } from "./interval.js";
export { createKeyedLock, hashLockKey, type KeyedLock, lockKeys } from "./lock.js";

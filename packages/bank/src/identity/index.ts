export { generateKeyPair, type KeyPair, type KeyType, keyTypeOf, publicKeyFromPrivate } from "./keys.js";
export {
	createIdentity,
	createSigner,
	type Identity,
	keyPairMatches,
	type Signer,
	signingInput,
	verifySignature,
} from "./signer.js";

/**
 * Crypto module - Signature verification
 */

export type { SignatureVerifier } from "./types.js";

export {
	SchnorrVerifier,
	ensureHashes,
	getAddress,
	signInput,
} from "./schnorr.js";

/**
 * BIP-340 Schnorr signatures over secp256k1
 */

import { schnorr, utils } from "@noble/secp256k1";
import { sha256 } from "@noble/hashes/sha2";
import { TransactionError, TransactionLike } from "../transactions/types.js";
import { XOnlyPubKey } from "../utxo/types.js";
import { SignatureVerifier } from "./types.js";

/**
 * Register the synchronous SHA-256 that the secp256k1 sync API needs.
 * The library only accepts the first assignment.
 */
export function ensureHashes(): void {
	if (!utils.sha256Sync) {
		utils.sha256Sync = (...messages: Uint8Array[]) =>
			sha256(utils.concatBytes(...messages));
	}
}

/**
 * Verifies Schnorr signatures made over `sha256(message)`.
 *
 * Malformed keys or signatures verify as false.
 */
export class SchnorrVerifier implements SignatureVerifier {
	constructor() {
		ensureHashes();
	}

	verify(
		address: XOnlyPubKey,
		message: Uint8Array,
		signature: Uint8Array,
	): boolean {
		return schnorr.verifySync(signature, sha256(message), address);
	}
}

/**
 * Derive the x-only public key for a private key.
 */
export function getAddress(privateKey: Uint8Array): XOnlyPubKey {
	ensureHashes();
	return schnorr.getPublicKey(privateKey);
}

/**
 * Sign input `index` of `tx`, returning the signature to attach with
 * `addSignature`.
 */
export function signInput(
	tx: TransactionLike,
	index: number,
	privateKey: Uint8Array,
): Uint8Array {
	const payload = tx.getRawDataToSign(index);
	if (!payload) {
		throw new TransactionError(
			`Input index ${index} out of range`,
			"INPUT_OUT_OF_RANGE",
			{ index },
		);
	}
	ensureHashes();
	return schnorr.signSync(sha256(payload), privateKey);
}

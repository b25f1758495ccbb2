/**
 * Signature verification types
 */

import { XOnlyPubKey } from "../utxo/types.js";

/**
 * Checks that a signature authorizes a message under an owner's key.
 *
 * Implementations must be pure: no side effects, no shared mutable state.
 */
export interface SignatureVerifier {
	verify(
		address: XOnlyPubKey,
		message: Uint8Array,
		signature: Uint8Array,
	): boolean;
}

/**
 * UTXO types
 *
 * Types for unspent transaction outputs and the pool that tracks them.
 */

/**
 * X-only public key (32 bytes) - the owner credential of an output
 */
export type XOnlyPubKey = Uint8Array;

/**
 * Transaction output.
 * Created as part of a transaction's output list and never mutated.
 */
export interface TxOutput {
	/** Amount carried by the output */
	value: number;
	/** Public key authorizing future spends of this output */
	address: XOnlyPubKey;
}

/**
 * Error thrown when a UTXO identifier cannot be built.
 */
export class PoolError extends Error {
	constructor(
		message: string,
		public readonly code?: string,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "PoolError";
	}
}

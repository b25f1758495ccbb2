/**
 * Transaction layer types
 *
 * The narrow view of a transaction that validation and settlement depend on.
 */

import { TxOutput } from "../utxo/types.js";

export type { TxOutput } from "../utxo/types.js";

/**
 * Transaction input.
 * Claims the output `outputIndex` of the transaction `prevTxHash`.
 */
export interface TxInput {
	/** Hash of the transaction whose output is being spent */
	prevTxHash: Uint8Array;
	/** Index of the spent output within that transaction */
	outputIndex: number;
	/** Signature over {@link TransactionLike.getRawDataToSign} for this input */
	signature: Uint8Array | null;
}

/**
 * A record as received from outside: any field may be missing.
 */
export type Unchecked<T> = { [K in keyof T]?: T[K] | null };

/**
 * Capability interface for a transaction presented to a handler.
 */
export interface TransactionLike {
	/** Content hash; null until the transaction is finalized */
	getHash(): Uint8Array | null;
	getInputs(): readonly (Unchecked<TxInput> | null)[] | null;
	getOutputs(): readonly (Unchecked<TxOutput> | null)[] | null;
	/**
	 * Canonical payload signed by the owner of the output claimed by
	 * input `index`.
	 *
	 * @returns The payload, or null if there is no such input
	 */
	getRawDataToSign(index: number): Uint8Array | null;
}

/**
 * Error thrown during transaction operations.
 */
export class TransactionError extends Error {
	constructor(
		message: string,
		public readonly code?: TransactionErrorCode,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "TransactionError";
	}
}

/**
 * Error codes for transaction operations.
 */
export type TransactionErrorCode =
	| "INPUT_OUT_OF_RANGE"
	| "INPUT_NOT_FOUND"
	| "NOT_FINALIZED";

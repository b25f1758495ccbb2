/**
 * Transaction handler types
 *
 * Configuration and result shapes for validation and epoch settlement.
 */

import type { LoggerService } from "@nestjs/common";
import { SignatureVerifier } from "../crypto/types.js";
import { TransactionLike } from "../transactions/types.js";
import { TxOutput } from "../utxo/types.js";
import { UTXO } from "../utxo/utxo.js";

/**
 * Why a transaction was rejected, in the order checks are run.
 */
export type RejectionReason =
	| "MALFORMED_TRANSACTION" // missing hash, inputs or outputs
	| "MALFORMED_INPUT" // missing prev hash or signature, bad index
	| "UTXO_NOT_FOUND" // claimed output is not in the pool
	| "DUPLICATE_INPUT" // two inputs claim the same output
	| "INVALID_SOURCE_OUTPUT" // pool entry has no owner or a non-positive value
	| "INVALID_SIGNATURE"
	| "INVALID_OUTPUT" // declared output has no owner or a non-positive value
	| "INSUFFICIENT_INPUT_VALUE";

/**
 * Outcome of validating one transaction against the current pool.
 */
export type ValidationResult =
	| {
			valid: true;
			/** Hash of the validated transaction */
			hash: Uint8Array;
			/** Sum of the values of the claimed outputs */
			inputSum: number;
			/** Sum of the values of the declared outputs */
			outputSum: number;
			/** UTXOs claimed by the inputs, in input order */
			claimed: UTXO[];
			/** The declared outputs, checked */
			outputs: TxOutput[];
	  }
	| {
			valid: false;
			reason: RejectionReason;
			/** Offending input, when the failure is tied to one */
			inputIndex?: number;
			/** Offending output, when the failure is tied to one */
			outputIndex?: number;
	  };

/**
 * A candidate dropped during settlement.
 */
export interface Rejection<T extends TransactionLike = TransactionLike> {
	tx: T;
	result: Extract<ValidationResult, { valid: false }>;
}

/**
 * Result of settling one epoch's batch. Every candidate lands in exactly one
 * of `accepted`, `rejected` or `duplicates`.
 */
export interface SettlementReport<T extends TransactionLike = TransactionLike> {
	/** Accepted transactions, in acceptance order, each at most once */
	accepted: T[];
	/** Candidates that failed validation, in batch order */
	rejected: Rejection<T>[];
	/** Valid candidates skipped because their hash was already accepted */
	duplicates: T[];
	/** UTXOs removed from the pool */
	spent: UTXO[];
	/** UTXOs added to the pool */
	created: UTXO[];
}

/**
 * Handler configuration.
 */
export interface TxHandlerConfig {
	/** Verifies input signatures */
	verifier: SignatureVerifier;
	/** Receives rejection and settlement logs */
	logger?: LoggerService;
	/**
	 * Required byte length of transaction hashes and input references.
	 * 0 (the default) accepts any non-empty hash.
	 */
	hashLength: number;
}

/**
 * Error thrown for an invalid handler configuration.
 */
export class HandlerConfigError extends Error {
	constructor(
		message: string,
		public readonly field?: string,
	) {
		super(message);
		this.name = "HandlerConfigError";
	}
}

/**
 * Validate a handler configuration.
 *
 * @throws HandlerConfigError if invalid
 */
export function validateHandlerConfig(config: TxHandlerConfig): void {
	if (typeof config.verifier?.verify !== "function") {
		throw new HandlerConfigError(
			"Verifier must implement verify()",
			"verifier",
		);
	}
	if (!Number.isInteger(config.hashLength) || config.hashLength < 0) {
		throw new HandlerConfigError(
			`Hash length must be a non-negative integer, got ${config.hashLength}`,
			"hashLength",
		);
	}
}

/**
 * Transaction Handler
 *
 * Validates transactions against a pool of unspent outputs and settles
 * batches of candidates, one epoch at a time.
 */

import { Logger, LoggerService } from "@nestjs/common";
import { SchnorrVerifier } from "../crypto/schnorr.js";
import { SignatureVerifier } from "../crypto/types.js";
import {
	TransactionLike,
	TxInput,
	Unchecked,
} from "../transactions/types.js";
import { TxOutput, XOnlyPubKey } from "../utxo/types.js";
import { UTXO } from "../utxo/utxo.js";
import { UTXOPool } from "../utxo/utxo-pool.js";
import { bytesToHex } from "../utils/index.js";
import {
	RejectionReason,
	SettlementReport,
	TxHandlerConfig,
	ValidationResult,
	validateHandlerConfig,
} from "./types.js";

/**
 * Default required hash length. 0: any non-empty hash.
 */
export const DEFAULT_HASH_LENGTH = 0;

type Rejected = Extract<ValidationResult, { valid: false }>;

function reject(
	reason: RejectionReason,
	position: { inputIndex?: number; outputIndex?: number } = {},
): Rejected {
	return { valid: false, reason, ...position };
}

type OutputCandidate = Unchecked<TxOutput> | null | undefined;

/**
 * Owner present and value strictly positive.
 */
function hasOwnerAndValue(output: OutputCandidate): output is TxOutput {
	return (
		output != null &&
		output.address instanceof Uint8Array &&
		output.address.length > 0 &&
		typeof output.value === "number" &&
		output.value > 0
	);
}

/**
 * Declared outputs must also carry a finite value.
 */
function isPlausibleOutput(output: OutputCandidate): output is TxOutput {
	return hasOwnerAndValue(output) && Number.isFinite(output.value);
}

function label(tx: TransactionLike | null | undefined): string {
	const hash = tx?.getHash();
	return hash instanceof Uint8Array ? bytesToHex(hash) : "<unhashed>";
}

/**
 * Ledger core: owns a private {@link UTXOPool} and exposes single-transaction
 * validation and whole-batch settlement.
 *
 * Settlement is greedy and order dependent. Candidates are checked in the
 * order given, each against the pool as left by the ones accepted before it,
 * so the first of two transactions spending the same output wins.
 *
 * @example
 * ```typescript
 * const handler = new TxHandler(pool);
 *
 * handler.isValidTx(tx); // true
 * const accepted = handler.handleTxs([tx, conflictingTx]); // [tx]
 * ```
 */
export class TxHandler {
	private readonly pool: UTXOPool;
	private readonly verifier: SignatureVerifier;
	private readonly hashLength: number;
	private readonly logger: LoggerService;

	constructor(utxoPool: UTXOPool, config: Partial<TxHandlerConfig> = {}) {
		const resolved: TxHandlerConfig = {
			verifier: config.verifier ?? new SchnorrVerifier(),
			hashLength: config.hashLength ?? DEFAULT_HASH_LENGTH,
			logger: config.logger,
		};
		validateHandlerConfig(resolved);

		this.pool = new UTXOPool(utxoPool);
		this.verifier = resolved.verifier;
		this.hashLength = resolved.hashLength;
		this.logger = resolved.logger ?? new Logger(TxHandler.name);
	}

	/**
	 * An independent copy of the current pool.
	 */
	getUTXOPool(): UTXOPool {
		return new UTXOPool(this.pool);
	}

	/**
	 * @returns true if `tx` passes every check of {@link validateTx}
	 */
	isValidTx(tx: TransactionLike | null | undefined): boolean {
		return this.validateTx(tx).valid;
	}

	/**
	 * Validate a transaction against the current pool. Read-only.
	 *
	 * Checks, stopping at the first failure:
	 * 1. the transaction has a hash, inputs and outputs
	 * 2. every input has a previous hash, a non-negative index and a signature
	 * 3. every claimed output is in the pool
	 * 4. no output is claimed twice
	 * 5. every claimed output has an owner and a positive value
	 * 6. every signature verifies under the claimed output's owner
	 * 7. every declared output has an owner and a positive value
	 * 8. claimed value is at least declared value
	 */
	validateTx(tx: TransactionLike | null | undefined): ValidationResult {
		if (tx == null) return reject("MALFORMED_TRANSACTION");

		const hash: Uint8Array | null | undefined = tx.getHash();
		const inputs = tx.getInputs();
		const outputs = tx.getOutputs();
		if (!this.isHash(hash) || inputs == null || outputs == null) {
			return reject("MALFORMED_TRANSACTION");
		}

		const claimed: UTXO[] = [];
		const seen = new Set<string>();
		let inputSum = 0;

		for (let i = 0; i < inputs.length; i++) {
			const input: Unchecked<TxInput> | null | undefined = inputs[i];
			if (
				input == null ||
				!this.isHash(input.prevTxHash) ||
				typeof input.outputIndex !== "number" ||
				!Number.isInteger(input.outputIndex) ||
				input.outputIndex < 0 ||
				!(input.signature instanceof Uint8Array)
			) {
				return reject("MALFORMED_INPUT", { inputIndex: i });
			}

			const utxo = new UTXO(input.prevTxHash, input.outputIndex);
			if (!this.pool.contains(utxo)) {
				return reject("UTXO_NOT_FOUND", { inputIndex: i });
			}
			if (seen.has(utxo.key())) {
				return reject("DUPLICATE_INPUT", { inputIndex: i });
			}
			seen.add(utxo.key());

			const source = this.pool.getTxOutput(utxo);
			if (!hasOwnerAndValue(source)) {
				return reject("INVALID_SOURCE_OUTPUT", { inputIndex: i });
			}

			const message = tx.getRawDataToSign(i);
			if (
				message === null ||
				!this.verifySignature(source.address, message, input.signature)
			) {
				return reject("INVALID_SIGNATURE", { inputIndex: i });
			}

			inputSum += source.value;
			claimed.push(utxo);
		}

		const declared: TxOutput[] = [];
		let outputSum = 0;
		for (let i = 0; i < outputs.length; i++) {
			const output = outputs[i];
			if (!isPlausibleOutput(output)) {
				return reject("INVALID_OUTPUT", { outputIndex: i });
			}
			outputSum += output.value;
			declared.push(output);
		}

		if (inputSum < outputSum) return reject("INSUFFICIENT_INPUT_VALUE");

		return {
			valid: true,
			hash,
			inputSum,
			outputSum,
			claimed,
			outputs: declared,
		};
	}

	/**
	 * Handle one epoch: accept a mutually valid subset of `possibleTxs` and
	 * update the pool.
	 *
	 * @returns Accepted transactions, each at most once
	 */
	handleTxs<T extends TransactionLike>(possibleTxs: readonly T[]): T[] {
		return this.settle(possibleTxs).accepted;
	}

	/**
	 * Settle a batch, first valid wins.
	 *
	 * Each candidate is validated against the live pool; on acceptance its
	 * claimed outputs are removed and its own outputs added before the next
	 * candidate is looked at. Rejections never throw.
	 */
	settle<T extends TransactionLike>(batch: readonly T[]): SettlementReport<T> {
		const report: SettlementReport<T> = {
			accepted: [],
			rejected: [],
			duplicates: [],
			spent: [],
			created: [],
		};
		const acceptedHashes = new Set<string>();

		for (const tx of batch) {
			const result = this.validateTx(tx);
			if (!result.valid) {
				this.logger.debug?.(`Rejected ${label(tx)}: ${result.reason}`);
				report.rejected.push({ tx, result });
				continue;
			}

			const hashKey = bytesToHex(result.hash);
			if (acceptedHashes.has(hashKey)) {
				this.logger.debug?.(`Skipped duplicate ${hashKey}`);
				report.duplicates.push(tx);
				continue;
			}

			for (const utxo of result.claimed) {
				this.pool.removeUTXO(utxo);
				report.spent.push(utxo);
			}
			result.outputs.forEach((output, index) => {
				const utxo = new UTXO(result.hash, index);
				this.pool.addUTXO(utxo, output);
				report.created.push(utxo);
			});

			acceptedHashes.add(hashKey);
			report.accepted.push(tx);
		}

		if (batch.length > 0) {
			this.logger.log(
				`Settled epoch: ${report.accepted.length}/${batch.length} accepted, ${report.spent.length} spent, ${report.created.length} created, pool size ${this.pool.size}`,
			);
		}

		return report;
	}

	private isHash(value: Uint8Array | null | undefined): value is Uint8Array {
		return (
			value instanceof Uint8Array &&
			value.length > 0 &&
			(this.hashLength === 0 || value.length === this.hashLength)
		);
	}

	private verifySignature(
		address: XOnlyPubKey,
		message: Uint8Array,
		signature: Uint8Array,
	): boolean {
		try {
			return this.verifier.verify(address, message, signature);
		} catch (error) {
			this.logger.warn(
				`Signature verifier threw: ${error instanceof Error ? error.message : String(error)}`,
			);
			return false;
		}
	}
}

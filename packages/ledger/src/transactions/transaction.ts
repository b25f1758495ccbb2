/**
 * Transaction model
 *
 * A mutable builder for transactions: inputs and outputs are appended,
 * inputs are signed, and {@link Transaction.finalize} fixes the hash.
 */

import { sha256 } from "@noble/hashes/sha2";
import {
	concatBytes,
	float64ToBytes,
	uint32ToBytes,
} from "../utils/index.js";
import { TxOutput, XOnlyPubKey } from "../utxo/types.js";
import { UTXO } from "../utxo/utxo.js";
import { TransactionError, TransactionLike, TxInput } from "./types.js";

function encodeOutputs(outputs: readonly TxOutput[]): Uint8Array {
	return concatBytes(
		...outputs.flatMap((output) => [
			float64ToBytes(output.value),
			output.address,
		]),
	);
}

/**
 * Concrete transaction.
 *
 * @example
 * ```typescript
 * const tx = new Transaction();
 * tx.addInput(genesis.getHash(), 0);
 * tx.addOutput(4, bobKey);
 * tx.addOutput(5, carolKey);
 * tx.addSignature(signInput(tx, 0, alicePrivateKey), 0);
 * tx.finalize();
 * ```
 */
export class Transaction implements TransactionLike {
	private hash: Uint8Array | null = null;
	private inputs: TxInput[] = [];
	private outputs: TxOutput[] = [];

	/**
	 * Copy another transaction, including its hash and signatures.
	 */
	static from(other: Transaction): Transaction {
		const tx = new Transaction();
		const hash = other.getHash();
		tx.hash = hash ? Uint8Array.from(hash) : null;
		tx.inputs = other.getInputs().map((input) => ({
			prevTxHash: Uint8Array.from(input.prevTxHash),
			outputIndex: input.outputIndex,
			signature: input.signature ? Uint8Array.from(input.signature) : null,
		}));
		tx.outputs = other.getOutputs().map((output) => ({
			value: output.value,
			address: Uint8Array.from(output.address),
		}));
		return tx;
	}

	/**
	 * Create a coinbase-style transaction with no inputs and a single output.
	 */
	static coinbase(value: number, address: XOnlyPubKey): Transaction {
		const tx = new Transaction();
		tx.addOutput(value, address);
		tx.finalize();
		return tx;
	}

	addInput(prevTxHash: Uint8Array, outputIndex: number): void {
		this.inputs.push({
			prevTxHash: Uint8Array.from(prevTxHash),
			outputIndex,
			signature: null,
		});
	}

	addOutput(value: number, address: XOnlyPubKey): void {
		this.outputs.push({ value, address: Uint8Array.from(address) });
	}

	/**
	 * Remove an input by position, or the first input claiming `utxo`.
	 */
	removeInput(target: number | UTXO): void {
		const index =
			typeof target === "number"
				? target
				: this.inputs.findIndex((input) =>
						new UTXO(input.prevTxHash, input.outputIndex).equals(target),
					);
		if (typeof target !== "number" && index === -1) {
			throw new TransactionError(
				`No input claims ${target.key()}`,
				"INPUT_NOT_FOUND",
				{ utxo: target.key() },
			);
		}
		this.assertInputIndex(index);
		this.inputs.splice(index, 1);
	}

	addSignature(signature: Uint8Array, index: number): void {
		this.assertInputIndex(index);
		this.inputs[index] = {
			...this.inputs[index],
			signature: Uint8Array.from(signature),
		};
	}

	getRawDataToSign(index: number): Uint8Array | null {
		const input = this.inputs[index];
		if (!Number.isInteger(index) || input === undefined) return null;
		return concatBytes(
			input.prevTxHash,
			uint32ToBytes(input.outputIndex),
			encodeOutputs(this.outputs),
		);
	}

	/**
	 * Serialize every input (with its signature, if any) followed by every output.
	 */
	getRawTx(): Uint8Array {
		const inputs = this.inputs.flatMap((input) => [
			input.prevTxHash,
			uint32ToBytes(input.outputIndex),
			input.signature ?? new Uint8Array(0),
		]);
		return concatBytes(...inputs, encodeOutputs(this.outputs));
	}

	/**
	 * Compute and fix the transaction hash: sha256 of {@link getRawTx}.
	 */
	finalize(): Uint8Array {
		this.hash = sha256(this.getRawTx());
		return Uint8Array.from(this.hash);
	}

	getHash(): Uint8Array | null {
		return this.hash;
	}

	/**
	 * The hash, throwing if the transaction was never finalized.
	 */
	requireHash(): Uint8Array {
		if (!this.hash) {
			throw new TransactionError(
				"Transaction has not been finalized",
				"NOT_FINALIZED",
			);
		}
		return this.hash;
	}

	getInputs(): readonly TxInput[] {
		return this.inputs;
	}

	getOutputs(): readonly TxOutput[] {
		return this.outputs;
	}

	getInput(index: number): TxInput | undefined {
		return this.inputs[index];
	}

	getOutput(index: number): TxOutput | undefined {
		return this.outputs[index];
	}

	numInputs(): number {
		return this.inputs.length;
	}

	numOutputs(): number {
		return this.outputs.length;
	}

	private assertInputIndex(index: number): void {
		if (!Number.isInteger(index) || index < 0 || index >= this.inputs.length) {
			throw new TransactionError(
				`Input index ${index} out of range`,
				"INPUT_OUT_OF_RANGE",
				{ index, inputs: this.inputs.length },
			);
		}
	}
}

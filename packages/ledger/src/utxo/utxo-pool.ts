/**
 * UTXO Pool
 *
 * In-memory set of unspent transaction outputs keyed by their identifier.
 */

import { TxOutput } from "./types.js";
import { UTXO } from "./utxo.js";

interface PoolEntry {
	utxo: UTXO;
	output: TxOutput;
}

function copyOutput(output: TxOutput): TxOutput {
	return Object.freeze({
		value: output.value,
		address: Uint8Array.from(output.address),
	});
}

/**
 * Mapping from {@link UTXO} to the {@link TxOutput} it denotes.
 *
 * The pool performs no uniqueness or ownership checks; callers derive
 * identifiers from real transaction outputs.
 *
 * @example
 * ```typescript
 * const pool = new UTXOPool();
 * pool.addUTXO(new UTXO(genesis.getHash(), 0), { value: 10, address: pubkey });
 *
 * const copy = new UTXOPool(pool); // independent of `pool`
 * copy.removeUTXO(new UTXO(genesis.getHash(), 0));
 * pool.size; // 1
 * ```
 */
export class UTXOPool {
	private entries: Map<string, PoolEntry> = new Map();

	constructor(source?: UTXOPool) {
		if (source) {
			for (const { utxo, output } of source.entries.values()) {
				this.entries.set(utxo.key(), { utxo, output: copyOutput(output) });
			}
		}
	}

	/**
	 * Number of unspent outputs in the pool.
	 */
	get size(): number {
		return this.entries.size;
	}

	/**
	 * Add or overwrite the output for `utxo`.
	 */
	addUTXO(utxo: UTXO, output: TxOutput): void {
		this.entries.set(utxo.key(), { utxo, output: copyOutput(output) });
	}

	/**
	 * Remove `utxo` from the pool.
	 *
	 * @returns false if it was not present
	 */
	removeUTXO(utxo: UTXO): boolean {
		return this.entries.delete(utxo.key());
	}

	/**
	 * Look up the output for `utxo`.
	 *
	 * @returns The output if found, null otherwise
	 */
	getTxOutput(utxo: UTXO): TxOutput | null {
		return this.entries.get(utxo.key())?.output ?? null;
	}

	contains(utxo: UTXO): boolean {
		return this.entries.has(utxo.key());
	}

	/**
	 * Get all UTXOs currently in the pool, in insertion order.
	 */
	getAllUTXO(): UTXO[] {
		return Array.from(this.entries.values(), (entry) => entry.utxo);
	}

	clone(): UTXOPool {
		return new UTXOPool(this);
	}
}

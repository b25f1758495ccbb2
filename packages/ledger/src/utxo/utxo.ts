import { bytesEqual, bytesToHex, compareBytes } from "../utils/index.js";
import { PoolError } from "./types.js";

/**
 * Identifier of a spendable output: the hash of the transaction that
 * produced it and the output's position in that transaction.
 *
 * Instances are immutable; equality is structural over both fields and
 * {@link UTXO.key} gives the string form used as a map key.
 */
export class UTXO {
	private readonly hash: Uint8Array;
	private readonly idx: number;
	private readonly keyString: string;

	constructor(txHash: Uint8Array, index: number) {
		if (!Number.isInteger(index) || index < 0) {
			throw new PoolError(
				`Output index must be a non-negative integer, got ${index}`,
				"INVALID_INDEX",
				{ index },
			);
		}
		this.hash = Uint8Array.from(txHash);
		this.idx = index;
		this.keyString = `${bytesToHex(this.hash)}:${index}`;
	}

	/** Hash of the producing transaction (a copy) */
	getTxHash(): Uint8Array {
		return Uint8Array.from(this.hash);
	}

	getIndex(): number {
		return this.idx;
	}

	key(): string {
		return this.keyString;
	}

	equals(other: UTXO): boolean {
		return this.idx === other.idx && bytesEqual(this.hash, other.hash);
	}

	/**
	 * Orders by transaction hash bytes, then by output index.
	 */
	compareTo(other: UTXO): number {
		const byHash = compareBytes(this.hash, other.hash);
		return byHash !== 0 ? byHash : this.idx - other.idx;
	}

	toString(): string {
		return this.keyString;
	}
}

import type { LoggerService } from "@nestjs/common";
import { getAddress, signInput } from "../src/crypto/index.js";
import { Transaction } from "../src/transactions/index.js";
import { UTXO, UTXOPool, XOnlyPubKey } from "../src/utxo/index.js";

export const ALICE_KEY = new Uint8Array(32).fill(1);
export const BOB_KEY = new Uint8Array(32).fill(2);
export const CAROL_KEY = new Uint8Array(32).fill(3);

export const ALICE = getAddress(ALICE_KEY);
export const BOB = getAddress(BOB_KEY);
export const CAROL = getAddress(CAROL_KEY);

export type MockLogger = {
	[K in "log" | "error" | "warn" | "debug"]: jest.Mock;
} & LoggerService;

export function createLogger(): MockLogger {
	return {
		log: jest.fn(),
		error: jest.fn(),
		warn: jest.fn(),
		debug: jest.fn(),
	};
}

/**
 * Build a finalized input-less transaction carrying `outputs`, and a pool
 * holding each of its outputs.
 */
export function seedPool(
	outputs: { value: number; address: XOnlyPubKey }[],
): { genesis: Transaction; pool: UTXOPool } {
	const genesis = new Transaction();
	for (const output of outputs) {
		genesis.addOutput(output.value, output.address);
	}
	const hash = genesis.finalize();

	const pool = new UTXOPool();
	genesis.getOutputs().forEach((output, index) => {
		pool.addUTXO(new UTXO(hash, index), output);
	});
	return { genesis, pool };
}

export interface Claim {
	tx: Transaction;
	index: number;
	key: Uint8Array;
}

/**
 * Build a finalized transaction spending `claims` into `outputs`, each
 * input signed with its claim's key.
 */
export function spend(
	claims: Claim[],
	outputs: { value: number; address: XOnlyPubKey }[],
): Transaction {
	const tx = new Transaction();
	for (const claim of claims) {
		tx.addInput(claim.tx.requireHash(), claim.index);
	}
	for (const output of outputs) {
		tx.addOutput(output.value, output.address);
	}
	claims.forEach((claim, i) => {
		tx.addSignature(signInput(tx, i, claim.key), i);
	});
	tx.finalize();
	return tx;
}

import { sha256 } from "@noble/hashes/sha2";
import { hexToBytes } from "../utils/index.js";
import { UTXO } from "../utxo/index.js";
import { Transaction } from "./transaction.js";
import { TransactionError } from "./types.js";

const prevHash = new Uint8Array(32).fill(0x11);
const owner = new Uint8Array(32).fill(0x22);

function buildTx(): Transaction {
	const tx = new Transaction();
	tx.addInput(prevHash, 1);
	tx.addOutput(4, owner);
	return tx;
}

describe("Transaction", () => {
	it("builds the signing payload from the input and every output", () => {
		const payload = buildTx().getRawDataToSign(0);

		expect(payload).toEqual(
			Uint8Array.from([
				...prevHash,
				...hexToBytes("00000001"),
				...hexToBytes("4010000000000000"),
				...owner,
			]),
		);
	});

	it("returns no payload for a missing input", () => {
		const tx = buildTx();

		expect(tx.getRawDataToSign(1)).toBeNull();
		expect(tx.getRawDataToSign(-1)).toBeNull();
	});

	it("leaves the payload unchanged by signatures but not the hash", () => {
		const tx = buildTx();
		const payload = tx.getRawDataToSign(0);
		const unsignedHash = tx.finalize();

		tx.addSignature(new Uint8Array([1, 2, 3]), 0);

		expect(tx.getRawDataToSign(0)).toEqual(payload);
		expect(tx.finalize()).not.toEqual(unsignedHash);
		expect(tx.getInput(0)?.signature).toEqual(new Uint8Array([1, 2, 3]));
	});

	it("hashes the raw transaction with sha256", () => {
		const tx = buildTx();

		expect(tx.getHash()).toBeNull();
		expect(tx.finalize()).toEqual(sha256(tx.getRawTx()));
		expect(tx.getHash()).toEqual(sha256(tx.getRawTx()));
	});

	it("requires a hash once finalized", () => {
		const tx = buildTx();

		expect(() => tx.requireHash()).toThrow(
			new TransactionError("Transaction has not been finalized"),
		);
		tx.finalize();
		expect(tx.requireHash()).toHaveLength(32);
	});

	it("rejects signatures for inputs that do not exist", () => {
		const tx = buildTx();

		let caught: unknown;
		try {
			tx.addSignature(new Uint8Array([1]), 3);
		} catch (error) {
			caught = error;
		}

		expect(caught).toBeInstanceOf(TransactionError);
		expect(caught).toMatchObject({
			code: "INPUT_OUT_OF_RANGE",
			details: { index: 3, inputs: 1 },
		});
	});

	it("removes inputs by position or by claimed output", () => {
		const tx = buildTx();
		tx.addInput(prevHash, 2);
		tx.addInput(prevHash, 3);

		tx.removeInput(new UTXO(prevHash, 2));
		expect(tx.getInputs().map((input) => input.outputIndex)).toEqual([1, 3]);

		tx.removeInput(0);
		expect(tx.getInputs().map((input) => input.outputIndex)).toEqual([3]);

		expect(() => tx.removeInput(new UTXO(prevHash, 9))).toThrow(
			`No input claims ${"11".repeat(32)}:9`,
		);
	});

	it("copies another transaction independently", () => {
		const tx = buildTx();
		tx.addSignature(new Uint8Array([5]), 0);
		tx.finalize();

		const copy = Transaction.from(tx);
		copy.addOutput(1, owner);

		expect(copy.getHash()).toEqual(tx.getHash());
		expect(copy.getInput(0)?.signature).toEqual(new Uint8Array([5]));
		expect(tx.numOutputs()).toBe(1);
		expect(copy.numOutputs()).toBe(2);
	});

	it("creates finalized coinbase transactions", () => {
		const coinbase = Transaction.coinbase(25, owner);

		expect(coinbase.numInputs()).toBe(0);
		expect(coinbase.getOutput(0)).toEqual({ value: 25, address: owner });
		expect(coinbase.getHash()).toEqual(sha256(coinbase.getRawTx()));
	});
});

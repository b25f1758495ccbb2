import { ALICE, ALICE_KEY, BOB } from "../../test/utils.js";
import { Transaction, TransactionError } from "../transactions/index.js";
import { SchnorrVerifier, getAddress, signInput } from "./schnorr.js";

function payloadOf(tx: Transaction, index: number): Uint8Array {
	const payload = tx.getRawDataToSign(index);
	if (!payload) throw new Error(`No payload for input ${index}`);
	return payload;
}

describe("SchnorrVerifier", () => {
	const verifier = new SchnorrVerifier();
	let tx: Transaction;

	beforeEach(() => {
		tx = new Transaction();
		tx.addInput(new Uint8Array(32).fill(9), 0);
		tx.addOutput(3, BOB);
	});

	it("derives 32-byte x-only addresses", () => {
		expect(getAddress(ALICE_KEY)).toHaveLength(32);
		expect(getAddress(ALICE_KEY)).toEqual(ALICE);
	});

	it("verifies a signed input payload under the signer's address", () => {
		const signature = signInput(tx, 0, ALICE_KEY);
		const payload = payloadOf(tx, 0);

		expect(signature).toHaveLength(64);
		expect(verifier.verify(ALICE, payload, signature)).toBe(true);
		expect(verifier.verify(BOB, payload, signature)).toBe(false);
	});

	it("fails once the payload changes", () => {
		const signature = signInput(tx, 0, ALICE_KEY);
		tx.addOutput(1, ALICE);

		expect(verifier.verify(ALICE, payloadOf(tx, 0), signature)).toBe(false);
	});

	it("treats malformed keys and signatures as invalid", () => {
		const payload = new Uint8Array([1, 2, 3]);

		expect(verifier.verify(ALICE, payload, new Uint8Array(10))).toBe(false);
		expect(verifier.verify(new Uint8Array(5), payload, new Uint8Array(64))).toBe(
			false,
		);
	});

	it("refuses to sign inputs that do not exist", () => {
		expect(() => signInput(tx, 2, ALICE_KEY)).toThrow(TransactionError);
	});
});

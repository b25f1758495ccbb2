/**
 * UTXO Ledger
 *
 * Validation and batch settlement of transactions against a pool of
 * unspent transaction outputs.
 *
 * @example
 * ```typescript
 * import {
 *   Transaction,
 *   TxHandler,
 *   UTXO,
 *   UTXOPool,
 *   getAddress,
 *   signInput,
 * } from "@utxo-ledger/core";
 *
 * const genesis = Transaction.coinbase(10, getAddress(alicePrivateKey));
 * const pool = new UTXOPool();
 * pool.addUTXO(new UTXO(genesis.requireHash(), 0), genesis.getOutputs()[0]);
 *
 * const tx = new Transaction();
 * tx.addInput(genesis.requireHash(), 0);
 * tx.addOutput(9, bobAddress);
 * tx.addSignature(signInput(tx, 0, alicePrivateKey), 0);
 * tx.finalize();
 *
 * const handler = new TxHandler(pool);
 * handler.handleTxs([tx]); // [tx]
 * ```
 */

// UTXO - Output identifiers and the pool
export {
	// Types
	type XOnlyPubKey,
	type TxOutput,
	// Classes
	UTXO,
	UTXOPool,
	PoolError,
} from "./utxo/index.js";

// Transactions - Model and capability interface
export {
	// Types
	type TxInput,
	type TransactionLike,
	type Unchecked,
	type TransactionErrorCode,
	// Classes
	Transaction,
	TransactionError,
} from "./transactions/index.js";

// Crypto - Signature verification
export {
	type SignatureVerifier,
	SchnorrVerifier,
	ensureHashes,
	getAddress,
	signInput,
} from "./crypto/index.js";

// Handler - Validation and settlement
export {
	// Types
	type RejectionReason,
	type ValidationResult,
	type Rejection,
	type SettlementReport,
	type TxHandlerConfig,
	// Classes
	TxHandler,
	HandlerConfigError,
	// Utilities
	validateHandlerConfig,
	DEFAULT_HASH_LENGTH,
} from "./handler/index.js";

// Utils
export {
	bytesToHex,
	hexToBytes,
	concatBytes,
	bytesEqual,
	compareBytes,
} from "./utils/index.js";

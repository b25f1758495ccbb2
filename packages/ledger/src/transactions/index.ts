/**
 * Transactions module - Transaction model and the capability interface
 * handlers depend on
 */

// Types
export type {
	TxInput,
	TxOutput,
	TransactionLike,
	Unchecked,
	TransactionErrorCode,
} from "./types.js";

// Classes
export { TransactionError } from "./types.js";
export { Transaction } from "./transaction.js";

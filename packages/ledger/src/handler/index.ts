/**
 * Handler module - Transaction validation and epoch settlement
 */

// Types
export type {
	RejectionReason,
	ValidationResult,
	Rejection,
	SettlementReport,
	TxHandlerConfig,
} from "./types.js";

// Classes
export { HandlerConfigError, validateHandlerConfig } from "./types.js";
export { TxHandler, DEFAULT_HASH_LENGTH } from "./tx-handler.js";

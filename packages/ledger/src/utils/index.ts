/**
 * Utility functions for the ledger
 */

export {
	bytesToHex,
	hexToBytes,
	concatBytes,
	bytesEqual,
	compareBytes,
	uint32ToBytes,
	float64ToBytes,
} from "./encoding.js";

/**
 * UTXO module - Output identifiers and the unspent output pool
 */

// Types
export type { XOnlyPubKey, TxOutput } from "./types.js";

export { PoolError } from "./types.js";

export { UTXO } from "./utxo.js";
export { UTXOPool } from "./utxo-pool.js";

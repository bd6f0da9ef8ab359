/** Shared constants for magic numbers used across the backend. */

/** Upper bound on target-edge walks; exceeding it means the forest is corrupted. */
export const MAX_ROOT_DEPTH = 4096;

/** Acknowledgement a receiver returns to accept an incoming non-fungible transfer. */
export const NON_FUNGIBLE_RECEIVED = '0x150b7a02';

/** Acknowledgement a receiver returns to accept an incoming counted-asset transfer. */
export const COUNTED_ASSET_RECEIVED = '0xf23a6e61';

/** Returned by a receiver that refuses an incoming transfer. */
export const TRANSFER_REJECTED = '0x00000000';

/** Address the composition service holds custody under unless configured otherwise. */
export const DEFAULT_CUSTODIAN_ADDRESS = '0x000000000000000000000000000000000000c0de';

/** Default HTTP port. */
export const DEFAULT_PORT = 8000;

/** Persisted state file name inside the data directory. */
export const GRAPH_STATE_FILENAME = 'composition-graph.json';

/** Version stamp of the persisted state layout. */
export const PERSISTENCE_VERSION = 1;

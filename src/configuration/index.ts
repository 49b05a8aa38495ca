/**
 * Configuration entrypoint.
 *
 * Process settings come from the environment; the federation itself (servers, role
 * mappings, switches) lives in the `SyncRegistry`, persisted in Mongo.
 */
export * from "./constants";
export * from "./settings";

/**
 * Pipeline Module
 *
 * @module
 */

export * from "./states.js";
export * from "./orchestrator.js";

/**
 * Type checking extensions - registry, dispatcher and extension base
 */

export * from "./types.js";
export * from "./hooks.js";
export * from "./extension.js";
export * from "./handler-registry.js";
export * from "./dispatcher.js";

/**
 * Core module - grid model and the containers built on it.
 */

export * from "./algorithms";
export * from "./data-structures";
export * from "./grid";
export * from "./hash";

export * from "./contracts.js";
export * from "./errors.js";
export * from "./keyed-lock.js";
export * from "./paths.js";
export * from "./result-render.js";

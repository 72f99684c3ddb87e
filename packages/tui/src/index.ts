export * from "./interactive.js";
export * from "./theme.js";

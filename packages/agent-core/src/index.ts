export * from "./instruction-applier.js";
export * from "./instruction-schema.js";
export * from "./interpreter.js";
export * from "./quality-reviewer.js";
export * from "./summary.js";
export * from "./table-utils.js";

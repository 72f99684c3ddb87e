export * from "./openrouter.js";

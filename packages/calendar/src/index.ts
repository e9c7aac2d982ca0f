export * from "./errors.js";
export * from "./time.js";

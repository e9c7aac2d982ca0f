export * from "./errors.js";
export * from "./locale/locale.js";
export * from "./plugin/applier.js";
export * from "./plugin/arithmeticTimePlugin.js";
export * from "./plugin/evaluate.js";
export * from "./plugin/tokenizer.js";
export * from "./plugin/types.js";
export * from "./tokens/format.js";
export * from "./tokens/token.js";
export * from "./units/units.js";
export * from "./units/vocabulary.js";

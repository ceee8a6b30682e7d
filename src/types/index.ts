export * from "./result.js";
export * from "./entities.js";
export * from "./skeleton.js";

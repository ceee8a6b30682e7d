export * from "./graph-export.js";

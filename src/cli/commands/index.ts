export { analyzeCommand, type AnalyzeOptions } from "./analyze.js";
export { statusCommand, type StatusOptions } from "./status.js";
export { exportCommand, parseFormat, parseLabels, parseTypes, type ExportOptions } from "./export.js";

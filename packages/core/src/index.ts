export * from "./boundaries.js";
export * from "./config.js";
export * from "./discovery.js";
export * from "./errors.js";
export * from "./formatters.js";
export * from "./grouping.js";
export * from "./headers.js";
export * from "./multiTable.js";
export * from "./profiles.js";
export * from "./reader.js";
export * from "./report.js";
export * from "./singleTable.js";
export * from "./table.js";
export { expandHome, stableId } from "./utils.js";

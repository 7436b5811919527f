export * from "./feedback/index.js";
export * from "./host/index.js";
export * from "./triggers/index.js";

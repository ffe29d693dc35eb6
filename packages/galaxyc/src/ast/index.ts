export * from "./spec.js";
export * from "./visitor.js";

export * from "./errors.js";
export * from "./fire.js";
export * from "./window.js";

export * from "./common.js";
export * from "./content.js";
export * from "./messages.js";
export * from "./stream.js";
export * from "./api-error.js";

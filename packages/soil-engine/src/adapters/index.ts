export * from "./types.js";
export * from "./weather.js";
export * from "./atmospheric.js";
export * from "./soil-property.js";

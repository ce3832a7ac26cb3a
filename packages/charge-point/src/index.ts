export * from "./charge-point.js";

export * from "./text-image.js";

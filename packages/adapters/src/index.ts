export * from "./bitmap-font.js";
export * from "./bitmap-rasterizer.js";
export * from "./png-encoder.js";
export * from "./raster-canvas.js";
export * from "./skia-rasterizer.js";

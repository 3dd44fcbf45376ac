export * from "./errors/domain-errors.js";
export * from "./ports/rasterizer.js";
export * from "./layout/color-spec.js";
export * from "./layout/padding.js";
export * from "./layout/tokenizer.js";
export * from "./layout/metrics-probe.js";
export * from "./layout/line-breaker.js";
export * from "./layout/headline-fitter.js";
export * from "./layout/settings.js";
export * from "./layout/layout-engine.js";
export * from "./layout/image-composer.js";
export * from "./use-cases/image-text.js";

import { BitmapRasterizer, SkiaRasterizer } from "@imagetext/adapters";
import { loadRuntimeConfig } from "@imagetext/utils";
import type { RuntimeConfig } from "@imagetext/utils";
import { Module } from "@nestjs/common";

import { TextImageController } from "./text-image.controller.js";
import { TextImageService } from "./text-image.service.js";
import { RUNTIME_CONFIG, TEXT_RASTERIZER } from "./text-image.tokens.js";
import type { PngRasterizer } from "./text-image.tokens.js";

const configProvider = {
  provide: RUNTIME_CONFIG,
  useFactory: (): RuntimeConfig => loadRuntimeConfig()
};

const rasterizerProvider = {
  provide: TEXT_RASTERIZER,
  inject: [RUNTIME_CONFIG],
  useFactory: (config: RuntimeConfig): PngRasterizer =>
    config.rasterizer === "skia" ? new SkiaRasterizer() : new BitmapRasterizer()
};

@Module({
  controllers: [TextImageController],
  providers: [TextImageService, configProvider, rasterizerProvider],
  exports: [TextImageService, RUNTIME_CONFIG, TEXT_RASTERIZER]
})
export class TextImageModule {}

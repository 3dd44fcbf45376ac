import type { RuntimeConfig } from "@imagetext/utils";
import { Controller, Get, Inject } from "@nestjs/common";

import { RUNTIME_CONFIG } from "../text-image/text-image.tokens.js";

@Controller()
export class HealthController {
  constructor(
    @Inject(RUNTIME_CONFIG)
    private readonly config: RuntimeConfig
  ) {}

  @Get("healthz")
  health() {
    return { status: "ok", rasterizer: this.config.rasterizer };
  }
}

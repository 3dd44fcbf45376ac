import { Module } from "@nestjs/common";

import { HealthModule } from "./health/health.module.js";
import { TextImageModule } from "./text-image/text-image.module.js";

@Module({
  imports: [TextImageModule, HealthModule]
})
export class AppModule {}

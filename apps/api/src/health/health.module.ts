import { Module } from "@nestjs/common";

import { TextImageModule } from "../text-image/text-image.module.js";
import { HealthController } from "./health.controller.js";

@Module({
  imports: [TextImageModule],
  controllers: [HealthController]
})
export class HealthModule {}

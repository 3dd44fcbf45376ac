import type { TextLayout } from "@imagetext/contracts";
import { Body, Controller, HttpCode, Inject, Post, Res, StreamableFile } from "@nestjs/common";
import type { Response } from "express";

import { TextImageService } from "./text-image.service.js";

@Controller("images/text")
export class TextImageController {
  constructor(
    @Inject(TextImageService)
    private readonly textImageService: TextImageService
  ) {}

  @Post()
  @HttpCode(200)
  render(@Body() body: unknown, @Res({ passthrough: true }) response: Response): StreamableFile {
    const { png, layout } = this.textImageService.render(body);

    response.setHeader("x-line-count", String(layout.lines.length));
    response.setHeader("x-line-height", String(layout.lineHeight));
    response.setHeader("x-font-size", String(layout.fontSize));
    return new StreamableFile(png, { type: "image/png", length: png.length });
  }

  @Post("layout")
  @HttpCode(200)
  layout(@Body() body: unknown): TextLayout {
    return this.textImageService.layout(body);
  }
}

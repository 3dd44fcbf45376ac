import { basename, isAbsolute, relative, resolve, sep } from "node:path";

import type { TextLayout } from "@imagetext/contracts";
import {
  DomainError,
  FontUnreadableError,
  ImageText,
  ValidationError,
  releaseCanvas,
  toRasterizerError
} from "@imagetext/core";
import { writeStructuredLog } from "@imagetext/utils";
import type { RuntimeConfig } from "@imagetext/utils";
import {
  BadRequestException,
  Inject,
  Injectable,
  InternalServerErrorException,
  NotFoundException
} from "@nestjs/common";

import { RUNTIME_CONFIG, TEXT_RASTERIZER } from "./text-image.tokens.js";
import type { PngRasterizer } from "./text-image.tokens.js";

export interface RenderedTextImage {
  png: Buffer;
  layout: TextLayout;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

@Injectable()
export class TextImageService {
  private readonly fontsDir: string;

  constructor(
    @Inject(TEXT_RASTERIZER)
    private readonly rasterizer: PngRasterizer,
    @Inject(RUNTIME_CONFIG)
    private readonly config: RuntimeConfig
  ) {
    this.fontsDir = resolve(config.fontsDir);
  }

  render(payload: unknown): RenderedTextImage {
    return this.execute(
      "render",
      () => {
        const { canvas, layout } = this.prepare(payload).render();
        let png: Buffer;
        try {
          png = this.rasterizer.toPng(canvas);
        } catch (error) {
          const failure = toRasterizerError(error, "encode the PNG");
          releaseCanvas(this.rasterizer, canvas, failure);
          throw failure;
        }
        releaseCanvas(this.rasterizer, canvas);
        return { png, layout };
      },
      (rendered) => rendered.layout
    );
  }

  layout(payload: unknown): TextLayout {
    return this.execute(
      "layout",
      () => this.prepare(payload).layout(),
      (layout) => layout
    );
  }

  /** Resolves a font file name inside the fonts directory; anything escaping it is rejected. */
  resolveFontPath(font: string): string {
    const path = resolve(this.fontsDir, font);
    const rel = relative(this.fontsDir, path);
    if (rel === "" || isAbsolute(rel) || rel.split(sep)[0] === "..") {
      throw new ValidationError(`Font "${font}" is outside the fonts directory.`);
    }
    return path;
  }

  private prepare(payload: unknown): ImageText<unknown> {
    const request = isRecord(payload)
      ? {
          headlineScale: this.config.headlineScale,
          ...(this.config.defaultFont ? { font: this.config.defaultFont } : {}),
          ...payload
        }
      : payload;

    return ImageText.fromRequest(this.rasterizer, request, {
      resolveFontPath: (font) => this.resolveFontPath(font)
    });
  }

  private execute<T>(operation: string, run: () => T, layoutOf: (result: T) => TextLayout): T {
    try {
      const result = run();
      const layout = layoutOf(result);
      writeStructuredLog({
        level: "info",
        message: `text-image: ${operation} completed`,
        context: {
          mode: layout.mode,
          width: layout.width,
          height: layout.height,
          lines: layout.lines.length,
          fontSize: layout.fontSize
        }
      });
      return result;
    } catch (error) {
      const mapped = this.mapError(error);
      writeStructuredLog({
        level: mapped instanceof InternalServerErrorException ? "error" : "warn",
        message: `text-image: ${operation} failed`,
        context: {
          code: error instanceof DomainError ? error.code : undefined,
          error: error instanceof Error ? error.message : String(error)
        }
      });
      throw mapped;
    }
  }

  private mapError(error: unknown): Error {
    if (error instanceof FontUnreadableError) {
      return new NotFoundException(
        `Font not found or is not readable (${basename(error.fontPath)}).`
      );
    }

    if (error instanceof DomainError) {
      if (error.code === "RASTERIZER") {
        return new InternalServerErrorException(error.message);
      }
      return new BadRequestException(error.message);
    }

    if (error instanceof Error) {
      return new InternalServerErrorException(error.message);
    }

    return new InternalServerErrorException("Unexpected error.");
  }
}

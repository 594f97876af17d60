import { readFile } from "node:fs/promises";

import sharp from "sharp";

import { atomicWriteFile } from "../storage/atomicWrite.js";
import { fitBiUnitCube, rasterize, type RasterImage, type RenderOptions } from "./rasterize.js";
import { StlParseError, parseStl } from "./stl.js";
import { TransformError, type TransformRequest, type Transformer } from "./transformer.js";

export class StlPngTransformer implements Transformer {
  readonly name = "stl-png";
  private readonly options: Partial<RenderOptions>;

  constructor(options: Partial<RenderOptions> = {}) {
    this.options = options;
  }

  async transform(req: TransformRequest): Promise<void> {
    let data: Buffer;
    try {
      data = await readFile(req.input_path);
    } catch (err) {
      throw new TransformError("failed to read STL file", { cause: err });
    }

    let image: RasterImage;
    try {
      image = rasterize(fitBiUnitCube(parseStl(data)), this.options);
    } catch (err) {
      if (err instanceof StlParseError) {
        throw new TransformError(`failed to parse STL file: ${err.message}`, { cause: err });
      }
      throw err;
    }

    try {
      const png = await sharp(image.pixels, {
        raw: { width: image.width, height: image.height, channels: image.channels },
      })
        .png()
        .toBuffer();
      await atomicWriteFile(req.output_path, png);
    } catch (err) {
      throw new TransformError("failed to save PNG file", { cause: err });
    }
  }
}

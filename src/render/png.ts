import { PNG } from "pngjs";
import type { Pixmap } from "./rasterizer";

export function encodePng(pixmap: Pixmap): Buffer {
  const png = new PNG({ width: pixmap.width, height: pixmap.height });
  png.data = Buffer.from(pixmap.data.buffer, pixmap.data.byteOffset, pixmap.data.byteLength);
  return PNG.sync.write(png);
}


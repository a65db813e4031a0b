/**
 * Image Processing Port Interface
 *
 * Frame-level operations the recognizer needs before handing pixels to an engine.
 */

export interface ImageRegions {
  /** Top band: card title, grade label, item number. */
  title: Buffer;
  /** Bottom band: current bid, timer, bid count. */
  price: Buffer;
}

export interface ImageProcessorPort {
  /**
   * Split a frame horizontally at `titleFraction` of its height.
   */
  splitRegions(image: Buffer, titleFraction: number): Promise<ImageRegions>;

  /**
   * Grayscale/normalize/upscale a region for OCR. Output is PNG.
   */
  prepareForOcr(image: Buffer): Promise<Buffer>;
}

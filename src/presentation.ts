import fs from "fs";
import path from "path";
import { imageSize } from "image-size";
import pptxgen from "pptxgenjs";

export const DEFAULT_PRESENTATION_NAME = "images.pptx";

const IMAGE_MIME_TYPES: Record<string, string> = {
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  png: "image/png",
  bmp: "image/bmp",
  gif: "image/gif",
  tif: "image/tiff",
  tiff: "image/tiff",
  webp: "image/webp",
};

// pptxgenjs LAYOUT_16x9, in inches
const SLIDE_WIDTH = 10;
const SLIDE_HEIGHT = 5.625;

export type Placement = { x: number; y: number; w: number; h: number };

/**
 * Check whether an extension (lower-cased, no dot) names an image that goes
 * into the presentation.
 */
export function isImageExtension(extension: string): boolean {
  return Object.hasOwn(IMAGE_MIME_TYPES, extension);
}

/**
 * Scale an image to the largest size that fits the slide without changing
 * its proportions, centred on the free axis.
 */
export function fitImage(width: number, height: number): Placement {
  const scale = Math.min(SLIDE_WIDTH / width, SLIDE_HEIGHT / height);
  const w = width * scale;
  const h = height * scale;
  return { x: (SLIDE_WIDTH - w) / 2, y: (SLIDE_HEIGHT - h) / 2, w, h };
}

function addImageSlide(pres: pptxgen, imagePath: string, data: Buffer): void {
  const slide = pres.addSlide();
  const extension = path.extname(imagePath).slice(1).toLowerCase();
  const mimeType = isImageExtension(extension) ? IMAGE_MIME_TYPES[extension] : undefined;

  let size: { width?: number; height?: number } = {};
  try {
    size = imageSize(data);
  } catch {
    // Unreadable header; falls through to the text slide below.
  }

  if (!mimeType || !size.width || !size.height) {
    slide.addText(`Unsupported image: ${path.basename(imagePath)}`, {
      x: 1,
      y: 1,
      w: 8,
      h: 1.5,
    });
    return;
  }

  slide.addImage({
    data: `${mimeType};base64,${data.toString("base64")}`,
    ...fitImage(size.width, size.height),
  });
}

/**
 * Build a slideshow with one slide per image, in the order given. Images whose
 * format cannot be read get a slide naming the file instead.
 *
 * @param imagePaths - Images to embed
 * @returns The .pptx file contents
 */
export async function renderPresentation(imagePaths: readonly string[]): Promise<Buffer> {
  const pres = new pptxgen();
  pres.layout = "LAYOUT_16x9";

  for (const imagePath of imagePaths) {
    addImageSlide(pres, imagePath, await fs.promises.readFile(imagePath));
  }

  const output = await pres.write({ outputType: "nodebuffer" });
  if (!Buffer.isBuffer(output)) {
    throw new Error("Presentation writer did not return a buffer");
  }
  return output;
}

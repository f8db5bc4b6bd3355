import { MIN_HORIZONTAL_MARGIN, MIN_VERTICAL_MARGIN } from "../config/captionConfig";
import { SafeAreaMargins, SafeAreaResult } from "../types/models";

/**
 * Font measurement used for the layout estimate. Swap in real metrics when a
 * font file is available; the default is a width heuristic.
 */
export interface GlyphMetrics {
  averageGlyphWidth(fontSize: number): number;
  lineGap(fontSize: number): number;
}

export const heuristicGlyphMetrics: GlyphMetrics = {
  averageGlyphWidth: (fontSize) => Math.round(fontSize * 0.5),
  lineGap: (fontSize) => Math.round(fontSize / 3),
};

export interface SafeAreaInput {
  fontSize: number;
  outlineWidth: number;
  frameWidth: number;
  frameHeight: number;
  maxLines: number;
  maxCharsPerLine: number;
  margins: SafeAreaMargins;
}

/**
 * Bounding box of the densest possible cue (every line full) against the
 * frame minus its safe margins. Conservative: nothing is rendered.
 */
export const validateSafeArea = (
  input: SafeAreaInput,
  metrics: GlyphMetrics = heuristicGlyphMetrics,
): SafeAreaResult => {
  const { fontSize, outlineWidth, frameWidth, frameHeight, maxLines, maxCharsPerLine } = input;
  const horizontal = Math.max(input.margins.horizontal, MIN_HORIZONTAL_MARGIN);
  const vertical = Math.max(input.margins.vertical, MIN_VERTICAL_MARGIN);

  const width = maxCharsPerLine * metrics.averageGlyphWidth(fontSize) + 2 * outlineWidth;
  const height = maxLines * fontSize + Math.max(0, maxLines - 1) * metrics.lineGap(fontSize) + 2 * outlineWidth;

  const marginX = frameWidth * horizontal;
  const marginY = frameHeight * vertical;
  const safeRect = {
    x: marginX,
    y: marginY,
    width: frameWidth - 2 * marginX,
    height: frameHeight - 2 * marginY,
  };

  return {
    bbox: { width, height },
    withinBounds: width <= safeRect.width && height <= safeRect.height,
    safeRect,
    margins: { horizontal, vertical },
  };
};

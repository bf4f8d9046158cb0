/**
 * Layout inset estimation.
 *
 * Works from label and legend measurements supplied by the host;
 * nothing here measures text in a real font.
 */

import type { LegendPosition, Rect, Size } from "../../types/radar";
import { OFFSET_CONFIG } from "../../constants/radar";

/** Legend band reserved on one side of the chart. */
export interface LegendInset {
  readonly position: LegendPosition;
  /** Measured size of the legend along the inset direction */
  readonly size: number;
  readonly fontPointSize: number;
  /** Largest fraction of the frame the legend may take */
  readonly maxSizePercent: number;
}

/** Insets applied around the content rectangle. */
export interface ContentInsets {
  readonly baseOffset: number;
  readonly legend?: LegendInset;
}

/** Minimum inset reserved for the legend region. */
export function legendOffset(legendFontPointSize: number): number {
  return legendFontPointSize * OFFSET_CONFIG.legendPerPoint;
}

/**
 * Inset needed to keep category labels inside the frame.
 *
 * @returns The rotated label width when labels are drawn, otherwise a fixed fallback
 */
export function baseOffset(
  xAxisEnabled: boolean,
  xAxisLabelsEnabled: boolean,
  rotatedLabelWidth: number,
): number {
  return xAxisEnabled && xAxisLabelsEnabled ? rotatedLabelWidth : OFFSET_CONFIG.baseFallback;
}

/** Bounding box of a label rotated by an angle in degrees. */
export function rotatedSize(size: Size, degrees: number): Size {
  const rad = (degrees * Math.PI) / 180;
  const cos = Math.abs(Math.cos(rad));
  const sin = Math.abs(Math.sin(rad));
  return {
    width: size.width * cos + size.height * sin,
    height: size.width * sin + size.height * cos,
  };
}

/** Rough label size from character count, for hosts without text metrics. */
export function estimateLabelSize(text: string, fontPointSize: number): Size {
  return {
    width: text.length * fontPointSize * OFFSET_CONFIG.glyphWidthRatio,
    height: fontPointSize * OFFSET_CONFIG.lineHeightRatio,
  };
}

/**
 * Thickness of the legend band along its side of the frame.
 *
 * The measured legend size plus its offset, capped at a share of
 * the frame.
 */
export function legendBand(frame: Rect, legend: LegendInset): number {
  const vertical = legend.position === "top" || legend.position === "bottom";
  const available = (vertical ? frame.height : frame.width) * legend.maxSizePercent;
  return Math.min(legend.size + legendOffset(legend.fontPointSize), available);
}

/** Rectangle occupied by the legend band. */
export function legendRect(frame: Rect, legend: LegendInset): Rect {
  const band = legendBand(frame, legend);
  switch (legend.position) {
    case "top":
      return { x: frame.x, y: frame.y, width: frame.width, height: band };
    case "bottom":
      return { x: frame.x, y: frame.y + frame.height - band, width: frame.width, height: band };
    case "left":
      return { x: frame.x, y: frame.y, width: band, height: frame.height };
    case "right":
      return { x: frame.x + frame.width - band, y: frame.y, width: band, height: frame.height };
  }
}

/**
 * Content rectangle left after insetting a frame.
 *
 * Every side is inset by at least the base offset, and the legend
 * side by at least the legend band.
 */
export function contentRectForFrame(frame: Rect, insets: ContentInsets): Rect {
  const legend = insets.legend;
  const band = legend ? legendBand(frame, legend) : 0;
  const sideBand = (position: LegendPosition): number =>
    legend?.position === position ? band : 0;

  const top = Math.max(insets.baseOffset, sideBand("top"));
  const bottom = Math.max(insets.baseOffset, sideBand("bottom"));
  const left = Math.max(insets.baseOffset, sideBand("left"));
  const right = Math.max(insets.baseOffset, sideBand("right"));

  return {
    x: frame.x + left,
    y: frame.y + top,
    width: Math.max(0, frame.width - left - right),
    height: Math.max(0, frame.height - top - bottom),
  };
}

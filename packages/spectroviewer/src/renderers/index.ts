/**
 * Renderer exports
 */

export { renderGrid, renderRowLabels, type GridRenderOptions, type GridLabelOptions } from "./grid.js";
export {
  renderLine,
  renderStepped,
  baselineToPixels,
  type PathShape,
  type PathRenderOptions,
} from "./path.js";
export {
  renderMarkers,
  renderThreshold,
  type MarkerRenderOptions,
  type ThresholdRenderOptions,
} from "./markers.js";

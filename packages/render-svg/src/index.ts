export { createLayout, UNCHANGED_LAYOUT, validateLayout, type Layout } from "./layout.js";
export {
  translateScale,
  translateX,
  translateY,
  translatePointToSvg,
} from "./coordinate-transform.js";
export { escapeXml, n } from "./utils.js";
export { Color } from "./style/color.js";
export { Fill } from "./style/fill.js";
export { Stroke, type StrokeOptions } from "./style/stroke.js";
export { Font } from "./style/font.js";
export {
  Shape,
  SurfaceShape,
  type ShapeKind,
  type ShapeOptions,
  type SurfaceShapeOptions,
} from "./shapes/shape.js";
export {
  isMarkerable,
  MarkerRefs,
  type Markerable,
  type MarkerRefsInit,
} from "./shapes/markerable.js";
export { Circle } from "./shapes/circle.js";
export { Ellipse } from "./shapes/ellipse.js";
export { Rectangle, type RectangleOptions } from "./shapes/rectangle.js";
export { Line, type MarkerableShapeOptions } from "./shapes/line.js";
export { Polyline } from "./shapes/polyline.js";
export { Polygon } from "./shapes/polygon.js";
export { Path } from "./shapes/path.js";
export { Text, type TextOptions } from "./shapes/text.js";
export { LineChart, type LineChartOptions } from "./shapes/line-chart.js";
export { Marker, type MarkerOptions, type MarkerOrientation } from "./marker.js";
export { Animation, type AnimationKind, type AnimationOptions } from "./animation/animation.js";
export { SetAttribute, type SetAttributeOptions } from "./animation/set-attribute.js";
export { AnimateMotion, type AnimateMotionOptions } from "./animation/animate-motion.js";
export {
  LIBRARY_NAME,
  LIBRARY_VERSION,
  SVG_VERSION,
  SvgDocument,
  type SvgDocumentOptions,
} from "./svg-document.js";
export {
  buildDocument,
  buildLayout,
  renderScene,
  type SceneBuildOptions,
} from "./scene-builder.js";

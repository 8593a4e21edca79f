import type {
  AnimationConfig,
  ColorConfig,
  DiagnosticSink,
  FillConfig,
  FontConfig,
  LayoutConfig,
  MarkerConfig,
  MarkerRefsConfig,
  Point,
  PointTuple,
  RandomSource,
  SceneConfig,
  ShapeConfig,
  StrokeConfig,
} from "@svgscribe/core";
import { createRandom, parseScene, SvgWriterError } from "@svgscribe/core";
import { AnimateMotion } from "./animation/animate-motion.js";
import type { Animation } from "./animation/animation.js";
import { SetAttribute } from "./animation/set-attribute.js";
import { createLayout, type Layout } from "./layout.js";
import { Marker } from "./marker.js";
import { Circle } from "./shapes/circle.js";
import { Ellipse } from "./shapes/ellipse.js";
import { Line } from "./shapes/line.js";
import { LineChart } from "./shapes/line-chart.js";
import type { MarkerRefsInit } from "./shapes/markerable.js";
import { Path } from "./shapes/path.js";
import { Polygon } from "./shapes/polygon.js";
import { Polyline } from "./shapes/polyline.js";
import { Rectangle } from "./shapes/rectangle.js";
import type { Shape, ShapeOptions, SurfaceShapeOptions } from "./shapes/shape.js";
import { Text } from "./shapes/text.js";
import { Color } from "./style/color.js";
import { Fill } from "./style/fill.js";
import { Font } from "./style/font.js";
import { Stroke } from "./style/stroke.js";
import { SvgDocument } from "./svg-document.js";

export interface SceneBuildOptions {
  diagnostics?: DiagnosticSink;
  /** Source for `random` colors. Defaults to one seeded from the scene's `seed`. */
  random?: RandomSource;
}

interface BuildContext {
  random: RandomSource;
  markers: Map<string, Marker>;
}

/**
 * Turn a parsed scene description into a document. Markers are built first
 * so shapes can reference them by id.
 */
export function buildDocument(scene: SceneConfig, options: SceneBuildOptions = {}): SvgDocument {
  const ctx: BuildContext = {
    random: options.random ?? createRandom(scene.seed),
    markers: new Map(),
  };

  for (const markerConfig of scene.markers ?? []) {
    ctx.markers.set(markerConfig.id, buildMarker(markerConfig, ctx));
  }

  const doc = new SvgDocument({
    layout: buildLayout(scene.layout),
    id: scene.id,
    diagnostics: options.diagnostics,
  });

  for (const shapeConfig of scene.shapes) {
    doc.add(buildShape(shapeConfig, ctx));
  }
  for (const animationConfig of scene.animations ?? []) {
    doc.add(buildAnimation(animationConfig));
  }

  return doc;
}

/** Parse (JSON or YAML) and build in one step. */
export function renderScene(input: string, options: SceneBuildOptions = {}): SvgDocument {
  return buildDocument(parseScene(input), options);
}

export function buildLayout(config: LayoutConfig | undefined): Layout {
  if (!config) return createLayout();
  return createLayout({
    dimensions: { width: config.width, height: config.height },
    origin: config.origin,
    scale: config.scale,
    originOffset: config.offset ? toPoint(config.offset) : undefined,
  });
}

function buildMarker(config: MarkerConfig, ctx: BuildContext): Marker {
  const [refX, refY] = config.ref ?? [0, 0];
  const marker = new Marker(config.id, {
    width: config.width,
    height: config.height,
    refX,
    refY,
  });
  if (config.orientation !== undefined) {
    marker.setOrientation(config.orientation);
  }
  for (const shapeConfig of config.shapes) {
    marker.add(buildShape(shapeConfig, ctx));
  }
  return marker;
}

function buildShape(config: ShapeConfig, ctx: BuildContext): Shape {
  switch (config.type) {
    case "circle":
      return new Circle(toPoint(config.center), config.radius, surfaceOptions(config, ctx));
    case "ellipse":
      return new Ellipse(toPoint(config.center), config.rx, config.ry, surfaceOptions(config, ctx));
    case "rect":
      return new Rectangle(toPoint(config.position), config.width, config.height, {
        ...surfaceOptions(config, ctx),
        rx: config.rx,
        ry: config.ry,
      });
    case "line":
      return new Line(toPoint(config.from), toPoint(config.to), {
        ...shapeOptions(config, ctx),
        markers: resolveMarkers(config.markers, ctx),
      });
    case "polyline":
      return new Polyline(config.points.map(toPoint), {
        ...shapeOptions(config, ctx),
        markers: resolveMarkers(config.markers, ctx),
      });
    case "polygon":
      return new Polygon(config.points.map(toPoint), surfaceOptions(config, ctx));
    case "path": {
      const path = new Path([], surfaceOptions(config, ctx));
      for (const subpath of config.subpaths) {
        path.startNewSubPath();
        for (const p of subpath) path.add(toPoint(p));
      }
      return path;
    }
    case "text":
      return new Text(toPoint(config.position), config.content, {
        ...surfaceOptions(config, ctx),
        font: config.font ? toFont(config.font) : undefined,
        anchor: config.anchor,
        baseline: config.baseline,
      });
    case "line-chart": {
      const chart = new LineChart({
        ...shapeOptions(config, ctx),
        margin: config.margin ? { width: config.margin[0], height: config.margin[1] } : undefined,
        axisStroke: config.axis_stroke ? toStroke(config.axis_stroke, ctx) : undefined,
      });
      for (const series of config.series) {
        chart.add(
          new Polyline(series.points.map(toPoint), {
            stroke: series.stroke ? toStroke(series.stroke, ctx) : undefined,
          }),
        );
      }
      return chart;
    }
  }
}

function buildAnimation(config: AnimationConfig): Animation {
  const base = {
    id: config.id,
    href: config.href,
    begin: config.begin,
    fill: config.fill,
    dur: config.dur,
  };
  switch (config.type) {
    case "set":
      return new SetAttribute({
        ...base,
        to: config.to,
        attributeName: config.attribute_name,
        attributeType: config.attribute_type,
      });
    case "motion":
      return new AnimateMotion({ ...base, points: config.points.map(toPoint) });
  }
}

type ShapeBaseConfig = Pick<ShapeConfig, "id" | "z" | "style" | "visible" | "stroke">;

function shapeOptions(config: ShapeBaseConfig, ctx: BuildContext): ShapeOptions {
  return {
    id: config.id,
    z: config.z,
    style: config.style,
    visible: config.visible,
    stroke: config.stroke ? toStroke(config.stroke, ctx) : undefined,
  };
}

function surfaceOptions(
  config: ShapeBaseConfig & { fill?: FillConfig },
  ctx: BuildContext,
): SurfaceShapeOptions {
  return {
    ...shapeOptions(config, ctx),
    fill: config.fill ? toFill(config.fill, ctx) : undefined,
  };
}

function resolveMarkers(
  config: MarkerRefsConfig | undefined,
  ctx: BuildContext,
): MarkerRefsInit | undefined {
  if (!config) return undefined;
  return {
    start: lookupMarker(config.start, ctx),
    mid: lookupMarker(config.mid, ctx),
    end: lookupMarker(config.end, ctx),
  };
}

function lookupMarker(id: string | undefined, ctx: BuildContext): Marker | undefined {
  if (id === undefined) return undefined;
  const marker = ctx.markers.get(id);
  if (!marker) {
    throw new SvgWriterError("unknown-marker", `Unknown marker "${id}"`);
  }
  return marker;
}

function toPoint([x, y]: PointTuple): Point {
  return { x, y };
}

function toColor(config: ColorConfig, ctx: BuildContext): Color {
  if (Array.isArray(config)) {
    const [r, g, b] = config;
    return Color.rgb(r, g, b);
  }
  if (config === "transparent") return Color.transparent();
  if (config === "random") return Color.random(ctx.random);
  return Color.named(config);
}

function toFill(config: FillConfig, ctx: BuildContext): Fill {
  return new Fill(toColor(config.color, ctx), config.opacity);
}

function toStroke(config: StrokeConfig, ctx: BuildContext): Stroke {
  return new Stroke({
    width: config.width,
    color: config.color !== undefined ? toColor(config.color, ctx) : undefined,
    nonScaling: config.non_scaling,
    miterLimit: config.miter_limit,
    dashArray: config.dash_array,
    dashOffset: config.dash_offset,
    opacity: config.opacity,
  });
}

function toFont(config: FontConfig): Font {
  return new Font(config.size, config.family);
}

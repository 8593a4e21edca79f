import { z } from "zod";

// ---- Enums ----

export const COLOR_NAMES = [
  "aqua",
  "black",
  "gray",
  "blue",
  "brown",
  "cyan",
  "fuchsia",
  "green",
  "lime",
  "magenta",
  "orange",
  "purple",
  "red",
  "silver",
  "white",
  "yellow",
] as const;

export type ColorName = (typeof COLOR_NAMES)[number];

export const ORIGINS = [
  "top-left",
  "bottom-left",
  "top-right",
  "bottom-right",
] as const;

export type Origin = (typeof ORIGINS)[number];

export const TEXT_ANCHORS = ["start", "middle", "end", "none"] as const;

export type TextAnchor = (typeof TEXT_ANCHORS)[number];

export const DOMINANT_BASELINES = [
  "text-bottom",
  "alphabetic",
  "ideographic",
  "middle",
  "central",
  "mathematical",
  "hanging",
  "text-top",
  "none",
] as const;

export type DominantBaseline = (typeof DOMINANT_BASELINES)[number];

// ---- Zod schemas (scene description files) ----

const PointSchema = z.tuple([z.number(), z.number()]);
const ChannelSchema = z.number().int().min(0).max(255);

const ColorSchema = z.union([
  z.enum(COLOR_NAMES),
  z.literal("transparent"),
  z.literal("random"),
  z.tuple([ChannelSchema, ChannelSchema, ChannelSchema]),
]);

const FillSchema = z.object({
  color: ColorSchema,
  opacity: z.number().optional(),
});

const StrokeSchema = z.object({
  width: z.number(),
  color: ColorSchema.optional(),
  non_scaling: z.boolean().optional(),
  miter_limit: z.number().optional(),
  dash_array: z.array(z.number().int().nonnegative()).optional(),
  dash_offset: z.number().int().nonnegative().optional(),
  opacity: z.number().optional(),
});

const FontSchema = z.object({
  size: z.number().optional(),
  family: z.string().optional(),
});

const MarkerRefsSchema = z.object({
  start: z.string().optional(),
  mid: z.string().optional(),
  end: z.string().optional(),
});

const ShapeBase = {
  id: z.string().optional(),
  z: z.number().int().optional(),
  style: z.string().optional(),
  visible: z.boolean().optional(),
  stroke: StrokeSchema.optional(),
};

const SurfaceBase = {
  ...ShapeBase,
  fill: FillSchema.optional(),
};

const CircleSchema = z.object({
  ...SurfaceBase,
  type: z.literal("circle"),
  center: PointSchema,
  radius: z.number(),
});

const EllipseSchema = z.object({
  ...SurfaceBase,
  type: z.literal("ellipse"),
  center: PointSchema,
  rx: z.number(),
  ry: z.number(),
});

const RectSchema = z.object({
  ...SurfaceBase,
  type: z.literal("rect"),
  position: PointSchema,
  width: z.number(),
  height: z.number(),
  rx: z.number().optional(),
  ry: z.number().optional(),
});

const LineSchema = z.object({
  ...ShapeBase,
  type: z.literal("line"),
  from: PointSchema,
  to: PointSchema,
  markers: MarkerRefsSchema.optional(),
});

const PolylineSchema = z.object({
  ...ShapeBase,
  type: z.literal("polyline"),
  points: z.array(PointSchema),
  markers: MarkerRefsSchema.optional(),
});

const PolygonSchema = z.object({
  ...SurfaceBase,
  type: z.literal("polygon"),
  points: z.array(PointSchema),
});

const PathSchema = z.object({
  ...SurfaceBase,
  type: z.literal("path"),
  subpaths: z.array(z.array(PointSchema)),
});

const TextSchema = z.object({
  ...SurfaceBase,
  type: z.literal("text"),
  position: PointSchema,
  content: z.string(),
  font: FontSchema.optional(),
  anchor: z.enum(TEXT_ANCHORS).optional(),
  baseline: z.enum(DOMINANT_BASELINES).optional(),
});

const LineChartSchema = z.object({
  ...ShapeBase,
  type: z.literal("line-chart"),
  margin: PointSchema.optional(),
  axis_stroke: StrokeSchema.optional(),
  series: z.array(
    z.object({
      points: z.array(PointSchema),
      stroke: StrokeSchema.optional(),
    }),
  ),
});

const ShapeSchema = z.discriminatedUnion("type", [
  CircleSchema,
  EllipseSchema,
  RectSchema,
  LineSchema,
  PolylineSchema,
  PolygonSchema,
  PathSchema,
  TextSchema,
  LineChartSchema,
]);

const MarkerSchema = z.object({
  id: z.string().min(1),
  width: z.number(),
  height: z.number(),
  ref: PointSchema.optional(),
  orientation: z.union([z.string(), z.number()]).optional(),
  shapes: z.array(ShapeSchema),
});

const AnimationBase = {
  id: z.string().optional(),
  href: z.string(),
  begin: z.string().optional(),
  fill: z.string().optional(),
  dur: z.string().optional(),
};

const SetAnimationSchema = z.object({
  ...AnimationBase,
  type: z.literal("set"),
  to: z.string(),
  attribute_name: z.string(),
  attribute_type: z.string().optional(),
});

const MotionAnimationSchema = z.object({
  ...AnimationBase,
  type: z.literal("motion"),
  points: z.array(PointSchema),
});

const AnimationSchema = z.discriminatedUnion("type", [
  SetAnimationSchema,
  MotionAnimationSchema,
]);

const LayoutSchema = z.object({
  width: z.number(),
  height: z.number(),
  origin: z.enum(ORIGINS).optional(),
  scale: z.number().optional(),
  offset: PointSchema.optional(),
});

export const SceneConfigSchema = z.object({
  version: z.string().optional(),
  id: z.string().optional(),
  seed: z.number().int().optional(),
  layout: LayoutSchema.optional(),
  markers: z.array(MarkerSchema).optional(),
  shapes: z.array(ShapeSchema),
  animations: z.array(AnimationSchema).optional(),
});

// ---- Scene description types ----

export type PointTuple = z.infer<typeof PointSchema>;
export type ColorConfig = z.infer<typeof ColorSchema>;
export type FillConfig = z.infer<typeof FillSchema>;
export type StrokeConfig = z.infer<typeof StrokeSchema>;
export type FontConfig = z.infer<typeof FontSchema>;
export type MarkerRefsConfig = z.infer<typeof MarkerRefsSchema>;
export type ShapeConfig = z.infer<typeof ShapeSchema>;
export type MarkerConfig = z.infer<typeof MarkerSchema>;
export type AnimationConfig = z.infer<typeof AnimationSchema>;
export type LayoutConfig = z.infer<typeof LayoutSchema>;
export type SceneConfig = z.infer<typeof SceneConfigSchema>;

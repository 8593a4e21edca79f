export * from "./types/geometry.js";
export * from "./types/scene.js";
export * from "./diagnostics.js";
export { SvgWriterError, type SvgWriterErrorCode } from "./errors.js";
export { createRandom, randomInt, type RandomSource } from "./random.js";
export { parseScene } from "./parser/scene-parser.js";

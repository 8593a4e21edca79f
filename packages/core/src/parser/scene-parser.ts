import yaml from "js-yaml";
import { SvgWriterError } from "../errors.js";
import type { SceneConfig } from "../types/scene.js";
import { SceneConfigSchema } from "../types/scene.js";

/**
 * Parse a JSON or YAML string into a validated SceneConfig.
 * Detects format automatically (tries JSON first, then YAML).
 * Throws an SvgWriterError listing every schema issue if the input is invalid.
 */
export function parseScene(input: string): SceneConfig {
  let raw: unknown;

  try {
    raw = JSON.parse(input);
  } catch {
    try {
      raw = yaml.load(input);
    } catch (yamlErr) {
      throw new SvgWriterError(
        "invalid-scene",
        `Failed to parse input as JSON or YAML: ${yamlErr instanceof Error ? yamlErr.message : String(yamlErr)}`,
      );
    }
  }

  const result = SceneConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new SvgWriterError(
      "invalid-scene",
      `Invalid scene description:\n${issues}`,
      result.error.issues,
    );
  }

  return result.data;
}

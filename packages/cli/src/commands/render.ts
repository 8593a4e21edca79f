import { readFileSync } from "node:fs";
import { createRandom } from "@svgscribe/core";
import { renderScene } from "@svgscribe/render-svg";

interface RenderOptions {
  output?: string;
  extension?: boolean;
  seed?: string;
}

export function renderCommand(input: string, options: RenderOptions): void {
  try {
    const content = readFileSync(input, "utf-8");
    const doc = renderScene(content, {
      random: options.seed !== undefined ? createRandom(parseInt(options.seed, 10)) : undefined,
    });

    const outputPath = options.output ?? input.replace(/\.(ya?ml|json)$/i, "");
    if (!doc.save(outputPath, options.extension !== false)) {
      console.error(`Error: could not write ${doc.getFileName()}`);
      process.exit(1);
    }
    console.log(`Rendered: ${doc.getFileName()}`);
  } catch (err) {
    console.error(
      `Error: ${err instanceof Error ? err.message : String(err)}`,
    );
    process.exit(1);
  }
}

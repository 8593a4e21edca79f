import { readFileSync } from "node:fs";
import { collectDiagnostics } from "@svgscribe/core";
import { renderScene } from "@svgscribe/render-svg";

export function validateCommand(input: string): void {
  try {
    const content = readFileSync(input, "utf-8");
    const { sink, diagnostics } = collectDiagnostics();
    renderScene(content, { diagnostics: sink }).toString();

    if (diagnostics.length === 0) {
      console.log("✓ Scene is valid. No issues found.");
      return;
    }

    console.warn(`\n${diagnostics.length} warning(s):`);
    for (const diagnostic of diagnostics) {
      const where = diagnostic.elementId ? ` (${diagnostic.elementId})` : "";
      console.warn(`  ⚠ [${diagnostic.code}]${where} ${diagnostic.message}`);
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

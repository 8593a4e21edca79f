import { existsSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { collectDiagnostics } from "@svgscribe/core";
import { renderScene } from "@svgscribe/render-svg";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { templates } from "../src/commands/init.js";
import { renderCommand } from "../src/commands/render.js";

describe("templates", () => {
  it.each(Object.keys(templates))("%s renders without diagnostics", (name) => {
    const { sink, diagnostics } = collectDiagnostics();
    const svg = renderScene(templates[name], { diagnostics: sink }).toString();
    expect(svg.endsWith("</svg>")).toBe(true);
    expect(diagnostics).toEqual([]);
  });

  it("only the animated template is animated", () => {
    expect(renderScene(templates.animated).isAnimated()).toBe(true);
    expect(renderScene(templates.basic).isAnimated()).toBe(false);
  });
});

describe("renderCommand", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "svgscribe-cli-"));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("writes next to the input with the extension swapped", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    const input = join(dir, "scene.yaml");
    writeFileSync(input, templates.basic);

    renderCommand(input, {});

    expect(existsSync(join(dir, "scene.svg"))).toBe(true);
    expect(log).toHaveBeenCalledWith(`Rendered: ${join(dir, "scene.svg")}`);
  });

  it("uses .html for animated scenes and honours --output", () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const input = join(dir, "motion.yml");
    writeFileSync(input, templates.animated);

    renderCommand(input, { output: join(dir, "out") });

    expect(existsSync(join(dir, "out.html"))).toBe(true);
  });
});

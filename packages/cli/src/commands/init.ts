import { animatedTemplate } from "../templates/animated.js";
import { basicTemplate } from "../templates/basic.js";
import { chartTemplate } from "../templates/chart.js";

export const templates: Record<string, string> = {
  basic: basicTemplate,
  chart: chartTemplate,
  animated: animatedTemplate,
};

interface InitOptions {
  template: string;
}

export function initCommand(options: InitOptions): void {
  const tmpl = templates[options.template];
  if (!tmpl) {
    console.error(`Unknown template: ${options.template}`);
    console.error(`Available: ${Object.keys(templates).join(", ")}`);
    process.exit(1);
  }

  process.stdout.write(tmpl);
}

import { parseArgs } from "node:util";
import type { ViewportParameters } from "@/fractals/mandelbrot/types";
import { FRAME_BUDGET_MS } from "@/fractals/render/frame-scheduler";
import { DEFAULT_EXPORT_PATH, PpmExporter } from "@/lib/export";
import { HeadlessPresenter } from "@/lib/headless-presenter";
import { parseKeyScript, ScriptedInput } from "@/lib/scripted-input";
import { validateViewport } from "@/lib/viewport";
import { createExplorerStore, DEFAULT_VIEWPORT } from "@/state/explorer-store";
import { FractalExplorer } from "./explorer";

export const USAGE = `Usage: mandelbrot-explorer [options]

  --width N       render target width in pixels (default ${DEFAULT_VIEWPORT.width})
  --height N      render target height in pixels (default ${DEFAULT_VIEWPORT.height})
  --re=X          real part of the view center (default ${DEFAULT_VIEWPORT.center.re})
  --im=Y          imaginary part of the view center (default ${DEFAULT_VIEWPORT.center.im})
  --domain D      visible width of the real axis (default ${DEFAULT_VIEWPORT.realDomain})
  --iter N        maximum iterations (default ${DEFAULT_VIEWPORT.maxIter})
  --keys SCRIPT   key script, one token per frame, e.g. "i+w i i e r"
  --out PATH      export path (default ${DEFAULT_EXPORT_PATH})
  --budget MS     per-frame render budget (default ${FRAME_BUDGET_MS})
  --help          show this message`;

export type CliOptions = {
  viewport: ViewportParameters;
  keys: string;
  out: string;
  budgetMs: number;
  help: boolean;
};

const toNumber = (name: string, value: string | undefined, fallback: number): number => {
  if (value === undefined) {
    return fallback;
  }
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new Error(`--${name} expects a number, got "${value}"`);
  }
  return parsed;
};

export function parseCliOptions(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      width: { type: "string" },
      height: { type: "string" },
      re: { type: "string" },
      im: { type: "string" },
      domain: { type: "string" },
      iter: { type: "string" },
      keys: { type: "string", default: "" },
      out: { type: "string", default: DEFAULT_EXPORT_PATH },
      budget: { type: "string" },
      help: { type: "boolean", default: false },
    },
    strict: true,
  });

  const viewport = validateViewport({
    center: {
      re: toNumber("re", values.re, DEFAULT_VIEWPORT.center.re),
      im: toNumber("im", values.im, DEFAULT_VIEWPORT.center.im),
    },
    width: toNumber("width", values.width, DEFAULT_VIEWPORT.width),
    height: toNumber("height", values.height, DEFAULT_VIEWPORT.height),
    realDomain: toNumber("domain", values.domain, DEFAULT_VIEWPORT.realDomain),
    maxIter: toNumber("iter", values.iter, DEFAULT_VIEWPORT.maxIter),
  });

  const budgetMs = toNumber("budget", values.budget, FRAME_BUDGET_MS);
  if (!(budgetMs > 0)) {
    throw new Error(`--budget must be positive, got ${budgetMs}`);
  }

  const keys = values.keys ?? "";
  parseKeyScript(keys);

  return {
    viewport,
    keys,
    out: values.out ?? DEFAULT_EXPORT_PATH,
    budgetMs,
    help: values.help ?? false,
  };
}

/**
 * Runs the explorer headless: replays the key script, keeps rendering until
 * the final view is complete, then exports it.
 *
 * @returns the process exit code
 */
export async function runCli(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliOptions(argv);
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    console.error(USAGE);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const store = createExplorerStore(options.viewport);
  const presenter = new HeadlessPresenter();
  const explorer = new FractalExplorer({
    input: new ScriptedInput(options.keys, () => store.getState().renderProgress.done),
    presenter,
    exporter: new PpmExporter(options.out),
    budgetMs: options.budgetMs,
    store,
  });

  // one line per finished refinement pass
  const unsubscribe = store.subscribe((state, previous) => {
    const { blockSize } = state.renderProgress;
    if (blockSize > 0 && blockSize < previous.renderProgress.blockSize) {
      console.log(`Pass complete, refining with ${blockSize}px blocks`);
    }
  });

  try {
    const frames = await explorer.run();
    console.log(`Ran ${frames} frames, presented ${presenter.presented}`);
    const stats = explorer.monitor.getStats();
    console.log(
      `Completed ${stats.totalRenders} renders, averaging ${stats.averageFrames.toFixed(1)} frames and ${stats.averageDuration.toFixed(1)}ms each`
    );
    await explorer.exportFrame();
  } finally {
    unsubscribe();
  }
  return 0;
}

// Image Command: generate one image and write it to disk
// Usage: keyrelay image "a lighthouse" --model org/model [--width 1024] [--out out.png]

import { writeFile } from "node:fs/promises";
import { resolve } from "node:path";
import type { CAC } from "cac";
import pc from "picocolors";

import type { ImageOptions } from "@keyrelay/sdk";
import type { ImageArtifact } from "@keyrelay/shared";
import {
  type CommandContext,
  type CommonOptions,
  exitCodeFor,
  parseNumberOption,
  parseStringOption,
  printUserFacingError,
  requireModel,
  withSession,
} from "./runtime.js";

export interface ImageCommandOptions extends CommonOptions {
  negative?: unknown;
  model?: unknown;
  width?: unknown;
  height?: unknown;
  steps?: unknown;
  guidance?: unknown;
  seed?: unknown;
  out?: unknown;
}

const EXTENSIONS: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/webp": "webp",
};

export function buildImageOptions(
  prompt: string,
  options: ImageCommandOptions,
  signal?: AbortSignal,
): ImageOptions {
  return {
    prompt,
    negativePrompt: parseStringOption(options.negative),
    model: requireModel(options.model),
    width: parseNumberOption(options.width, "width"),
    height: parseNumberOption(options.height, "height"),
    steps: parseNumberOption(options.steps, "steps"),
    guidanceScale: parseNumberOption(options.guidance, "guidance"),
    seed: parseNumberOption(options.seed, "seed"),
    signal,
  };
}

/** Output path: --out when given, otherwise a timestamped name in the working directory */
export function resolveOutputPath(
  out: string | undefined,
  artifact: ImageArtifact,
  now: Date = new Date(),
): string {
  if (out) return resolve(out);
  const extension = EXTENSIONS[artifact.mimeType] ?? "img";
  const stamp = now.toISOString().replace(/[:.]/g, "-");
  return resolve(`image-${stamp}.${extension}`);
}

/** Generate one image. Resolves with the process exit code. */
export async function runImage(
  prompt: string,
  options: ImageCommandOptions,
  context: CommandContext,
): Promise<number> {
  const { session, stdout, stderr } = context;
  const result = await session.generateImage(buildImageOptions(prompt, options, context.signal));

  if (!result.ok) {
    printUserFacingError(stderr, result.error);
    return exitCodeFor(result.error);
  }

  const path = resolveOutputPath(parseStringOption(options.out), result.value);
  await writeFile(path, result.value.data);
  stdout.write(`${pc.green("Saved")} ${path}\n`);
  if (context.verbose) {
    stderr.write(
      `${pc.dim(`${result.value.mimeType}, ${result.value.data.byteLength} bytes via ${result.value.provider}`)}\n`,
    );
  }
  return 0;
}

export function registerImageCommand(cli: CAC): void {
  cli
    .command("image <prompt>", "Generate an image and write it to disk")
    .option("-n, --negative <prompt>", "Negative prompt")
    .option("-m, --model <model>", "Model id, optionally suffixed with :provider")
    .option("--width <number>", "Width in pixels, a multiple of 8 (default 1024)")
    .option("--height <number>", "Height in pixels, a multiple of 8 (default 1024)")
    .option("--steps <number>", "Inference steps (default 20)")
    .option("--guidance <number>", "Guidance scale (default 7.5)")
    .option("--seed <number>", "Seed; -1 lets the provider choose (default -1)")
    .option("-o, --out <file>", "Output file")
    .option("-c, --config <path>", "Path to keyrelay.config.yaml")
    .example('  keyrelay image "a lighthouse at dusk" --model org/model --out lighthouse.png')
    .example('  keyrelay image "a fox" --model org/model:provider --width 768 --seed 42')
    .example('  keyrelay image "a fox" --model org/model --seed -1')
    .action(async (prompt: string, options: ImageCommandOptions) => {
      process.exitCode = await withSession(options, (context) =>
        runImage(prompt, options, context),
      );
    });
}

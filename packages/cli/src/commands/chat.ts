// Chat Command: stream a reply to stdout
// Usage: keyrelay chat "Hello" --model org/model[:provider] [--system s] [--temperature t]

import type { CAC } from "cac";
import pc from "picocolors";

import type { ChatMessageOptions } from "@keyrelay/sdk";
import { UserFacingError } from "@keyrelay/shared";
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

export interface ChatCommandOptions extends CommonOptions {
  model?: unknown;
  system?: unknown;
  temperature?: unknown;
  topP?: unknown;
  maxTokens?: unknown;
}

/** Translate command-line flags into session options */
export function buildChatOptions(
  message: string,
  options: ChatCommandOptions,
  signal?: AbortSignal,
): ChatMessageOptions {
  return {
    history: [],
    message,
    model: requireModel(options.model),
    systemMessage: parseStringOption(options.system),
    temperature: parseNumberOption(options.temperature, "temperature"),
    topP: parseNumberOption(options.topP, "top-p"),
    maxTokens: parseNumberOption(options.maxTokens, "max-tokens"),
    signal,
  };
}

/** Stream one reply. Resolves with the process exit code. */
export async function runChat(
  message: string,
  options: ChatCommandOptions,
  context: CommandContext,
): Promise<number> {
  const { session, stdout, stderr } = context;
  const stream = session.sendChatMessage(buildChatOptions(message, options, context.signal));

  let wroteOutput = false;
  try {
    let next = await stream.next();
    while (!next.done) {
      stdout.write(next.value.content);
      wroteOutput = true;
      next = await stream.next();
    }
    stdout.write("\n");

    const summary = next.value;
    if (context.verbose) {
      stderr.write(
        `${pc.dim(
          `${summary.chunkCount} chunks in ${summary.totalDurationMs}ms (first after ${summary.timeToFirstChunkMs}ms, ${summary.attempts} attempt${summary.attempts === 1 ? "" : "s"})`,
        )}\n`,
      );
    }
    return 0;
  } catch (error) {
    if (!(error instanceof UserFacingError)) throw error;
    if (wroteOutput) stdout.write("\n");
    printUserFacingError(stderr, error);
    return exitCodeFor(error);
  }
}

export function registerChatCommand(cli: CAC): void {
  cli
    .command("chat <message>", "Stream a chat reply to stdout")
    .option("-m, --model <model>", "Model id, optionally suffixed with :provider")
    .option("-s, --system <message>", "System message")
    .option("-t, --temperature <number>", "Sampling temperature (default 0.7)")
    .option("--top-p <number>", "Nucleus sampling threshold (default 0.95)")
    .option("--max-tokens <number>", "Maximum tokens to generate (default 512)")
    .option("-c, --config <path>", "Path to keyrelay.config.yaml")
    .example('  keyrelay chat "What is a token proxy?" --model org/model')
    .example('  keyrelay chat "Hi" --model org/model:provider --temperature 0.2')
    .action(async (message: string, options: ChatCommandOptions) => {
      process.exitCode = await withSession(options, (context) =>
        runChat(message, options, context),
      );
    });
}

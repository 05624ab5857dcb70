// Commands barrel export

export { registerChatCommand, runChat, buildChatOptions, type ChatCommandOptions } from "./chat.js";
export {
  registerImageCommand,
  runImage,
  buildImageOptions,
  resolveOutputPath,
  type ImageCommandOptions,
} from "./image.js";
export {
  createCommandShutdown,
  joinNegativeNumbers,
  openSession,
  withSession,
  parseNumberOption,
  parseStringOption,
  EXIT_CANCELLED,
  type CommandContext,
  type CommonOptions,
  type TextOutput,
} from "./runtime.js";

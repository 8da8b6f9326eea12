export * from "./config/Config.js";
export * from "./config/ConfigLoader.js";
export * from "./runtime/RunLogger.js";
export * from "./cli/CompileCommand.js";
export { runCli } from "./cli.js";

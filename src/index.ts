export { buildProgram, parseColumnList, parseRunConfig } from "./lib/cli/args";
export type { ParseOutcome, ProgramOutput, RunConfig } from "./lib/cli/args";
export * from "./lib/errors";
export { LOG_LEVELS, Logger, createMemorySink, stderrSink, stdoutSink } from "./lib/logging/logger";
export type { LogLevel, LogSink, LoggerOptions } from "./lib/logging/logger";
export { runCli, runScramble } from "./lib/run";
export type { CliDependencies, RunDependencies, RunResult, RunStage } from "./lib/run";
export * from "./lib/scramble";
export * from "./lib/table";
export * from "./lib/validation";

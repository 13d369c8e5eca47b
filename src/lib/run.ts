import { parseRunConfig } from "./cli/args";
import type { RunConfig } from "./cli/args";
import { ExitCode, UsageError, WriteError, toScrambleError } from "./errors";
import type { ExitCodeValue } from "./errors";
import { Logger, stderrSink, stdoutSink } from "./logging/logger";
import type { LogSink } from "./logging/logger";
import { createRandom, scrambleFile } from "./scramble";
import type { RandomSource } from "./scramble";
import { detectFormat, writeTable } from "./table";
import { validateInput } from "./validation";

export type RunStage = "validating" | "shuffling" | "writing" | "done";

export type RunDependencies = {
  sink?: LogSink;
  random?: RandomSource;
  clock?: () => Date;
};

export type RunResult = {
  exitCode: ExitCodeValue;
  stage: RunStage;
};

const formatColumns = (columns: readonly number[]): string => `[${columns.join(", ")}]`;

/**
 * validate -> shuffle -> write. Every failure is logged once at ERROR and
 * turned into an exit code; nothing is thrown to the caller.
 */
export const runScramble = async (config: RunConfig, deps: RunDependencies = {}): Promise<RunResult> => {
  const logger = new Logger(deps.sink ?? stderrSink, { level: config.logLevel, clock: deps.clock });
  const random = deps.random ?? createRandom(config.seed);
  let stage: RunStage = "validating";

  logger.debug(
    `Configuration: input=${config.input} output=${config.output} columns=${formatColumns(config.columns)}` +
      (config.seed === undefined ? "" : ` seed=${config.seed}`)
  );

  try {
    const summary = await validateInput(config.input, config.columns);
    logger.debug(`Validated ${config.input}: ${summary.rowCount} rows, ${summary.columnCount} columns`);
    logger.info(`Starting scrambling of columns ${formatColumns(config.columns)} in ${config.input}`);

    stage = "shuffling";
    const table = await scrambleFile(config.input, config.columns, {
      logger: logger.child("scramble"),
      random
    });

    stage = "writing";
    try {
      await writeTable(config.output, table, detectFormat(config.input));
    } catch (error) {
      throw new WriteError(config.output, error);
    }
    logger.info(`Scrambled data saved to ${config.output}`);
    return { exitCode: ExitCode.SUCCESS, stage: "done" };
  } catch (error) {
    const failure = toScrambleError(error);
    logger.error(`${failure.label}: ${failure.message}`);
    return {
      exitCode: config.exitZeroOnError ? ExitCode.SUCCESS : failure.exitCode,
      stage
    };
  }
};

export type CliDependencies = RunDependencies & {
  out?: LogSink;
};

const trimNewline = (text: string): string => text.replace(/\n$/, "");

/**
 * Entry used by the binary: parses argv, then runs. Usage errors are already
 * printed by the argument parser, so they are only mapped to an exit code.
 */
export const runCli = async (argv: readonly string[], deps: CliDependencies = {}): Promise<ExitCodeValue> => {
  const out = deps.out ?? stdoutSink;
  const err = deps.sink ?? stderrSink;
  try {
    const outcome = parseRunConfig(argv, {
      writeOut: (text) => out.write(trimNewline(text)),
      writeErr: (text) => err.write(trimNewline(text))
    });
    if (outcome.kind === "exit") {
      return outcome.exitCode;
    }
    const result = await runScramble(outcome.config, deps);
    return result.exitCode;
  } catch (error) {
    if (error instanceof UsageError) {
      return error.exitCode;
    }
    const failure = toScrambleError(error);
    err.write(`${failure.label}: ${failure.message}`);
    return failure.exitCode;
  }
};

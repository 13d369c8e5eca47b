import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { z } from "zod";
import { UsageError } from "../errors";
import { LOG_LEVELS } from "../logging/logger";
import type { LogLevel } from "../logging/logger";

export const PROGRAM_NAME = "column-scrambler";
export const PROGRAM_VERSION = "0.1.0";

const integerPattern = /^[+-]?\d+$/;

export type RunConfig = Readonly<{
  input: string;
  columns: readonly number[];
  output: string;
  logLevel: LogLevel;
  seed?: number;
  exitZeroOnError: boolean;
}>;

export type ParseOutcome =
  | { kind: "run"; config: RunConfig }
  | { kind: "exit"; exitCode: 0 };

export type ProgramOutput = {
  writeOut: (text: string) => void;
  writeErr: (text: string) => void;
};

const optionsSchema = z
  .object({
    columns: z.array(z.number().int()),
    output: z.string().min(1, "Output path must not be empty.").optional(),
    logLevel: z.enum(LOG_LEVELS).default("INFO"),
    seed: z.number().int().optional(),
    exitZeroOnError: z.boolean().optional().default(false)
  });

const filenameSchema = z.string().min(1, "Input filename must not be empty.");

export const parseColumnList = (text: string): number[] =>
  text.split(",").map((part) => {
    const token = part.trim();
    if (!integerPattern.test(token)) {
      throw new InvalidArgumentError(`"${token}" is not an integer column index.`);
    }
    return Number.parseInt(token, 10);
  });

const parseSeed = (text: string): number => {
  const token = text.trim();
  const value = Number.parseInt(token, 10);
  if (!integerPattern.test(token) || !Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(`"${token}" is not an integer seed.`);
  }
  return value;
};

export const buildProgram = (output?: ProgramOutput): Command => {
  const program = new Command()
    .name(PROGRAM_NAME)
    .description("Randomly shuffles column values within a CSV file.")
    .version(PROGRAM_VERSION)
    .argument("<filename>", "Path to the CSV file to process.")
    .requiredOption(
      "-c, --columns <list>",
      "Comma-separated list of column indices to scramble (e.g., 0,2,4).",
      parseColumnList
    )
    .option(
      "-o, --output <path>",
      "Path to the output CSV file. If not provided, the original file is overwritten."
    )
    .addOption(
      new Option("--log-level <level>", "Set the logging level.")
        .choices(LOG_LEVELS)
        .default("INFO")
        .env("LOG_LEVEL")
    )
    .addOption(
      new Option("--seed <integer>", "Seed the random source so runs are reproducible.")
        .argParser(parseSeed)
        .env("SCRAMBLE_SEED")
    )
    .option("--exit-zero-on-error", "Exit with status 0 even when the run fails.")
    .exitOverride();

  if (output) {
    program.configureOutput(output);
  }
  return program;
};

/**
 * Parses user arguments (without the node and script entries) into a
 * RunConfig. `--help` and `--version` come back as an "exit" outcome.
 */
export const parseRunConfig = (argv: readonly string[], output?: ProgramOutput): ParseOutcome => {
  const program = buildProgram(output);
  const writeErr = output?.writeErr ?? ((text: string) => process.stderr.write(text));
  try {
    program.parse([...argv], { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === "commander.helpDisplayed" || error.code === "commander.version") {
        return { kind: "exit", exitCode: 0 };
      }
      throw new UsageError(error.message, { cause: error });
    }
    throw error;
  }

  const filename = filenameSchema.safeParse(program.args[0]);
  const options = optionsSchema.safeParse(program.opts());
  if (!filename.success || !options.success) {
    const issue = filename.success ? options.error?.issues[0] : filename.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
    const message = `${where}${issue?.message ?? "Invalid arguments."}`;
    writeErr(`error: ${message}\n`);
    throw new UsageError(message);
  }

  const { columns, logLevel, seed, exitZeroOnError } = options.data;
  return {
    kind: "run",
    config: Object.freeze({
      input: filename.data,
      columns: Object.freeze([...columns]),
      output: options.data.output ?? filename.data,
      logLevel,
      seed,
      exitZeroOnError
    })
  };
};

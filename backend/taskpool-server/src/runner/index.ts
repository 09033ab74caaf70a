/**
 * Runner module
 *
 * Output sinks and the handlers the server registers out of the box.
 */

export { SafeFileWriter } from "./SafeFileWriter";
export type { SafeFileWriterOptions } from "./SafeFileWriter";

export { ProgressReporter } from "./ProgressReporter";
export type { ProgressReporterOptions, ProgressOutput, ProgressLine } from "./ProgressReporter";

export { registerBuiltinHandlers, createSleepHandler, createWriteLineHandler, createFailHandler } from "./builtinHandlers";
export type { BuiltinHandlerOptions, SleepArgs, SleepResult, WriteLineArgs, FailArgs } from "./builtinHandlers";

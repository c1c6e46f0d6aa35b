import type { ArgumentConfig, UsageGuideOptions } from "ts-command-line-args";
import { describeError } from "tesserajs";
import { defaultPipelineConfig, loadPipelineConfig } from "tesserajs-node";
import type { PipelineConfig } from "tesserajs-node";

export interface CommonArgs {
  config?: string;
  help?: boolean;
}

export const commonArgs: ArgumentConfig<CommonArgs> = {
  config: {
    type: String,
    alias: "c",
    optional: true,
    description: "JSON configuration file, flags take precedence over it",
  },
  help: {
    type: Boolean,
    alias: "h",
    optional: true,
    description: "Prints this usage guide",
  },
};

export function usage<T extends CommonArgs>(
  header: string,
  content: string,
): UsageGuideOptions & { helpArg: "help" } {
  return {
    helpArg: "help",
    headerContentSections: [{ header, content }],
  };
}

export async function pipelineConfig(file?: string): Promise<PipelineConfig> {
  return file === undefined ? defaultPipelineConfig() : await loadPipelineConfig(file);
}

/** Print the cause and flag the process as failed */
export function reportFailure(error: unknown): void {
  console.error(describeError(error));
  process.exitCode = 1;
}

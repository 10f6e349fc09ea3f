import { readPipelineConfig } from "./config.js";
import { describeError } from "./errors.js";
import { logger } from "./logger.js";
import { runPipeline, type PipelineDeps } from "./pipeline.js";

/** Configures and runs the pipeline once. Resolves to the process exit code. */
export async function main(source: NodeJS.ProcessEnv = process.env, deps: PipelineDeps = {}): Promise<number> {
  try {
    await runPipeline(readPipelineConfig(source), deps);
    return 0;
  } catch (err) {
    logger.fatal({ err: describeError(err) }, "pipeline crashed");
    return 1;
  }
}

import { existsSync, mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { PipelineStageOutput } from "../../packages/shared/src/pipeline-types.js";
import { PersistenceError } from "../utils/errors.js";

const stageEnvelopeSchema = z.object({
  stage: z.string(),
  version: z.number(),
  createdAt: z.string(),
  data: z.unknown()
});

/** Reads a stage output file, checking its stage name, version and data shape. */
export const readPipelineFile = <T>(
  filePath: string,
  stage: string,
  version: number,
  dataSchema: z.ZodType<T>
): T => {
  if (!existsSync(filePath)) {
    throw new Error(`Pipeline file not found: ${filePath}\nRun the "${stage}" stage first.`);
  }

  const envelope = stageEnvelopeSchema.safeParse(JSON.parse(readFileSync(filePath, "utf-8")));
  if (!envelope.success) {
    throw new Error(`Pipeline file ${filePath} is not a stage output. Re-run the "${stage}" stage.`);
  }

  const raw = envelope.data;

  if (raw.stage !== stage) {
    throw new Error(`Pipeline file ${filePath} has stage "${raw.stage}" but expected "${stage}".`);
  }

  if (raw.version !== version) {
    throw new Error(
      `Pipeline file ${filePath} has version ${raw.version} but expected ${version}. Re-run the "${stage}" stage.`
    );
  }

  const data = dataSchema.safeParse(raw.data);
  if (!data.success) {
    throw new Error(`Pipeline file ${filePath} has an invalid data field. Re-run the "${stage}" stage.`);
  }

  console.log(`  Loaded ${filePath} (created ${raw.createdAt})`);
  return data.data;
};

export const writePipelineFile = <T>(
  filePath: string,
  output: PipelineStageOutput<T>,
  log: (message: string) => void = console.log
): void => {
  const tempPath = `${filePath}.tmp`;

  try {
    mkdirSync(dirname(filePath), { recursive: true });
    writeFileSync(tempPath, JSON.stringify(output, null, 2));
    renameSync(tempPath, filePath);
  } catch (error) {
    throw new PersistenceError(filePath, { cause: error });
  }

  log(`  Saved ${filePath}`);
};

/**
 * Task pipeline: roles, stage builder, artifacts and executor.
 */

export { buildRoles, listRoles, type RoleSet } from "./roles.js";
export { buildPipeline, STAGE_DEFINITIONS, type PipelineInput } from "./builder.js";
export {
  formatRunTimestamp,
  artifactPathFor,
  FileArtifactWriter,
  DEFAULT_OUTPUT_DIR,
  type ArtifactWriter,
} from "./artifacts.js";
export {
  PipelineExecutor,
  assertRunnable,
  formatUpstreamContext,
  type StageRunner,
  type StageRunRequest,
  type PipelineExecutorOptions,
} from "./executor.js";
export { PipelineDefinitionError, StageExecutionError } from "./errors.js";

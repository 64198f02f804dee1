/**
 * Binding generation: include closure, Binder, CMake synthesis, build
 * and import check.
 */

export {
  SOURCE_EXTENSIONS,
  ALL_INCLUDES_FILE,
  listProjectSourceFiles,
  extractIncludes,
  collectIncludeClosure,
  renderIncludeClosure,
  writeIncludeClosure,
} from "./include-closure.js";
export {
  buildBinderArgs,
  splitFlags,
  manifestPath,
  parseSourceManifest,
  readSourceManifest,
  runBindingGenerator,
  type BinderInvocation,
} from "./binder-invocation.js";
export {
  BUILD_DESCRIPTION_FILE,
  isCompilationUnit,
  libraryTargetName,
  synthesizeBuildDescription,
  renderBuildDescription,
  writeBuildDescription,
  type BuildDescription,
  type BuildDescriptionInput,
  type LibraryTarget,
  type ModuleTarget,
} from "./build-description.js";
export {
  compileAndVerify,
  resolvePythonIncludeDir,
  importCheckScript,
  type CompileOptions,
  type VerifyResult,
} from "./compile.js";
export {
  runGenerationPipeline,
  type GenerationContext,
  type GenerationResult,
} from "./pipeline.js";
export {
  CONTAINER_ENTRYPOINT,
  toLocalBuildArgs,
  buildContainerCommand,
  runInContainer,
} from "./container.js";

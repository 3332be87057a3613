/**
 * Boot environments: definition schema, path resolution, compilation,
 * rendering and lifecycle.
 *
 * ```typescript
 * import { BootEnvLifecycle, parseBootEnv } from "./bootenv/index.js";
 *
 * const lifecycle = new BootEnvLifecycle({ config, templates, machines, fetcher });
 * await lifecycle.onChange(parseBootEnv(record));
 * await lifecycle.apply(env, machine);
 * ```
 */

export {
  BootEnvRecordSchema,
  FileRefSchema,
  OsInfoSchema,
  TemplateSpecSchema,
  BootEnvValidationError,
  parseBootEnv,
  serializeBootEnv,
  type BootEnvRecord,
  type BootEnvironment,
  type FileRef,
  type OsInfo,
  type TemplateSpec,
} from "./schema.js";

export {
  PROTOCOLS,
  DISCOVERY_OS,
  UnknownProtocolError,
  toProtocol,
  installSegment,
  pathFor,
  joinInitrds,
  installUrl,
  type Protocol,
  type PathConfig,
} from "./paths.js";

export {
  BootEnvCompiler,
  BOOT_PARAMS_TEMPLATE_NAME,
  type CompiledBootEnvironment,
  type CompiledTemplateSpec,
} from "./compiler.js";

export {
  URL_SEGMENTS,
  UnsupportedSegmentError,
  MissingParameterError,
  buildRenderContext,
  parseUrlSegment,
  type RenderContext,
  type RenderConfig,
  type MachineView,
  type EnvView,
  type OsView,
  type FileView,
  type UrlSegment,
} from "./context.js";

export {
  DuplicateTemplateError,
  IllegalTemplateError,
  IncompleteBootSupportError,
  MissingRequiredParamsError,
  validateBootEnvStructure,
  missingRequiredParams,
  assertRequiredParams,
} from "./validator.js";

export {
  INSTALL_SUFFIX,
  CANARY_SUFFIX,
  ChecksumMismatchError,
  MediaExtractionError,
  CommandMediaExtractor,
  prepareMedia,
  sha256File,
  canaryPathFor,
  isoPathFor,
  type MediaExtractor,
  type ExtractionRequest,
  type MediaOutcome,
  type MediaSkipReason,
} from "./media.js";

export {
  FileFetchFailedError,
  HttpStatusError,
  HttpFileFetcher,
  ensureOsFiles,
  validateFile,
  type FileFetcher,
  type FileOutcome,
} from "./files.js";

export { renderMachine, deleteRendered, type RenderDeps, type RenderedPaths } from "./pipeline.js";

export {
  BootEnvLifecycle,
  MissingKernelError,
  MissingInitrdError,
  ImmutableIdentityError,
  EnvironmentInUseError,
  CascadeRenderError,
  type BootEnvState,
  type LifecycleDeps,
  type PreparedBootEnvironment,
  type CascadeResult,
  type ChangeResult,
} from "./lifecycle.js";

export {
  PREFERRED_OSES,
  NO_DEFAULT_OS,
  AVAILABLE_OSES_ATTRIBUTE,
  DEFAULT_OS_ATTRIBUTE,
  computeOsAvailability,
  publishOsAttributes,
  osRank,
  type AttributePublisher,
  type OsAvailability,
} from "./ranking.js";

export { listBoards, resolveBoard, DEFAULT_BOARD_NAME, type BoardProfile } from "./boards/catalog.js";
export { executeCompileFix, runCompileFixLoop, type CompileFixDeps, type CompileFixOptions } from "./compile-fix/loop.js";
export { appendRun, loadRun, loadRuns, sketchNameOf, type CompileFixRunRecord, type LoadRunsOptions } from "./compile-fix/run-log.js";
export type {
  CompileAttempt,
  CompileFixEvent,
  CompileFixEventCallback,
  CompileFixResult,
  LoopState,
  RunConfig,
} from "./compile-fix/types.js";
export { clearConfigCache, loadConfig, resolveConfig, resolveConfigPath } from "./config/config.js";
export type { SketchforgeConfig } from "./config/types.js";
export * from "./errors.js";
export { generateSketch, type GenerateSketchParams } from "./generate/generate.js";
export { suggestWiring } from "./generate/wiring.js";
export { createFetchTransfer, installArchive, type ArchiveTransfer } from "./libraries/archive.js";
export { GitHubRegistry, resolveRepository, type HostingRegistry } from "./libraries/repository.js";
export { createDependencyResolver, describeOutcome } from "./libraries/resolver.js";
export type { ArchiveLocation, DependencyResolver, InstallationOutcome, InstallTier } from "./libraries/types.js";
export { configureLogging, getChildLogger, createSubsystemLogger, type ServiceLog } from "./logging.js";
export { GeminiOracle } from "./oracle/gemini.js";
export { extractFirstUrl, parseLibraryList, sanitizeSketchSource } from "./oracle/replies.js";
export { ScriptedOracle } from "./oracle/scripted.js";
export type { Oracle, OracleRequest, OraclePurpose } from "./oracle/types.js";
export { ProjectService } from "./projects/service.js";
export type { Project } from "./projects/types.js";
export { acquireSketchLock, withSketchLock } from "./sketch/lock.js";
export { readSketch, writeSketchAtomic } from "./sketch/store.js";
export { ArduinoCli } from "./toolchain/arduino-cli.js";
export { FakeToolchain } from "./toolchain/fake.js";
export type { SerialPortInfo, ToolResult, Toolchain } from "./toolchain/types.js";
export { uploadWithFallback, type UploadResult } from "./upload/upload.js";

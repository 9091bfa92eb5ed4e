// @mailsync-units/core — Public API

// Config
export { resolveConfig, defaultConfigHome, TOOL_DIR_NAME, type MailsyncUnitsConfig } from './config.js';

// Errors & logging
export { CompileError, isCompileError, type CompileErrorCode, type CompileErrorOptions } from './errors.js';
export { debug, debugWarn } from './debug.js';

// Account Registry
export type { RawAccount, RawImapSettings, RawServiceSettings, Account, PasswordCommandInput } from './accounts/types.js';
export { DEFAULT_IMAP_PORT, DEFAULT_INTERVAL_SEC, SERVICE_NAME_PREFIX, defaultServiceName } from './accounts/types.js';
export { parseRegistry, registrySchema, type RegistryDocument } from './accounts/schema.js';
export { normalizeAccount, normalizeRegistry, normalizePasswordCommand, validateAccountName, validateExtraConfig } from './accounts/normalize.js';

// Artifact Compiler & Aggregator
export {
  compileAccount,
  compileService,
  compileTimer,
  compileConfigFile,
  configFilePath,
  formatExecCommand,
  TIMERS_TARGET,
} from './compiler/compile.js';
export { mergeSections } from './compiler/merge.js';
export { ArtifactAggregator } from './compiler/aggregate.js';
export { compileRegistry } from './compiler/pipeline.js';
export { DEFAULT_COMPILE_OPTIONS } from './compiler/types.js';
export type {
  ArtifactKind,
  ArtifactSet,
  AccountConfigContent,
  CompiledAccount,
  CompileOptions,
  ConfigFileDescriptor,
  PlainAuth,
  ServiceDescriptor,
  TimerDescriptor,
  UnitScalar,
  UnitSection,
  UnitSections,
  UnitValue,
} from './compiler/types.js';

// Rendering
export { renderUnit, orderSections } from './render/unit.js';
export { renderConfigFile } from './render/config-file.js';
export { renderArtifacts, SYSTEMD_USER_DIR, type RenderedFile } from './render/files.js';

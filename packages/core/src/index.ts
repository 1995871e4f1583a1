// Capabilities

export type {
  Availability,
  Capability,
  CapabilityDeclaration,
  CapabilityInvoker,
  CapabilityOf,
  MethodName,
} from "./capability/capability.js";
export { defineCapability } from "./capability/capability.js";
export type { ContextHandle } from "./capability/context.js";
export { SystemContext } from "./capability/context.js";
export {
  CapabilityAlreadyRegisteredError,
  CapabilityContractError,
  CapabilityScopeViolationError,
  CapabilityUnavailableError,
  ContextRevokedError,
  RegistrySealedError,
} from "./capability/errors.js";
export type { CapabilityProvider } from "./capability/registry.js";
export { CapabilityRegistry } from "./capability/registry.js";

// Config

export type { ConfigIssue, HostConfig } from "./config/config.js";
export {
  ConfigError,
  hostConfigSchema,
  loadHostConfig,
  parseHostConfig,
} from "./config/config.js";

// Dispatch

export {
  DispatcherSealedError,
  EventDispatcher,
  ReentrantDispatchError,
} from "./dispatch/dispatcher.js";
export type {
  DispatchReport,
  EventBinding,
  HandlerFault,
} from "./dispatch/types.js";

// Host

export {
  HostAbortedError,
  HostStateError,
  SystemInstantiationError,
} from "./host/errors.js";
export type { FaultAction, FaultPolicy } from "./host/fault-policy.js";
export {
  DEFAULT_FAULT_POLICY,
  FAULT_ACTIONS,
  resolveFaultPolicy,
} from "./host/fault-policy.js";
export type {
  FaultListener,
  HostLoopOptions,
  HostStatus,
  RunOptions,
} from "./host/host-loop.js";
export { HostLoop } from "./host/host-loop.js";

// Log

export type {
  ConsoleLoggerOptions,
  Logger,
  LogLevel,
  LogThreshold,
} from "./log/logger.js";
export {
  createConsoleLogger,
  isLogLevel,
  LOG_LEVELS,
  LOG_THRESHOLDS,
} from "./log/logger.js";

// Resolve

export {
  AmbiguousCapabilityError,
  DependencyCycleError,
  DuplicateSystemError,
  UnresolvedCapabilityError,
} from "./resolve/errors.js";
export type { ResolutionError } from "./resolve/errors.js";
export type { Resolvable } from "./resolve/resolver.js";
export { resolveSystems } from "./resolve/resolver.js";

// Sandbox

export { createInvoker } from "./sandbox/boundary.js";
export { decodeMessage, encodeMessage } from "./sandbox/codec.js";
export {
  MarshalError,
  ModuleAlreadyLoadedError,
  RemoteCallError,
  SystemUnavailableError,
  UnitUnloadedError,
} from "./sandbox/errors.js";
export type {
  SandboxHost,
  SandboxUnit,
  UnitStatus,
} from "./sandbox/sandbox.js";
export { InProcessSandbox } from "./sandbox/sandbox.js";
export type {
  BoundaryMessage,
  CallMessage,
  Envelope,
  EventMessage,
  ReturnMessage,
  ThrowMessage,
} from "./sandbox/types.js";

// Systems and plugin modules

export { SystemBuilder, SystemDefinition, system } from "./system/builder.js";
export type {
  FeatureToggles,
  ModuleSystem,
  PluginModule,
} from "./system/module.js";
export {
  applyFeatures,
  definePlugin,
  isFeatureEnabled,
  selectSystems,
  UnknownModuleError,
} from "./system/module.js";
export type {
  EventKind,
  HandlerDeclaration,
  LiveSystem,
  SystemDescriptor,
} from "./system/types.js";
export { defineEvent } from "./system/types.js";

export type { Result, Target } from "./types.js";
export { err, ok, toError } from "./types.js";
